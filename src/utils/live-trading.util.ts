/**
 * Acknowledgement string that switches the session from simulated to real
 * order submission.
 */
export const LIVE_TRADING_ACK = "I_UNDERSTAND_THE_RISKS";

/**
 * Check if live trading is enabled via the LIVE_TRADING env var.
 *
 * @returns true only if LIVE_TRADING is set to exactly "I_UNDERSTAND_THE_RISKS"
 */
export function isLiveTradingEnabled(
  env: Record<string, string | undefined> = process.env,
): boolean {
  const liveTrading = env.LIVE_TRADING ?? env.live_trading;
  return liveTrading === LIVE_TRADING_ACK;
}
