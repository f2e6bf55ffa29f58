import type { Logger } from "../utils/logger.util";
import type { Candle, PriceFeed, SignalEstimator } from "./types";

export const NEUTRAL_PROBABILITY = 50;
export const MIN_PROBABILITY = 5;
export const MAX_PROBABILITY = 95;
/** Probability points per percent of price change */
export const CHANGE_MULTIPLIER = 2;

/**
 * Percent change from the first candle's open to the last candle's close,
 * or null when the window cannot produce one.
 */
export function percentChange(candles: readonly Candle[]): number | null {
  if (candles.length < 2) return null;
  const first = candles[0].open;
  const last = candles[candles.length - 1].close;
  if (!Number.isFinite(first) || !Number.isFinite(last) || first <= 0) return null;
  return ((last - first) * 100) / first;
}

/**
 * Placeholder strategy: map the window's price change linearly onto a
 * probability and clamp to [5, 95]. Pure.
 */
export function estimateProbability(candles: readonly Candle[]): number {
  const change = percentChange(candles);
  if (change === null) return NEUTRAL_PROBABILITY;
  const raw = NEUTRAL_PROBABILITY + change * CHANGE_MULTIPLIER;
  return Math.max(MIN_PROBABILITY, Math.min(MAX_PROBABILITY, raw));
}

export class KlineSignalEstimator implements SignalEstimator {
  private readonly feed: PriceFeed;
  private readonly logger: Logger;

  constructor(params: { feed: PriceFeed; logger: Logger }) {
    this.feed = params.feed;
    this.logger = params.logger;
  }

  async estimate(): Promise<number> {
    const candles = await this.feed.fetchCandles();
    const change = percentChange(candles);
    const estimate = estimateProbability(candles);
    this.logger.debug(
      `[Signal] candles=${candles.length} change=${change === null ? "n/a" : `${change.toFixed(3)}%`} estimate=${estimate.toFixed(1)}%`,
    );
    return estimate;
  }
}
