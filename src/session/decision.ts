import type { TradeDecision } from "./types";

export type DecisionInput = {
  estimate: number;
  marketQuote: number;
  edgeThreshold: number;
  orderSize: number;
  remainingBudget: number;
};

/**
 * Buy-only rule: trade when the estimate beats the quote by more than the
 * threshold and a full order still fits in the remaining budget. When both
 * gates fail the edge reason is reported.
 */
export function decideTrade(input: DecisionInput): TradeDecision {
  const { estimate, marketQuote, edgeThreshold, orderSize, remainingBudget } = input;
  const edge = estimate - marketQuote;
  const base = { estimate, marketQuote, edge };

  if (!(edge > edgeThreshold)) {
    return { ...base, action: "skip", reason: "EDGE_BELOW_THRESHOLD" };
  }
  if (remainingBudget < orderSize) {
    return { ...base, action: "skip", reason: "BUDGET_EXHAUSTED" };
  }
  return { ...base, action: "trade" };
}
