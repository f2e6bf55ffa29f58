import type { OrderType, UserMarketOrder } from "@polymarket/clob-client";

/**
 * One kline from the price feed. Only `open` of the first and `close` of the
 * last candle feed the estimate; the rest is kept for debug output.
 */
export type Candle = {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  closeTime: number;
};

export type OrderStatus = "filled" | "rejected" | "skipped" | "simulated";

export type OrderResult = {
  status: OrderStatus;
  orderId?: string;
  reason?: string;
  /** Raw venue acknowledgement, when the venue was called */
  response?: unknown;
};

export type TradeAction = "trade" | "skip";

export type SkipReason = "EDGE_BELOW_THRESHOLD" | "BUDGET_EXHAUSTED";

export type TradeDecision = {
  estimate: number;
  marketQuote: number;
  edge: number;
  action: TradeAction;
  reason?: SkipReason;
};

export type IterationOutcome =
  | { kind: "no_quote"; estimate: number }
  | { kind: "skipped"; decision: TradeDecision }
  | { kind: "ordered"; decision: TradeDecision; result: OrderResult }
  | { kind: "error"; message: string };

export type SessionSummary = {
  startedAt: number;
  endedAt: number;
  totalSpent: number;
  iterations: number;
  ordersPlaced: number;
  ordersRejected: number;
  errors: number;
  stoppedEarly: boolean;
};

/**
 * The slice of ClobClient the session uses. A pre-authenticated
 * ClobClient satisfies it; tests supply in-process fakes.
 */
export interface VenueClient {
  getPrice(tokenID: string, side: string): Promise<unknown>;
  createMarketOrder(order: UserMarketOrder): Promise<unknown>;
  postOrder(order: unknown, orderType: OrderType.FOK): Promise<unknown>;
}

export interface PriceFeed {
  fetchCandles: () => Promise<Candle[]>;
}

export interface SignalEstimator {
  estimate: () => Promise<number>;
}

export interface MarketQuoteReader {
  /** Percentage in [0,100], or null when the venue has no usable price */
  quote: (tokenId: string) => Promise<number | null>;
}

export interface OrderExecutor {
  buy: (tokenId: string, amount: number) => Promise<OrderResult>;
}

export interface Clock {
  now: () => number;
  /** Resolves after `ms`, or as soon as `signal` aborts */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}
