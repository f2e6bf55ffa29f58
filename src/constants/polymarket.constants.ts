/**
 * Polymarket and price-feed endpoints
 * @see https://docs.polymarket.com/developers/CLOB/introduction
 */
export const POLYMARKET_API = {
  CLOB: "https://clob.polymarket.com",
} as const;

export const PRICE_FEED_API = {
  BASE_URL: "https://api.binance.com",
  KLINES_PATH: "/api/v3/klines",
} as const;

/**
 * Default session parameters. Money values are USDC.
 */
export const SESSION_DEFAULTS = {
  MAX_SESSION_SPEND_USD: 20,
  ORDER_SIZE_USD: 5,
  /** Minimum edge, in percentage points, before a buy is placed */
  EDGE_THRESHOLD: 10,
  POLL_INTERVAL_SECONDS: 20,
  SESSION_DURATION_MINUTES: 60,
  CHAIN_ID: 137,
  /** POLY_PROXY: orders are signed by the key and funded by FUNDER */
  SIGNATURE_TYPE: 1,
  PRICE_FEED_SYMBOL: "ETHUSDT",
  PRICE_FEED_INTERVAL: "1m",
  PRICE_FEED_LIMIT: 60,
  PRICE_FEED_TIMEOUT_MS: 10_000,
} as const;

/**
 * Placeholder prefixes shipped in .env.example
 */
export const PLACEHOLDER_PREFIXES = ["YOUR_", "REPLACE_"] as const;
