/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when required settings are missing, still hold
 * their placeholder value, or cannot be parsed. Raised before a session starts.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Authentication error - thrown when L2 API credentials cannot be obtained
 */
export class AuthenticationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "AUTH_ERROR", cause);
  }
}

/**
 * Network error - thrown when RPC or API calls fail
 */
export class NetworkError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    cause?: Error,
    code = "NETWORK_ERROR",
  ) {
    super(message, code, cause);
  }
}

/**
 * Price feed error - the kline endpoint answered with a payload we cannot read
 */
export class PriceFeedError extends NetworkError {
  constructor(message: string, endpoint?: string, cause?: Error) {
    super(message, endpoint, cause, "PRICE_FEED_ERROR");
  }
}

/**
 * Trade execution error - thrown when an order cannot be built or submitted
 */
export class TradeExecutionError extends AppError {
  constructor(
    message: string,
    public readonly tokenId?: string,
    cause?: Error,
  ) {
    super(message, "TRADE_EXECUTION_ERROR", cause);
  }
}

/**
 * Budget error - recording the amount would push session spend past the ceiling
 */
export class BudgetExceededError extends AppError {
  constructor(
    message: string,
    public readonly requested: number,
    public readonly remaining: number,
  ) {
    super(message, "BUDGET_EXCEEDED");
  }
}

/**
 * Normalize an unknown thrown value to an Error instance
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
