import type { AxiosInstance } from "axios";
import type { SessionConfig } from "../config/session.config";
import { createSessionClient } from "../infrastructure/clob-client.factory";
import { ConsoleLogger, type Logger } from "../utils/logger.util";
import { BudgetTracker } from "./budget-tracker";
import { ClobMarketQuoteReader } from "./market-quote-reader";
import { ClobOrderExecutor } from "./order-executor";
import { BinanceKlineFeed } from "./provider/binance-kline.feed";
import { SessionController } from "./session-controller";
import { KlineSignalEstimator } from "./signal-estimator";
import type { Clock, SessionSummary, VenueClient } from "./types";
import { DecisionLogger } from "./utils/decision-logger";

export type SessionRuntimeDeps = {
  logger?: Logger;
  /** Pre-authenticated venue client; built from config when absent */
  client?: VenueClient;
  clock?: Clock;
  signal?: AbortSignal;
  /** HTTP instance for the price feed */
  http?: AxiosInstance;
};

/**
 * Wire the session components from config and run one session to completion.
 */
export async function runSession(
  config: SessionConfig,
  deps: SessionRuntimeDeps = {},
): Promise<SessionSummary> {
  const logger = deps.logger ?? new ConsoleLogger();

  if (!config.liveTrading) {
    logger.warn("[Session] LIVE_TRADING not enabled; orders will be simulated");
  }

  const client = deps.client ?? (await createSessionClient(config, logger));
  const feed = new BinanceKlineFeed({ config: config.priceFeed, http: deps.http });

  const controller = new SessionController({
    estimator: new KlineSignalEstimator({ feed, logger }),
    quoteReader: new ClobMarketQuoteReader({ client, logger }),
    executor: new ClobOrderExecutor({ client, logger, liveTrading: config.liveTrading }),
    budget: new BudgetTracker(config.spendCeilingUsd),
    settings: config,
    logger,
    clock: deps.clock,
    decisionLogger: new DecisionLogger(config.decisionsLog),
    signal: deps.signal,
  });

  return controller.run();
}
