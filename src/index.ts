#!/usr/bin/env node
/**
 * Edge Session Bot
 *
 * Runs one time-bounded session: estimate the UP probability from recent
 * klines, compare it with the CLOB buy price and buy fixed-size FOK orders
 * while the edge holds and the session budget allows.
 *
 * Usage:
 *   npm start
 *   npm start -- --session-duration-minutes 30 --edge-threshold 12
 *
 * Orders are simulated unless LIVE_TRADING=I_UNDERSTAND_THE_RISKS.
 */

import "dotenv/config";
import { loadSessionConfig, parseCliOverrides } from "./config";
import { toError } from "./errors/app.errors";
import { runSession } from "./session/runtime";
import { ConsoleLogger } from "./utils/logger.util";

async function main(): Promise<void> {
  const logger = new ConsoleLogger();
  const config = loadSessionConfig(parseCliOverrides(process.argv.slice(2)));

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.warn(`[Shutdown] Received ${signal}; stopping after the current iteration`);
    controller.abort();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await runSession(config, { logger, signal: controller.signal });
  process.exit(0);
}

main().catch((err: unknown) => {
  const logger = new ConsoleLogger();
  logger.error(`[Fatal] ${toError(err).message}`, toError(err));
  process.exit(1);
});
