import type { SessionSettings } from "../config/session.config";
import type { Logger } from "../utils/logger.util";
import { sanitizeErrorMessage } from "../utils/sanitize-axios-error.util";
import { BudgetTracker } from "./budget-tracker";
import { systemClock } from "./clock";
import { decideTrade } from "./decision";
import type { DecisionLogEntry, DecisionLogger } from "./utils/decision-logger";
import type {
  Clock,
  IterationOutcome,
  MarketQuoteReader,
  OrderExecutor,
  SessionSummary,
  SignalEstimator,
  TradeDecision,
} from "./types";

const usd = (amount: number): string => `$${amount.toFixed(2)}`;
const pct = (value: number): string => `${value.toFixed(1)}%`;
const signedPoints = (value: number): string =>
  `${value >= 0 ? "+" : ""}${value.toFixed(1)}pp`;

/**
 * Drives one bounded session: poll, decide, buy within budget, sleep.
 *
 * Errors thrown by the estimator, the quote reader or the executor are
 * contained in the iteration that raised them. The abort signal is only
 * consulted between iterations, so an order in flight always completes.
 */
export class SessionController {
  private readonly estimator: SignalEstimator;
  private readonly quoteReader: MarketQuoteReader;
  private readonly executor: OrderExecutor;
  private readonly budget: BudgetTracker;
  private readonly settings: SessionSettings;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly decisionLogger?: DecisionLogger;
  private readonly signal?: AbortSignal;
  private started = false;
  private iterations = 0;
  private ordersPlaced = 0;
  private ordersRejected = 0;
  private errors = 0;

  constructor(params: {
    estimator: SignalEstimator;
    quoteReader: MarketQuoteReader;
    executor: OrderExecutor;
    settings: SessionSettings;
    logger: Logger;
    budget?: BudgetTracker;
    clock?: Clock;
    decisionLogger?: DecisionLogger;
    signal?: AbortSignal;
  }) {
    this.estimator = params.estimator;
    this.quoteReader = params.quoteReader;
    this.executor = params.executor;
    this.settings = params.settings;
    this.logger = params.logger;
    this.budget = params.budget ?? new BudgetTracker(params.settings.spendCeilingUsd);
    this.clock = params.clock ?? systemClock;
    this.decisionLogger = params.decisionLogger;
    this.signal = params.signal;
  }

  async run(): Promise<SessionSummary> {
    if (this.started) {
      throw new Error("SessionController.run() may only be called once");
    }
    this.started = true;

    const { sessionDurationMs, pollIntervalMs, cadence, tokenId } = this.settings;
    const startedAt = this.clock.now();
    const endsAt = startedAt + sessionDurationMs;
    let lastWake = startedAt;
    let stoppedEarly = false;

    this.logger.info(
      `[Session] Starting ${Math.round(sessionDurationMs / 60_000)}-minute session at ${new Date(startedAt).toISOString()} ` +
        `(token=${tokenId.slice(0, 10)}..., order=${usd(this.settings.orderSizeUsd)}, ceiling=${usd(this.budget.spendCeiling)}, ` +
        `edge>${this.settings.edgeThreshold}pp, interval=${pollIntervalMs / 1000}s, cadence=${cadence})`,
    );

    while (this.clock.now() < endsAt) {
      if (this.signal?.aborted) {
        stoppedEarly = true;
        break;
      }

      await this.runIteration();

      const now = this.clock.now();
      let delayMs = pollIntervalMs;
      if (cadence === "fixed-rate") {
        lastWake = Math.max(lastWake + pollIntervalMs, now);
        delayMs = lastWake - now;
      }
      await this.clock.sleep(delayMs, this.signal);
    }

    const summary: SessionSummary = {
      startedAt,
      endedAt: this.clock.now(),
      totalSpent: this.budget.spent(),
      iterations: this.iterations,
      ordersPlaced: this.ordersPlaced,
      ordersRejected: this.ordersRejected,
      errors: this.errors,
      stoppedEarly,
    };

    this.logger.info(
      `[Session] ${stoppedEarly ? "Stopped session early" : "Finished session"}. Total spent: ${usd(summary.totalSpent)} USDC ` +
        `(iterations=${summary.iterations}, orders=${summary.ordersPlaced}, rejected=${summary.ordersRejected}, errors=${summary.errors})`,
    );
    return summary;
  }

  /**
   * One poll/decide/buy round. Never throws.
   */
  async runIteration(): Promise<IterationOutcome> {
    this.iterations += 1;
    const iteration = this.iterations;

    let outcome: IterationOutcome;
    try {
      outcome = await this.evaluate(iteration);
    } catch (err) {
      this.errors += 1;
      const message = sanitizeErrorMessage(err);
      this.logger.error(`[Session] #${iteration} Error in loop: ${message}`);
      outcome = { kind: "error", message };
    }

    await this.recordDecision(iteration, outcome);
    return outcome;
  }

  private async evaluate(iteration: number): Promise<IterationOutcome> {
    const { tokenId, orderSizeUsd, edgeThreshold } = this.settings;

    const estimate = await this.estimator.estimate();
    const marketQuote = await this.quoteReader.quote(tokenId);

    if (marketQuote === null) {
      this.logger.info(
        `[Session] #${iteration} est=${pct(estimate)} market=n/a -> no trade (no market price for token)`,
      );
      return { kind: "no_quote", estimate };
    }

    const decision = decideTrade({
      estimate,
      marketQuote,
      edgeThreshold,
      orderSize: orderSizeUsd,
      remainingBudget: this.budget.remaining(),
    });
    this.logger.info(`[Session] #${iteration} ${this.describe(decision)}`);

    if (decision.action === "skip") {
      return { kind: "skipped", decision };
    }

    const result = await this.executor.buy(tokenId, orderSizeUsd);
    if (result.status === "filled" || result.status === "simulated") {
      this.budget.record(orderSizeUsd);
      this.ordersPlaced += 1;
      this.logger.info(
        `[Session] #${iteration} Order ${result.status}${result.orderId ? ` (${result.orderId})` : ""}; ` +
          `spent ${usd(this.budget.spent())} of ${usd(this.budget.spendCeiling)}`,
      );
    } else if (result.status === "rejected") {
      this.ordersRejected += 1;
      this.logger.warn(
        `[Session] #${iteration} Order rejected (${result.reason ?? "unknown"}); budget unchanged`,
      );
    }
    return { kind: "ordered", decision, result };
  }

  private describe(decision: TradeDecision): string {
    const head = `est=${pct(decision.estimate)} market=${pct(decision.marketQuote)} edge=${signedPoints(decision.edge)}`;
    if (decision.action === "trade") {
      return `${head} -> BUY ${usd(this.settings.orderSizeUsd)}`;
    }
    if (decision.reason === "BUDGET_EXHAUSTED") {
      return `${head} -> no trade (budget used: ${usd(this.budget.spent())} of ${usd(this.budget.spendCeiling)})`;
    }
    return `${head} -> no trade (edge below ${this.settings.edgeThreshold}pp)`;
  }

  private async recordDecision(iteration: number, outcome: IterationOutcome): Promise<void> {
    const decisionLogger = this.decisionLogger;
    if (!decisionLogger?.enabled) return;

    try {
      await decisionLogger.append(this.toDecisionEntry(iteration, outcome));
    } catch (err) {
      this.logger.warn(`[Session] Failed to append decision log: ${sanitizeErrorMessage(err)}`);
    }
  }

  private toDecisionEntry(iteration: number, outcome: IterationOutcome): DecisionLogEntry {
    const base = {
      ts: new Date(this.clock.now()).toISOString(),
      iteration,
      token_id: this.settings.tokenId,
      spent: this.budget.spent(),
    };
    switch (outcome.kind) {
      case "no_quote":
        return { ...base, action: "no_quote", estimate: outcome.estimate, market_quote: null };
      case "skipped":
        return {
          ...base,
          action: "skip",
          estimate: outcome.decision.estimate,
          market_quote: outcome.decision.marketQuote,
          edge: outcome.decision.edge,
          reason: outcome.decision.reason,
        };
      case "ordered":
        return {
          ...base,
          action: "trade",
          estimate: outcome.decision.estimate,
          market_quote: outcome.decision.marketQuote,
          edge: outcome.decision.edge,
          order_size: this.settings.orderSizeUsd,
          status: outcome.result.status,
          order_id: outcome.result.orderId,
          reason: outcome.result.reason,
        };
      case "error":
        return { ...base, action: "error", reason: outcome.message };
    }
  }
}
