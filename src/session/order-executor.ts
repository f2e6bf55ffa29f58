import { OrderType, Side } from "@polymarket/clob-client";
import { TradeExecutionError, toError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";
import { sanitizeErrorMessage } from "../utils/sanitize-axios-error.util";
import type { OrderExecutor, OrderResult, VenueClient } from "./types";

const readString = (record: object, key: string): string | undefined => {
  const value: unknown = Reflect.get(record, key);
  return typeof value === "string" && value !== "" ? value : undefined;
};

/**
 * Classify a postOrder acknowledgement. A FOK order either fills completely
 * or is killed, so there is no partial outcome.
 */
export function classifyOrderResponse(response: unknown): OrderResult {
  if (typeof response !== "object" || response === null) {
    const reason = typeof response === "string" && response ? response : "EMPTY_RESPONSE";
    return { status: "rejected", reason, response };
  }

  const errorMsg = readString(response, "errorMsg") ?? readString(response, "error");
  const orderId = readString(response, "orderID") ?? readString(response, "orderId");
  const success: unknown = Reflect.get(response, "success");

  if (errorMsg) {
    return { status: "rejected", reason: errorMsg, orderId, response };
  }
  if (success === true || (success === undefined && orderId)) {
    return { status: "filled", orderId, response };
  }
  return { status: "rejected", reason: "NOT_ACCEPTED", orderId, response };
}

export class ClobOrderExecutor implements OrderExecutor {
  private readonly client: VenueClient;
  private readonly logger: Logger;
  private readonly liveTrading: boolean;

  constructor(params: { client: VenueClient; logger: Logger; liveTrading: boolean }) {
    this.client = params.client;
    this.logger = params.logger;
    this.liveTrading = params.liveTrading;
  }

  async buy(tokenId: string, amount: number): Promise<OrderResult> {
    if (amount <= 0) {
      return { status: "skipped", reason: "NON_POSITIVE_AMOUNT" };
    }

    if (!this.liveTrading) {
      this.logger.warn(
        `[SIM] BUY $${amount.toFixed(2)} of ${tokenId.slice(0, 10)}... - live trading disabled`,
      );
      return { status: "simulated", reason: "SIMULATED" };
    }

    let signed: unknown;
    try {
      signed = await this.client.createMarketOrder({
        tokenID: tokenId,
        amount,
        side: Side.BUY,
        orderType: OrderType.FOK,
      });
    } catch (err) {
      throw new TradeExecutionError(
        `Failed to build FOK buy: ${sanitizeErrorMessage(err)}`,
        tokenId,
        toError(err),
      );
    }

    let response: unknown;
    try {
      response = await this.client.postOrder(signed, OrderType.FOK);
    } catch (err) {
      throw new TradeExecutionError(
        `Failed to submit FOK buy: ${sanitizeErrorMessage(err)}`,
        tokenId,
        toError(err),
      );
    }

    this.logger.info(`[Order] Response: ${JSON.stringify(response) ?? String(response)}`);
    return classifyOrderResponse(response);
  }
}
