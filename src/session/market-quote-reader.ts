import { Side } from "@polymarket/clob-client";
import { NetworkError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";
import type { MarketQuoteReader, VenueClient } from "./types";

/**
 * Read a venue price as a fraction in [0,1]. Accepts a number, a numeric
 * string, or `{ price }` holding either. Anything else is "no price".
 */
export function parseVenuePrice(raw: unknown): number | null {
  const value =
    typeof raw === "object" && raw !== null && "price" in raw ? raw.price : raw;

  let price: number;
  if (typeof value === "number") {
    price = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    price = Number(value);
  } else {
    return null;
  }

  if (!Number.isFinite(price) || price < 0 || price > 1) return null;
  return price;
}

export type VenueError = { message: string; status?: number };

function extractVenueError(raw: unknown): VenueError | undefined {
  if (typeof raw !== "object" || raw === null || !("error" in raw)) return undefined;
  const { error } = raw;
  if (error === undefined || error === null || error === "") return undefined;
  const message = typeof error === "string" ? error : JSON.stringify(error);
  const status: unknown = Reflect.get(raw, "status");
  return { message, status: typeof status === "number" ? status : undefined };
}

/**
 * The venue answers 404 "No orderbook exists ..." for a token nobody quotes.
 */
export const isMissingOrderbook = (error: VenueError): boolean =>
  error.status === 404 || error.message.includes("No orderbook exists");

export class ClobMarketQuoteReader implements MarketQuoteReader {
  private readonly client: VenueClient;
  private readonly logger: Logger;

  constructor(params: { client: VenueClient; logger: Logger }) {
    this.client = params.client;
    this.logger = params.logger;
  }

  async quote(tokenId: string): Promise<number | null> {
    const raw = await this.client.getPrice(tokenId, Side.BUY);

    // clob-client reports HTTP failures as `{ error, status }` instead of throwing
    const venueError = extractVenueError(raw);
    if (venueError && isMissingOrderbook(venueError)) {
      this.logger.debug(`[Quote] No orderbook for ${tokenId.slice(0, 10)}...: ${venueError.message}`);
      return null;
    }
    if (venueError) {
      throw new NetworkError(`Price lookup failed: ${venueError.message}`, "/price");
    }

    const price = parseVenuePrice(raw);
    if (price === null) {
      this.logger.debug(`[Quote] No usable price for ${tokenId.slice(0, 10)}...: ${JSON.stringify(raw) ?? "undefined"}`);
      return null;
    }
    return price * 100;
  }
}
