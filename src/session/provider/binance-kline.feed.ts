import axios, { type AxiosInstance } from "axios";
import { PRICE_FEED_API } from "../../constants/polymarket.constants";
import { PriceFeedError } from "../../errors/app.errors";
import type { PriceFeedConfig } from "../../config/session.config";
import type { Candle, PriceFeed } from "../types";

function parseNumeric(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const num = Number(value);
    return Number.isFinite(num) ? num : undefined;
  }
  return undefined;
}

/**
 * Parse the `/api/v3/klines` payload: an array of rows shaped
 * [openTime, open, high, low, close, volume, closeTime, ...].
 */
export function parseKlines(payload: unknown): Candle[] {
  if (!Array.isArray(payload)) {
    throw new PriceFeedError("Kline response is not an array", PRICE_FEED_API.KLINES_PATH);
  }

  return payload.map((row: unknown, index): Candle => {
    if (!Array.isArray(row) || row.length < 7) {
      throw new PriceFeedError(`Kline row ${index} is malformed`, PRICE_FEED_API.KLINES_PATH);
    }
    const openTime = parseNumeric(row[0]);
    const open = parseNumeric(row[1]);
    const high = parseNumeric(row[2]);
    const low = parseNumeric(row[3]);
    const close = parseNumeric(row[4]);
    const closeTime = parseNumeric(row[6]);
    if (
      openTime === undefined ||
      open === undefined ||
      high === undefined ||
      low === undefined ||
      close === undefined ||
      closeTime === undefined
    ) {
      throw new PriceFeedError(
        `Kline row ${index} has non-numeric fields`,
        PRICE_FEED_API.KLINES_PATH,
      );
    }
    return { openTime, open, high, low, close, closeTime };
  });
}

export class BinanceKlineFeed implements PriceFeed {
  private readonly http: AxiosInstance;
  private readonly config: PriceFeedConfig;

  constructor(params: { config: PriceFeedConfig; http?: AxiosInstance }) {
    this.config = params.config;
    this.http =
      params.http ??
      axios.create({ baseURL: params.config.baseUrl, timeout: params.config.timeoutMs });
  }

  async fetchCandles(): Promise<Candle[]> {
    const { symbol, interval, limit } = this.config;
    const response = await this.http.get<unknown>(PRICE_FEED_API.KLINES_PATH, {
      params: { symbol, interval, limit },
    });
    return parseKlines(response.data);
  }
}
