import { isAddress } from "ethers";
import { Chain } from "@polymarket/clob-client";
import { SignatureType } from "@polymarket/order-utils";
import {
  PLACEHOLDER_PREFIXES,
  POLYMARKET_API,
  PRICE_FEED_API,
  SESSION_DEFAULTS,
} from "../constants/polymarket.constants";
import { ConfigurationError } from "../errors/app.errors";
import { isLiveTradingEnabled } from "../utils/live-trading.util";

/**
 * fixed-delay: sleep the full poll interval after each iteration (drift accepted).
 * fixed-rate: wake on a grid of start + n * interval; an overrun tick is not replayed.
 */
export type SessionCadence = "fixed-delay" | "fixed-rate";

export type PriceFeedConfig = {
  baseUrl: string;
  symbol: string;
  interval: string;
  limit: number;
  timeoutMs: number;
};

export type SessionConfig = {
  privateKey: string;
  funderAddress?: string;
  signatureType: SignatureType;
  chainId: Chain;
  clobHost: string;
  /** Outcome token bought by the session ("UP") */
  tokenId: string;
  polymarketApiKey?: string;
  polymarketApiSecret?: string;
  polymarketApiPassphrase?: string;
  spendCeilingUsd: number;
  orderSizeUsd: number;
  /** Percentage points the estimate must exceed the quote by */
  edgeThreshold: number;
  pollIntervalMs: number;
  sessionDurationMs: number;
  cadence: SessionCadence;
  priceFeed: PriceFeedConfig;
  liveTrading: boolean;
  decisionsLog?: string;
};

/**
 * The subset of the configuration the session loop itself reads.
 */
export type SessionSettings = Pick<
  SessionConfig,
  | "tokenId"
  | "spendCeilingUsd"
  | "orderSizeUsd"
  | "edgeThreshold"
  | "pollIntervalMs"
  | "sessionDurationMs"
  | "cadence"
>;

const PRIVATE_KEY_HEX_REGEX = /^0x[0-9a-fA-F]{64}$/;
const TOKEN_ID_REGEX = /^\d+$/;
/** The klines endpoint rejects larger windows */
const MAX_KLINE_LIMIT = 1000;

export const isSessionCadence = (value: string): value is SessionCadence =>
  value === "fixed-delay" || value === "fixed-rate";

const isPlaceholder = (value: string): boolean =>
  PLACEHOLDER_PREFIXES.some((prefix) => value.toUpperCase().startsWith(prefix));

export function loadSessionConfig(
  overrides: Record<string, string | undefined> = {},
  env: Record<string, string | undefined> = process.env,
): SessionConfig {
  const read = (key: string): string | undefined => {
    const val = overrides[key] ?? env[key] ?? env[key.toLowerCase()];
    return val === undefined ? undefined : val.trim();
  };
  const readNumber = (key: string, fallback: number): number => {
    const val = read(key);
    if (val === undefined || val === "") return fallback;
    const parsed = Number(val);
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationError(`${key} must be a number (got "${val}")`);
    }
    return parsed;
  };
  const required = (key: string, label = key): string => {
    const val = read(key);
    if (!val) throw new ConfigurationError(`Missing required env var: ${label}`);
    if (isPlaceholder(val)) {
      throw new ConfigurationError(
        `${label} still holds its placeholder value; set it before running the bot`,
      );
    }
    return val;
  };

  const privateKey = parsePrivateKey(required("PRIVATE_KEY"));
  const signatureType = parseSignatureType(
    readNumber("SIGNATURE_TYPE", SESSION_DEFAULTS.SIGNATURE_TYPE),
  );
  const chainId = parseChain(readNumber("CHAIN_ID", SESSION_DEFAULTS.CHAIN_ID));

  const funderKey = read("FUNDER") ? "FUNDER" : "POLYMARKET_PROXY_ADDRESS";
  let funderAddress: string | undefined;
  if (signatureType !== SignatureType.EOA) {
    funderAddress = required(funderKey, "FUNDER");
    if (!isAddress(funderAddress)) {
      throw new ConfigurationError(`FUNDER is not a valid address: ${funderAddress}`);
    }
  }

  const tokenId = required("UP_TOKEN_ID");
  if (!TOKEN_ID_REGEX.test(tokenId)) {
    throw new ConfigurationError(`UP_TOKEN_ID must be a decimal token id (got "${tokenId}")`);
  }

  const cadence = (read("SESSION_CADENCE") || "fixed-delay").toLowerCase();
  if (!isSessionCadence(cadence)) {
    throw new ConfigurationError(
      `SESSION_CADENCE must be fixed-delay or fixed-rate (got "${cadence}")`,
    );
  }

  const config: SessionConfig = {
    privateKey,
    funderAddress,
    signatureType,
    chainId,
    clobHost: read("CLOB_HOST") || POLYMARKET_API.CLOB,
    tokenId,
    polymarketApiKey: read("POLYMARKET_API_KEY") || undefined,
    polymarketApiSecret: read("POLYMARKET_API_SECRET") || undefined,
    polymarketApiPassphrase: read("POLYMARKET_API_PASSPHRASE") || undefined,
    spendCeilingUsd: readNumber("MAX_SESSION_SPEND_USD", SESSION_DEFAULTS.MAX_SESSION_SPEND_USD),
    orderSizeUsd: readNumber("ORDER_SIZE_USD", SESSION_DEFAULTS.ORDER_SIZE_USD),
    edgeThreshold: readNumber("EDGE_THRESHOLD", SESSION_DEFAULTS.EDGE_THRESHOLD),
    pollIntervalMs:
      readNumber("POLL_INTERVAL_SECONDS", SESSION_DEFAULTS.POLL_INTERVAL_SECONDS) * 1000,
    sessionDurationMs:
      readNumber("SESSION_DURATION_MINUTES", SESSION_DEFAULTS.SESSION_DURATION_MINUTES) *
      60 * 1000,
    cadence,
    priceFeed: {
      baseUrl: read("PRICE_FEED_URL") || PRICE_FEED_API.BASE_URL,
      symbol: (read("PRICE_FEED_SYMBOL") || SESSION_DEFAULTS.PRICE_FEED_SYMBOL).toUpperCase(),
      interval: read("PRICE_FEED_INTERVAL") || SESSION_DEFAULTS.PRICE_FEED_INTERVAL,
      limit: readNumber("PRICE_FEED_LIMIT", SESSION_DEFAULTS.PRICE_FEED_LIMIT),
      timeoutMs: readNumber("PRICE_FEED_TIMEOUT_MS", SESSION_DEFAULTS.PRICE_FEED_TIMEOUT_MS),
    },
    liveTrading: isLiveTradingEnabled({ ...env, ...overrides }),
    decisionsLog: read("DECISIONS_LOG") || undefined,
  };

  validateSessionConfig(config);
  return config;
}

export function validateSessionConfig(config: SessionConfig): void {
  if (config.orderSizeUsd <= 0) {
    throw new ConfigurationError(`ORDER_SIZE_USD must be positive (got ${config.orderSizeUsd})`);
  }
  if (config.spendCeilingUsd < config.orderSizeUsd) {
    throw new ConfigurationError(
      `MAX_SESSION_SPEND_USD (${config.spendCeilingUsd}) must be at least ORDER_SIZE_USD (${config.orderSizeUsd})`,
    );
  }
  if (config.pollIntervalMs <= 0) {
    throw new ConfigurationError("POLL_INTERVAL_SECONDS must be positive");
  }
  if (config.sessionDurationMs <= 0) {
    throw new ConfigurationError("SESSION_DURATION_MINUTES must be positive");
  }
  const { limit } = config.priceFeed;
  if (!Number.isInteger(limit) || limit < 2 || limit > MAX_KLINE_LIMIT) {
    throw new ConfigurationError(
      `PRICE_FEED_LIMIT must be an integer from 2 to ${MAX_KLINE_LIMIT} (got ${limit})`,
    );
  }
  if (config.priceFeed.timeoutMs <= 0) {
    throw new ConfigurationError("PRICE_FEED_TIMEOUT_MS must be positive");
  }
}

function parsePrivateKey(raw: string): string {
  const normalized = raw.startsWith("0x") ? raw : `0x${raw}`;
  if (!PRIVATE_KEY_HEX_REGEX.test(normalized)) {
    throw new ConfigurationError("PRIVATE_KEY must be 32 bytes of hex");
  }
  return normalized;
}

function parseSignatureType(value: number): SignatureType {
  switch (value) {
    case SignatureType.EOA:
      return SignatureType.EOA;
    case SignatureType.POLY_PROXY:
      return SignatureType.POLY_PROXY;
    case SignatureType.POLY_GNOSIS_SAFE:
      return SignatureType.POLY_GNOSIS_SAFE;
    default:
      throw new ConfigurationError(`SIGNATURE_TYPE must be 0, 1 or 2 (got ${value})`);
  }
}

function parseChain(value: number): Chain {
  switch (value) {
    case Chain.POLYGON:
      return Chain.POLYGON;
    case Chain.AMOY:
      return Chain.AMOY;
    default:
      throw new ConfigurationError(`CHAIN_ID must be ${Chain.POLYGON} or ${Chain.AMOY} (got ${value})`);
  }
}

export function parseCliOverrides(argv: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const body = arg.slice(2);
    const eq = body.indexOf("=");
    const rawKey = eq === -1 ? body : body.slice(0, eq);
    const rawValue = eq === -1 ? undefined : body.slice(eq + 1);
    const key = rawKey.toUpperCase().replace(/-/g, "_");
    if (rawValue !== undefined) {
      overrides[key] = rawValue;
      continue;
    }
    const next = argv[i + 1];
    if (next && !next.startsWith("--")) {
      overrides[key] = next;
      i += 1;
    } else {
      overrides[key] = "true";
    }
  }
  return overrides;
}
