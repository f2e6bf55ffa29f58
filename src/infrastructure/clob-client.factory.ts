/**
 * CLOB client factory
 *
 * Builds the pre-authenticated ClobClient the session trades through:
 * - ethers v6 wallet from PRIVATE_KEY, shimmed for the v5 signer interface
 * - signature type + funder address for proxy / Safe wallets
 * - L2 API credentials taken from config, or derived from the wallet
 */

import { Wallet } from "ethers";
import { ClobClient } from "@polymarket/clob-client";
import type { ApiKeyCreds } from "@polymarket/clob-client";
import { SignatureType } from "@polymarket/order-utils";
import type { SessionConfig } from "../config/session.config";
import { AuthenticationError, toError } from "../errors/app.errors";
import { asClobSigner } from "../utils/clob-signer.util";
import type { Logger } from "../utils/logger.util";
import { sanitizeErrorMessage } from "../utils/sanitize-axios-error.util";

export type ClientAuthConfig = Pick<
  SessionConfig,
  | "privateKey"
  | "funderAddress"
  | "signatureType"
  | "chainId"
  | "clobHost"
  | "polymarketApiKey"
  | "polymarketApiSecret"
  | "polymarketApiPassphrase"
>;

export function isApiKeyCreds(value: unknown): value is ApiKeyCreds {
  if (typeof value !== "object" || value === null) return false;
  return ["key", "secret", "passphrase"].every((field) => {
    const part: unknown = Reflect.get(value, field);
    return typeof part === "string" && part !== "";
  });
}

const shortAddress = (address: string): string =>
  `${address.slice(0, 10)}...${address.slice(-6)}`;

/**
 * Credentials supplied through config, when all three parts are present
 */
export function providedCredentials(config: ClientAuthConfig): ApiKeyCreds | undefined {
  const { polymarketApiKey, polymarketApiSecret, polymarketApiPassphrase } = config;
  if (polymarketApiKey && polymarketApiSecret && polymarketApiPassphrase) {
    return {
      key: polymarketApiKey,
      secret: polymarketApiSecret,
      passphrase: polymarketApiPassphrase,
    };
  }
  return undefined;
}

export async function createSessionClient(
  config: ClientAuthConfig,
  logger?: Logger,
): Promise<ClobClient> {
  const wallet = new Wallet(config.privateKey);
  const signer = asClobSigner(wallet);
  const funder =
    config.signatureType !== SignatureType.EOA ? config.funderAddress : undefined;

  logger?.info(
    `[Client] Wallet ${shortAddress(wallet.address)} (signatureType=${config.signatureType}${funder ? `, funder=${shortAddress(funder)}` : ", EOA mode"})`,
  );

  let creds = providedCredentials(config);
  if (creds) {
    logger?.info("[Client] Using provided API credentials");
  } else {
    logger?.info("[Client] Deriving API credentials...");
    const l1Client = new ClobClient(
      config.clobHost,
      config.chainId,
      signer,
      undefined,
      config.signatureType,
      funder,
    );

    let derived: unknown;
    try {
      derived = await l1Client.createOrDeriveApiKey();
    } catch (err) {
      throw new AuthenticationError(
        `Failed to derive API credentials: ${sanitizeErrorMessage(err)}`,
        toError(err),
      );
    }
    if (!isApiKeyCreds(derived)) {
      throw new AuthenticationError(
        "Derived API credentials are incomplete; the wallet may need to trade on Polymarket once first",
      );
    }
    creds = derived;
    logger?.info(`[Client] Credentials derived (key: ...${creds.key.slice(-6)})`);
  }

  return new ClobClient(
    config.clobHost,
    config.chainId,
    signer,
    creds,
    config.signatureType,
    funder,
  );
}
