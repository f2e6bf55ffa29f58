import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { isApiKeyCreds, providedCredentials } from "../../src/infrastructure/clob-client.factory";
import type { ClientAuthConfig } from "../../src/infrastructure/clob-client.factory";
import { Chain } from "@polymarket/clob-client";
import { SignatureType } from "@polymarket/order-utils";

const auth = (extra: Partial<ClientAuthConfig> = {}): ClientAuthConfig => ({
  privateKey: `0x${"33".repeat(32)}`,
  funderAddress: "0x1234567890abcdef1234567890abcdef12345678",
  signatureType: SignatureType.POLY_PROXY,
  chainId: Chain.POLYGON,
  clobHost: "https://clob.test",
  ...extra,
});

describe("isApiKeyCreds", () => {
  it("requires all three non-empty parts", () => {
    assert.equal(isApiKeyCreds({ key: "test-key", secret: "test-secret", passphrase: "test-pass" }), true);
    assert.equal(isApiKeyCreds({ key: "test-key", secret: "", passphrase: "test-pass" }), false);
    assert.equal(isApiKeyCreds({ key: "test-key", secret: "test-secret" }), false);
    assert.equal(isApiKeyCreds(undefined), false);
    assert.equal(isApiKeyCreds("test-key"), false);
  });
});

describe("providedCredentials", () => {
  it("uses configured credentials only when complete", () => {
    assert.deepEqual(
      providedCredentials(
        auth({
          polymarketApiKey: "test-key",
          polymarketApiSecret: "test-secret",
          polymarketApiPassphrase: "test-pass",
        }),
      ),
      { key: "test-key", secret: "test-secret", passphrase: "test-pass" },
    );
    assert.equal(providedCredentials(auth({ polymarketApiKey: "test-key" })), undefined);
    assert.equal(providedCredentials(auth()), undefined);
  });
});
