import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { AxiosError, AxiosHeaders } from "axios";
import {
  extractCompactAxiosError,
  formatCompactError,
  redactSensitiveValues,
  sanitizeErrorMessage,
} from "../../src/utils/sanitize-axios-error.util";

const axiosFailure = (data: unknown): AxiosError => {
  const config = {
    method: "get",
    url: "https://clob.test/price?token_id=1&POLY_PASSPHRASE=test-secret",
    headers: new AxiosHeaders(),
  };
  return new AxiosError("Request failed with status code 429", "ERR_BAD_REQUEST", config, undefined, {
    status: 429,
    statusText: "Too Many Requests",
    headers: {},
    config,
    data,
  });
};

describe("redactSensitiveValues", () => {
  it("redacts key=value and JSON forms", () => {
    assert.equal(
      redactSensitiveValues("failed POLY_API_KEY=test-key next"),
      "failed POLY_API_KEY=<redacted> next",
    );
    assert.equal(
      redactSensitiveValues('{"passphrase":"test-secret","ok":true}'),
      '{"passphrase":"<redacted>","ok":true}',
    );
  });
});

describe("extractCompactAxiosError", () => {
  it("keeps status, method, path and the response message", () => {
    const compact = extractCompactAxiosError(axiosFailure({ error: "rate limited" }));
    assert.deepEqual(compact, {
      status: 429,
      method: "GET",
      url: "https://clob.test/price",
      errorCode: "ERR_BAD_REQUEST",
      errorMessage: "rate limited",
    });
  });

  it("falls back to the axios message", () => {
    const compact = extractCompactAxiosError(axiosFailure(undefined));
    assert.equal(compact.errorMessage, "Request failed with status code 429");
  });

  it("handles non-axios values", () => {
    assert.deepEqual(extractCompactAxiosError("secret=test-secret"), {
      errorMessage: "secret=<redacted>",
    });
  });
});

describe("sanitizeErrorMessage", () => {
  it("formats axios errors on one line", () => {
    assert.equal(
      sanitizeErrorMessage(axiosFailure({ msg: "slow down" })),
      'status=429 method=GET url=https://clob.test/price code=ERR_BAD_REQUEST error="slow down"',
    );
  });

  it("redacts plain errors", () => {
    assert.equal(
      sanitizeErrorMessage(new Error("PRIVATE_KEY=0xdeadbeef rejected")),
      "PRIVATE_KEY=<redacted> rejected",
    );
  });

  it("formats an empty compact error as an empty string", () => {
    assert.equal(formatCompactError({}), "");
  });
});
