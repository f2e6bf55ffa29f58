import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ClobMarketQuoteReader, parseVenuePrice } from "../../src/session/market-quote-reader";
import { NetworkError } from "../../src/errors/app.errors";
import { RecordingLogger, TOKEN_ID, createFakeVenue } from "../helpers/fakes";

describe("parseVenuePrice", () => {
  it("accepts numbers, numeric strings and { price }", () => {
    assert.equal(parseVenuePrice(0.42), 0.42);
    assert.equal(parseVenuePrice("0.5"), 0.5);
    assert.equal(parseVenuePrice({ price: "0.55" }), 0.55);
    assert.equal(parseVenuePrice({ price: 1 }), 1);
  });

  it("returns null for missing or out-of-range prices", () => {
    assert.equal(parseVenuePrice(undefined), null);
    assert.equal(parseVenuePrice({}), null);
    assert.equal(parseVenuePrice({ price: "" }), null);
    assert.equal(parseVenuePrice({ price: "n/a" }), null);
    assert.equal(parseVenuePrice("1.2"), null);
    assert.equal(parseVenuePrice(-0.1), null);
  });
});

describe("ClobMarketQuoteReader", () => {
  it("asks for the BUY price and converts it to percent", async () => {
    const venue = createFakeVenue({ price: () => ({ price: "0.55" }) });
    const reader = new ClobMarketQuoteReader({ client: venue.client, logger: new RecordingLogger() });

    const quote = await reader.quote(TOKEN_ID);

    assert.ok(quote !== null);
    assert.ok(Math.abs(quote - 55) < 1e-9);
    assert.deepEqual(venue.getPrice.mock.calls[0].arguments, [TOKEN_ID, "BUY"]);
  });

  it("returns null when the venue has no price", async () => {
    const logger = new RecordingLogger();
    const venue = createFakeVenue({ price: () => ({}) });
    const reader = new ClobMarketQuoteReader({ client: venue.client, logger });

    assert.equal(await reader.quote(TOKEN_ID), null);
    assert.deepEqual(logger.messages("debug"), [
      `[Quote] No usable price for ${TOKEN_ID.slice(0, 10)}...: {}`,
    ]);
  });

  it("treats a missing orderbook as no quote", async () => {
    const logger = new RecordingLogger();
    const venue = createFakeVenue({
      price: () => ({ error: "No orderbook exists for the requested token id", status: 404 }),
    });
    const reader = new ClobMarketQuoteReader({ client: venue.client, logger });

    assert.equal(await reader.quote(TOKEN_ID), null);
    assert.deepEqual(logger.messages("debug"), [
      `[Quote] No orderbook for ${TOKEN_ID.slice(0, 10)}...: No orderbook exists for the requested token id`,
    ]);
  });

  it("treats a missing orderbook message without a status as no quote", async () => {
    const venue = createFakeVenue({
      price: () => ({ error: "No orderbook exists for the requested token id" }),
    });
    const reader = new ClobMarketQuoteReader({ client: venue.client, logger: new RecordingLogger() });
    assert.equal(await reader.quote(TOKEN_ID), null);
  });

  it("throws a NetworkError when the client reports an HTTP failure", async () => {
    const venue = createFakeVenue({ price: () => ({ error: "Internal Server Error", status: 500 }) });
    const reader = new ClobMarketQuoteReader({ client: venue.client, logger: new RecordingLogger() });

    await assert.rejects(
      reader.quote(TOKEN_ID),
      (err: unknown) =>
        err instanceof NetworkError &&
        err.message === "Price lookup failed: Internal Server Error" &&
        err.endpoint === "/price",
    );
  });

  it("propagates thrown client errors", async () => {
    const venue = createFakeVenue({
      price: () => {
        throw new Error("socket hang up");
      },
    });
    const reader = new ClobMarketQuoteReader({ client: venue.client, logger: new RecordingLogger() });
    await assert.rejects(reader.quote(TOKEN_ID), { message: "socket hang up" });
  });
});
