import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { LIVE_TRADING_ACK, isLiveTradingEnabled } from "../../src/utils/live-trading.util";

describe("isLiveTradingEnabled", () => {
  it("requires the exact acknowledgement", () => {
    assert.equal(isLiveTradingEnabled({ LIVE_TRADING: LIVE_TRADING_ACK }), true);
    assert.equal(isLiveTradingEnabled({ live_trading: "I_UNDERSTAND_THE_RISKS" }), true);
  });

  it("stays disabled otherwise", () => {
    assert.equal(isLiveTradingEnabled({}), false);
    assert.equal(isLiveTradingEnabled({ LIVE_TRADING: "true" }), false);
    assert.equal(isLiveTradingEnabled({ LIVE_TRADING: "i_understand_the_risks" }), false);
  });
});
