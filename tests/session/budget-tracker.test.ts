import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { BudgetTracker } from "../../src/session/budget-tracker";
import { BudgetExceededError } from "../../src/errors/app.errors";

describe("BudgetTracker", () => {
  it("starts empty", () => {
    const budget = new BudgetTracker(20);
    assert.equal(budget.spent(), 0);
    assert.equal(budget.remaining(), 20);
    assert.equal(budget.spendCeiling, 20);
  });

  it("accumulates recorded spend up to the ceiling", () => {
    const budget = new BudgetTracker(20);
    for (let i = 0; i < 4; i += 1) budget.record(5);
    assert.equal(budget.spent(), 20);
    assert.equal(budget.remaining(), 0);
    assert.equal(budget.canAfford(5), false);
    assert.equal(budget.canAfford(0), true);
  });

  it("refuses to cross the ceiling and keeps the total", () => {
    const budget = new BudgetTracker(12);
    budget.record(5);
    budget.record(5);

    assert.throws(
      () => budget.record(5),
      (err: unknown) =>
        err instanceof BudgetExceededError &&
        err.requested === 5 &&
        err.remaining === 2 &&
        err.message === "Recording $5.00 would exceed the session ceiling of $12.00",
    );
    assert.equal(budget.spent(), 10);
  });

  it("rejects negative or non-finite amounts", () => {
    const budget = new BudgetTracker(20);
    assert.throws(() => budget.record(-1), RangeError);
    assert.throws(() => budget.record(Number.NaN), RangeError);
    assert.equal(budget.spent(), 0);
  });

  it("rejects an invalid ceiling", () => {
    assert.throws(() => new BudgetTracker(-5), RangeError);
    assert.throws(() => new BudgetTracker(Number.POSITIVE_INFINITY), RangeError);
  });
});
