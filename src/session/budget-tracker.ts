import { BudgetExceededError } from "../errors/app.errors";

/**
 * Running spend for one session against a fixed ceiling (USDC).
 */
export class BudgetTracker {
  private readonly ceiling: number;
  private total = 0;

  constructor(spendCeilingUsd: number) {
    if (!Number.isFinite(spendCeilingUsd) || spendCeilingUsd < 0) {
      throw new RangeError(`Spend ceiling must be a non-negative number (got ${spendCeilingUsd})`);
    }
    this.ceiling = spendCeilingUsd;
  }

  get spendCeiling(): number {
    return this.ceiling;
  }

  spent(): number {
    return this.total;
  }

  remaining(): number {
    return this.ceiling - this.total;
  }

  canAfford(amount: number): boolean {
    return this.remaining() >= amount;
  }

  /**
   * Add an executed order's size to the running total. The total is left
   * untouched when the amount is invalid or would cross the ceiling.
   */
  record(amount: number): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new RangeError(`Spend amount must be a non-negative number (got ${amount})`);
    }
    if (!this.canAfford(amount)) {
      throw new BudgetExceededError(
        `Recording $${amount.toFixed(2)} would exceed the session ceiling of $${this.ceiling.toFixed(2)}`,
        amount,
        this.remaining(),
      );
    }
    this.total += amount;
  }
}
