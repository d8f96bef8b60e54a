/**
 * Consecutive-failure counter (Secret Hitler's election tracker). Moves by
 * exactly one per failure and back to zero on reset.
 */
export class FailureTracker {
  private count = 0;

  constructor(readonly threshold: number) {}

  get value(): number {
    return this.count;
  }

  /** True exactly when this failure reaches the threshold. */
  recordFailure(): boolean {
    this.count++;
    return this.count === this.threshold;
  }

  reset(): void {
    this.count = 0;
  }
}
