import { ExtractionTimeoutError } from '../outline/errors/outline-errors';

/**
 * Cooperative wall-clock budget checked at loop boundaries.
 * Extraction is synchronous, so this is the only way to stop it early.
 */
export class Deadline {
  private readonly startedAt: number;

  constructor(
    private readonly budgetMs: number,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAt = now();
  }

  static unlimited(): Deadline {
    return new Deadline(Number.POSITIVE_INFINITY);
  }

  get elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  check(): void {
    const elapsed = this.elapsedMs;
    if (elapsed > this.budgetMs) {
      throw new ExtractionTimeoutError(elapsed, this.budgetMs);
    }
  }
}
