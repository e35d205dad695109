/**
 * Capability interfaces shared by outline components.
 *
 * Components compose a StatusTracker instead of inheriting status,
 * validation and counters from a common base class.
 */

export interface ProcessorStats<S extends string> {
  name: string;
  status: S;
  processedCount: number;
  errorCount: number;
}

export interface Statusful<S extends string> {
  readonly status: S;
  readonly processedCount: number;
  readonly errorCount: number;
  getStats(): ProcessorStats<S>;
}

export interface Validatable<T> {
  validateInput(input: unknown): input is T;
}

export class StatusTracker<S extends string> implements Statusful<S> {
  private currentStatus: S;
  private processed = 0;
  private errors = 0;

  constructor(
    private readonly name: string,
    initialStatus: S,
  ) {
    this.currentStatus = initialStatus;
  }

  get status(): S {
    return this.currentStatus;
  }

  get processedCount(): number {
    return this.processed;
  }

  get errorCount(): number {
    return this.errors;
  }

  transition(status: S): void {
    this.currentStatus = status;
  }

  incrementProcessed(): void {
    this.processed++;
  }

  incrementErrors(): void {
    this.errors++;
  }

  getStats(): ProcessorStats<S> {
    return {
      name: this.name,
      status: this.currentStatus,
      processedCount: this.processed,
      errorCount: this.errors,
    };
  }
}
