/**
 * Outline Error Classes
 *
 * Extraction is deterministic, so no outline error is retryable:
 * running it again on the same input yields the same failure.
 */

/**
 * Base error for all outline errors
 */
export class OutlineError extends Error {
  public readonly retryable = false;

  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'OutlineError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Whole-input errors (raised to the caller)
 */

export class InputValidationError extends OutlineError {
  constructor(message: string = 'Pages must be a list of {page, text} records') {
    super(message, 'OUTLINE_INVALID_INPUT');
    this.name = 'InputValidationError';
  }
}

export class ExtractionTimeoutError extends OutlineError {
  constructor(
    public readonly elapsedMs: number,
    public readonly budgetMs: number,
  ) {
    super(
      `Extraction exceeded its ${budgetMs}ms budget after ${elapsedMs}ms`,
      'OUTLINE_TIMEOUT',
    );
    this.name = 'ExtractionTimeoutError';
  }
}

/**
 * Per-item errors (recovered locally, item skipped)
 */

export class EntryProcessingError extends OutlineError {
  constructor(
    message: string,
    public readonly entryIndex: number,
    public readonly originalError?: Error,
  ) {
    super(message, 'OUTLINE_ENTRY_FAILED');
    this.name = 'EntryProcessingError';
  }
}

export class PageProcessingError extends OutlineError {
  constructor(
    message: string,
    public readonly pageNumber: number,
    public readonly originalError?: Error,
  ) {
    super(message, 'OUTLINE_PAGE_FAILED');
    this.name = 'PageProcessingError';
  }
}
