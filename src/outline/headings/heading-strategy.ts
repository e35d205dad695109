import { HeadingStrategyName, HeadingStrategyStats } from '../types';

export const HEADING_STRATEGIES = 'HEADING_STRATEGIES';

/**
 * A single-line heading classifier
 */
export interface HeadingStrategy {
  readonly name: HeadingStrategyName;

  /**
   * Confidence in [0, 1] that the trimmed line is a heading; 0 means no match
   */
  getConfidence(line: string): number;

  getStats(): HeadingStrategyStats;
  resetStats(): void;
}

/**
 * Keeps match/check counters for diagnostics. Subclasses supply the
 * predicate and the score; counters never influence results.
 */
export abstract class BaseHeadingStrategy implements HeadingStrategy {
  private matchesFound = 0;
  private totalChecks = 0;

  constructor(public readonly name: HeadingStrategyName) {}

  getConfidence(line: string): number {
    const trimmed = line.trim();
    this.totalChecks++;

    if (trimmed.length === 0 || !this.isMatch(trimmed)) {
      return 0;
    }

    this.matchesFound++;
    return Math.min(1, this.score(trimmed));
  }

  getStats(): HeadingStrategyStats {
    return {
      matchesFound: this.matchesFound,
      totalChecks: this.totalChecks,
    };
  }

  resetStats(): void {
    this.matchesFound = 0;
    this.totalChecks = 0;
  }

  protected abstract isMatch(line: string): boolean;

  protected abstract score(line: string): number;
}
