/**
 * Heading Detector
 *
 * Runs every registered strategy over a line and keeps the one with the
 * strictly highest positive confidence. Ties go to the strategy registered
 * first, so registration order is part of the contract.
 */

import { Inject, Injectable, Optional } from '@nestjs/common';
import { HeadingMatch, HeadingStrategyStats } from '../types';
import { HEADING_STRATEGIES, HeadingStrategy } from './heading-strategy';
import { NumberedHeadingStrategy } from './numbered-heading.strategy';
import { AllCapsHeadingStrategy } from './all-caps-heading.strategy';
import { MixedCapHeadingStrategy } from './mixed-cap-heading.strategy';

@Injectable()
export class HeadingDetector {
  private readonly strategies: HeadingStrategy[];

  constructor(
    @Optional()
    @Inject(HEADING_STRATEGIES)
    strategies?: HeadingStrategy[],
  ) {
    this.strategies =
      strategies && strategies.length > 0
        ? [...strategies]
        : HeadingDetector.createDefaultStrategies();
  }

  static createDefaultStrategies(): HeadingStrategy[] {
    return [
      new NumberedHeadingStrategy(),
      new AllCapsHeadingStrategy(),
      new MixedCapHeadingStrategy(),
    ];
  }

  addStrategy(strategy: HeadingStrategy): void {
    this.strategies.push(strategy);
  }

  getStrategies(): readonly HeadingStrategy[] {
    return [...this.strategies];
  }

  /**
   * Return the whitespace-trimmed line if any strategy accepts it
   */
  detectHeading(line: string): string | null {
    return this.detectBest(line)?.heading ?? null;
  }

  /**
   * Best match with the winning strategy and its confidence
   */
  detectBest(line: string): HeadingMatch | null {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      return null;
    }

    let best: HeadingStrategy | null = null;
    let highestConfidence = 0;

    for (const strategy of this.strategies) {
      const confidence = strategy.getConfidence(trimmed);
      if (confidence > highestConfidence) {
        highestConfidence = confidence;
        best = strategy;
      }
    }

    if (best === null) {
      return null;
    }

    return {
      heading: trimmed,
      strategy: best.name,
      confidence: highestConfidence,
    };
  }

  getStrategyStats(): Record<string, HeadingStrategyStats> {
    const stats: Record<string, HeadingStrategyStats> = {};
    for (const strategy of this.strategies) {
      stats[strategy.name] = strategy.getStats();
    }
    return stats;
  }

  resetStats(): void {
    for (const strategy of this.strategies) {
      strategy.resetStats();
    }
  }
}
