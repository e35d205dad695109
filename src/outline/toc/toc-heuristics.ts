/**
 * TOC Heuristics
 *
 * Keyword and shape checks tuned to technical specifications. They sit
 * behind an interface so another document family can swap them out.
 */

import { Inject, Injectable } from '@nestjs/common';
import { OUTLINE_CONFIG, OutlineConfig } from '../../config/outline.config';

export const TOC_HEURISTICS = 'TOC_HEURISTICS';

export interface TocHeuristics {
  /** Register dumps, bit fields, byte tables and the like */
  looksLikeTechnicalData(title: string): boolean;

  /** Keyword hit or a capitalized multi-word heading shape */
  looksLikeGenuineEntry(title: string): boolean;

  /** Confidence in [0, 1] that an unmatched line is a TOC entry */
  scoreCandidateLine(line: string): number;
}

const TECHNICAL_DATA_PATTERNS: readonly RegExp[] = [
  /^\d+\s+\d+\s+\d+/, // bare number runs
  /^[01\s]+$/, // binary strings
  /\bhex\s+data\b/,
  /\b0x[0-9a-f]+\b/,
  /\bbits?\s*=\s*\d/,
  /\bbytes?\s+\d/,
  /\bk-code\b/,
  /\bdata\s+object\s+\d/,
];

@Injectable()
export class DefaultTocHeuristics implements TocHeuristics {
  private readonly genuineKeywordRegex: RegExp;
  private readonly scoringKeywordRegex: RegExp;

  constructor(@Inject(OUTLINE_CONFIG) config: OutlineConfig) {
    this.genuineKeywordRegex = keywordRegex(config.genuineKeywords);
    this.scoringKeywordRegex = keywordRegex(config.scoringKeywords);
  }

  looksLikeTechnicalData(title: string): boolean {
    const normalized = title.toLowerCase().trim();

    if (TECHNICAL_DATA_PATTERNS.some((pattern) => pattern.test(normalized))) {
      return true;
    }

    // Short fragments carrying digits are almost always table cells
    return normalized.length < 10 && /\d/.test(normalized);
  }

  looksLikeGenuineEntry(title: string): boolean {
    const trimmed = title.trim();
    if (trimmed.length < 5 || trimmed.length > 100) {
      return false;
    }

    if (this.genuineKeywordRegex.test(trimmed)) {
      return true;
    }

    const words = trimmed.split(/\s+/);
    const substantialWords = words.filter((word) => word.length > 2);

    return (
      words.length >= 2 &&
      /^[A-Z]/.test(trimmed) &&
      trimmed !== trimmed.toUpperCase() &&
      substantialWords.length >= 2
    );
  }

  scoreCandidateLine(line: string): number {
    let score = 0;

    if (this.scoringKeywordRegex.test(line)) {
      score += 0.3;
    }

    // Dot leaders or column gaps
    if (line.includes('..') || line.includes('  ')) {
      score += 0.2;
    }

    const words = line.split(/\s+/).filter((word) => word.length > 0);
    if (words.length >= 2 && words.length <= 15) {
      score += 0.2;
    }

    if (words.some((word) => /^[A-Z]/.test(word))) {
      score += 0.1;
    }

    return Math.min(1, Math.round(score * 100) / 100);
  }
}

function keywordRegex(keywords: readonly string[]): RegExp {
  if (keywords.length === 0) {
    return /(?!)/;
  }
  const escaped = keywords.map((keyword) =>
    keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'),
  );
  return new RegExp(`\\b(?:${escaped.join('|')})`, 'i');
}
