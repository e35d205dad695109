/**
 * TOC Entry Extractor
 *
 * Turns page records into validated, de-duplicated TOC entries:
 *   locate TOC → primary patterns + quality gate → candidate scoring →
 *   enhanced recovery → confidence fallback → merge, sort, dedupe, bound
 *
 * Malformed page records are skipped and counted. A document without a
 * TOC marker gets a best-effort pass over every line.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { OUTLINE_CONFIG, OutlineConfig } from '../../config/outline.config';
import { Deadline } from '../../common/deadline';
import { PageIndex } from '../pages/page-index';
import { TocEntry, TocExtractionResult, TocExtractionStats } from '../types';
import {
  ENHANCED_TOC_PATTERNS,
  PRIMARY_TOC_PATTERNS,
  TocLineMatch,
  matchFirstAcceptedTocPattern,
  matchFirstTocPattern,
} from './toc-patterns';
import { TOC_HEURISTICS, TocHeuristics } from './toc-heuristics';
import {
  cleanTitle,
  createTocEntry,
  dedupeTocEntries,
} from './toc-entry.factory';

interface DocumentLine {
  page: number;
  text: string; // trimmed
}

interface CandidateLine {
  line: string;
  title: string;
  page: number;
  confidence: number;
}

const FALLBACK_REJECTED_PREFIXES = ['error', 'data object', 'byte', 'bit'];

@Injectable()
export class TocEntryExtractor {
  private readonly logger = new Logger(TocEntryExtractor.name);

  constructor(
    @Inject(OUTLINE_CONFIG) private readonly config: OutlineConfig,
    @Inject(TOC_HEURISTICS) private readonly heuristics: TocHeuristics,
  ) {}

  /**
   * Extract TOC entries from raw page records
   *
   * @param pages - Page records (malformed ones are skipped)
   * @param deadline - Optional wall-clock budget
   * @returns Entries sorted by (page, title) plus per-call statistics
   */
  extract(
    pages: readonly unknown[],
    deadline: Deadline = Deadline.unlimited(),
  ): TocExtractionResult {
    const pageIndex = new PageIndex(pages, this.config.maxPage);
    return this.extractFromIndex(pageIndex, deadline);
  }

  extractFromIndex(
    pageIndex: PageIndex,
    deadline: Deadline = Deadline.unlimited(),
  ): TocExtractionResult {
    const startTime = Date.now();
    const stats = this.createStats();
    stats.malformedRecords = pageIndex.skippedRecords;
    stats.outOfRangeRecords = pageIndex.outOfRangeRecords;

    const allLines = this.flattenPages(pageIndex);
    const startIndex = this.findTocStart(allLines);
    stats.tocMarkerFound = startIndex > 0;
    stats.tocStartIndex = startIndex;

    if (!stats.tocMarkerFound) {
      this.logger.warn(
        'No TOC marker found, scanning the whole document for entries',
      );
    }

    const lines = allLines.slice(startIndex);
    stats.linesScanned = lines.length;

    // Step 1: primary patterns behind the quality gate
    const primaryEntries: TocEntry[] = [];
    const candidates: CandidateLine[] = [];

    for (const line of lines) {
      deadline.check();

      const entry = this.extractPrimaryEntry(line.text, stats);
      if (entry) {
        primaryEntries.push(entry);
        continue;
      }

      const candidate = this.analyzeCandidateLine(line);
      if (candidate) {
        candidates.push(candidate);
      }
    }
    stats.primaryEntries = primaryEntries.length;
    stats.potentialEntries = candidates.length;

    const claimedLines = new Set(primaryEntries.map((e) => e.fullPath));

    // Step 2: broader patterns for lines nothing has claimed yet
    const enhancedEntries = this.applyEnhancedPatterns(
      lines,
      primaryEntries,
      claimedLines,
      deadline,
    );
    stats.enhancedEntries = enhancedEntries.length;

    // Step 3: high-confidence candidates without a section id
    const fallbackEntries = this.applyFallbackExtraction(
      candidates,
      claimedLines,
    );
    stats.fallbackEntries = fallbackEntries.length;

    // Step 4: merge and clean
    const entries = this.validateAndCleanEntries(
      [...primaryEntries, ...enhancedEntries, ...fallbackEntries],
      stats,
    );

    this.logger.log(
      `TOC extraction complete: ${entries.length} entries ` +
        `(primary: ${stats.primaryEntries}, enhanced: ${stats.enhancedEntries}, ` +
        `fallback: ${stats.fallbackEntries}, duplicates: ${stats.duplicatesRemoved}) ` +
        `in ${Date.now() - startTime}ms`,
    );

    return { entries, stats };
  }

  private createStats(): TocExtractionStats {
    return {
      linesScanned: 0,
      tocStartIndex: 0,
      tocMarkerFound: false,
      malformedRecords: 0,
      outOfRangeRecords: 0,
      primaryEntries: 0,
      rejectedByQualityGate: 0,
      potentialEntries: 0,
      enhancedEntries: 0,
      fallbackEntries: 0,
      duplicatesRemoved: 0,
      outOfRangeRemoved: 0,
      patternUsage: {},
    };
  }

  private flattenPages(pageIndex: PageIndex): DocumentLine[] {
    const lines: DocumentLine[] = [];

    for (const record of pageIndex.getRecords()) {
      for (const rawLine of record.text.split(/\r?\n/)) {
        const text = rawLine.trim();
        if (text.length > 0) {
          lines.push({ page: record.page, text });
        }
      }
    }

    return lines;
  }

  /**
   * Index of the first line after the TOC marker, or 0 when absent
   */
  private findTocStart(lines: DocumentLine[]): number {
    const markers = this.config.tocMarkers.map(
      (marker) =>
        new RegExp(
          `\\b${marker.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\b`,
          'i',
        ),
    );

    const index = lines.findIndex((line) =>
      markers.some((marker) => marker.test(line.text)),
    );

    return index === -1 ? 0 : index + 1;
  }

  private extractPrimaryEntry(
    line: string,
    stats: TocExtractionStats,
  ): TocEntry | null {
    if (line.length > this.config.maxLineLength) {
      return null;
    }

    const match = matchFirstTocPattern(PRIMARY_TOC_PATTERNS, line);
    if (!match) {
      return null;
    }

    stats.patternUsage[match.pattern] =
      (stats.patternUsage[match.pattern] ?? 0) + 1;

    const title = cleanTitle(match.rawTitle, this.config.maxTitleLength);
    if (!this.passesQualityGate(title, match.page)) {
      stats.rejectedByQualityGate++;
      return null;
    }

    return createTocEntry({
      sectionId: match.sectionId,
      title,
      page: match.page,
      fullPath: line,
    });
  }

  /**
   * Quality gate for primary matches
   */
  private passesQualityGate(title: string, page: number): boolean {
    const { minTitleLength, maxTitleLength, maxTitlePeriods, maxDigitRatio } =
      this.config;

    if (title.length < minTitleLength || title.length > maxTitleLength) {
      return false;
    }

    if (!this.isPlausiblePage(page)) {
      return false;
    }

    const periods = title.split('.').length - 1;
    if (periods > maxTitlePeriods) {
      return false;
    }

    const digits = (title.match(/\d/g) ?? []).length;
    if (digits >= title.length * maxDigitRatio) {
      return false;
    }

    return !this.heuristics.looksLikeTechnicalData(title);
  }

  private isPlausiblePage(page: number): boolean {
    return (
      Number.isInteger(page) &&
      page >= this.config.minPage &&
      page <= this.config.maxPage
    );
  }

  /**
   * Score a line ending in a page-like integer after a multi-word title
   */
  private analyzeCandidateLine(line: DocumentLine): CandidateLine | null {
    const text = line.text;
    if (text.length < 5 || text.length > 200) {
      return null;
    }

    const words = text.split(/\s+/);
    const lastWord = words[words.length - 1];
    if (!/^\d{1,4}$/.test(lastWord)) {
      return null;
    }

    const page = Number.parseInt(lastWord, 10);
    if (page < 1) {
      return null;
    }

    const titleWords = words.slice(0, -1);
    const title = titleWords.join(' ').trim();
    if (titleWords.length < 2 || /^[\d\s.]+$/.test(title)) {
      return null;
    }

    return {
      line: text,
      title,
      page,
      confidence: this.heuristics.scoreCandidateLine(text),
    };
  }

  private applyEnhancedPatterns(
    lines: DocumentLine[],
    primaryEntries: TocEntry[],
    claimedLines: Set<string>,
    deadline: Deadline,
  ): TocEntry[] {
    const enhanced: TocEntry[] = [];
    const existingTitles = new Set(
      primaryEntries.map((entry) => entry.title.toLowerCase()),
    );

    for (const line of lines) {
      deadline.check();

      if (
        claimedLines.has(line.text) ||
        line.text.length > this.config.maxLineLength
      ) {
        continue;
      }

      const entry = matchFirstAcceptedTocPattern(
        ENHANCED_TOC_PATTERNS,
        line.text,
        (match) => this.acceptEnhancedMatch(match, line.text, existingTitles),
      );

      if (entry) {
        enhanced.push(entry);
        claimedLines.add(line.text);
        existingTitles.add(entry.title.toLowerCase());
      }
    }

    return enhanced;
  }

  private acceptEnhancedMatch(
    match: TocLineMatch,
    line: string,
    existingTitles: Set<string>,
  ): TocEntry | null {
    const title = cleanTitle(match.rawTitle, this.config.maxTitleLength);
    const lowerTitle = title.toLowerCase();

    const accepted =
      this.isPlausiblePage(match.page) &&
      title.length >= this.config.minTitleLength &&
      !existingTitles.has(lowerTitle) &&
      !lowerTitle.startsWith('page ') &&
      !this.heuristics.looksLikeTechnicalData(title) &&
      this.heuristics.looksLikeGenuineEntry(title);

    if (!accepted) {
      return null;
    }

    return createTocEntry(
      { sectionId: match.sectionId, title, page: match.page, fullPath: line },
      'enhanced_extraction',
    );
  }

  private applyFallbackExtraction(
    candidates: CandidateLine[],
    claimedLines: Set<string>,
  ): TocEntry[] {
    const fallback: TocEntry[] = [];

    for (const candidate of candidates) {
      if (claimedLines.has(candidate.line)) {
        continue;
      }

      const title = candidate.title;
      const lowerTitle = title.toLowerCase();

      const accepted =
        candidate.confidence >= this.config.fallbackConfidence &&
        this.isPlausiblePage(candidate.page) &&
        title.length >= this.config.fallbackMinTitleLength &&
        title.split(/\s+/).length >= 2 &&
        !FALLBACK_REJECTED_PREFIXES.some((prefix) =>
          lowerTitle.startsWith(prefix),
        ) &&
        !this.heuristics.looksLikeTechnicalData(title) &&
        this.heuristics.looksLikeGenuineEntry(title);

      if (!accepted) {
        continue;
      }

      fallback.push(
        createTocEntry(
          {
            sectionId: null,
            title,
            page: candidate.page,
            fullPath: candidate.line,
          },
          'fallback_extraction',
        ),
      );
      claimedLines.add(candidate.line);
    }

    return fallback;
  }

  private validateAndCleanEntries(
    entries: TocEntry[],
    stats: TocExtractionStats,
  ): TocEntry[] {
    const { entries: unique, duplicates } = dedupeTocEntries(entries);
    stats.duplicatesRemoved = duplicates;

    const bounded = unique.filter((entry) => this.isPlausiblePage(entry.page));
    stats.outOfRangeRemoved = unique.length - bounded.length;

    return bounded;
  }
}
