/**
 * Section Extraction Orchestrator
 *
 * idle → validating → extracting_toc_sections → mapping_coverage →
 * extracting_standalone_sections → sorting → done | failed
 *
 * Produces a Section list that partitions the document: every non-empty
 * page belongs either to exactly one TOC-derived range or to its own
 * standalone section. Per-entry and per-page failures are logged and
 * skipped; only whole-input violations and the deadline abort the call.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { OUTLINE_CONFIG, OutlineConfig } from '../config/outline.config';
import { Deadline } from '../common/deadline';
import {
  ProcessorStats,
  StatusTracker,
  Statusful,
  Validatable,
} from '../common/status/status-tracker';
import {
  isPageRecord,
  isTocEntry,
  PageRange,
  PageSection,
  Section,
  SectionExtractionResult,
  SectionExtractionStats,
  TocEntry,
  TocExtractionStats,
  TocSection,
} from './types';
import {
  EntryProcessingError,
  InputValidationError,
  PageProcessingError,
} from './errors/outline-errors';
import { PageIndex } from './pages/page-index';
import { TocEntryExtractor } from './toc/toc-entry.extractor';
import {
  dedupeTocEntries,
  deriveLevel,
  deriveParentId,
} from './toc/toc-entry.factory';
import { HeadingDetector } from './headings/heading.detector';
import { CoverageMapper } from './coverage/coverage.mapper';
import { SectionAssembler } from './sections/section.assembler';

export type OrchestratorStatus =
  | 'idle'
  | 'validating'
  | 'extracting_toc_sections'
  | 'mapping_coverage'
  | 'extracting_standalone_sections'
  | 'sorting'
  | 'done'
  | 'failed';

export interface SectionExtractionOptions {
  /** Pre-computed entries; TOC extraction is skipped when given */
  tocEntries?: readonly unknown[];
  docTitle?: string;
  deadline?: Deadline;
}

interface PreparedEntries {
  entries: TocEntry[];
  tocStats: TocExtractionStats | null;
}

@Injectable()
export class SectionExtractionOrchestrator
  implements Statusful<OrchestratorStatus>, Validatable<readonly unknown[]>
{
  private readonly logger = new Logger(SectionExtractionOrchestrator.name);
  private readonly tracker = new StatusTracker<OrchestratorStatus>(
    SectionExtractionOrchestrator.name,
    'idle',
  );

  constructor(
    @Inject(OUTLINE_CONFIG) private readonly config: OutlineConfig,
    private readonly tocExtractor: TocEntryExtractor,
    private readonly headingDetector: HeadingDetector,
    private readonly coverageMapper: CoverageMapper,
    private readonly assembler: SectionAssembler,
  ) {}

  get status(): OrchestratorStatus {
    return this.tracker.status;
  }

  get processedCount(): number {
    return this.tracker.processedCount;
  }

  get errorCount(): number {
    return this.tracker.errorCount;
  }

  getStats(): ProcessorStats<OrchestratorStatus> {
    return this.tracker.getStats();
  }

  /**
   * Shape check on a sample of leading records. Malformed records past
   * the sample are skipped later, not rejected.
   */
  validateInput(input: unknown): input is readonly unknown[] {
    if (!Array.isArray(input)) {
      return false;
    }
    if (!this.config.validationEnabled) {
      return true;
    }
    return input.slice(0, this.config.validationSampleSize).every(isPageRecord);
  }

  /**
   * Extract a page-partitioning Section list
   *
   * @param pages - Page records, normally `{ page, text }[]`
   * @param options - Pre-computed TOC entries, document title, deadline
   * @throws InputValidationError when the input is not a page list
   * @throws ExtractionTimeoutError when the deadline passes
   */
  extract(
    pages: unknown,
    options: SectionExtractionOptions = {},
  ): SectionExtractionResult {
    const startTime = Date.now();
    const deadline = options.deadline ?? Deadline.unlimited();
    const docTitle = options.docTitle ?? this.config.docTitle;
    this.headingDetector.resetStats();

    try {
      this.tracker.transition('validating');
      if (!this.validateInput(pages)) {
        throw new InputValidationError();
      }

      const pageIndex = new PageIndex(pages, this.config.maxPage);
      const stats = this.createStats(pageIndex);
      if (stats.outOfRangeRecords > 0) {
        this.logger.warn(
          `Dropped ${stats.outOfRangeRecords} page records numbered above ${this.config.maxPage}`,
        );
      }

      const { entries, tocStats } = this.prepareTocEntries(
        pageIndex,
        options.tocEntries,
        stats,
        deadline,
      );

      // TOC-derived sections over precomputed ranges
      this.tracker.transition('extracting_toc_sections');
      const { sections: tocSections, ranges } = this.buildTocSections(
        pageIndex,
        entries,
        docTitle,
        stats,
        deadline,
      );

      // Pages owned by the sections actually built
      this.tracker.transition('mapping_coverage');
      const covered = this.coverageMapper.unionOf(ranges);
      stats.coveredPages = covered.size;

      this.tracker.transition('extracting_standalone_sections');
      const pageSections = this.buildPageSections(
        pageIndex,
        covered,
        docTitle,
        stats,
        deadline,
      );

      this.tracker.transition('sorting');
      const sections = sortSections([...tocSections, ...pageSections]);

      stats.headingStrategies = this.headingDetector.getStrategyStats();
      stats.processingTime = Date.now() - startTime;
      this.tracker.transition('done');
      this.tracker.incrementProcessed();

      this.logger.log(
        `Section extraction complete: ${sections.length} sections ` +
          `(toc: ${stats.tocSections}, standalone: ${stats.standaloneSections}, ` +
          `failed entries: ${stats.failedEntries}, failed pages: ${stats.failedPages}) ` +
          `in ${stats.processingTime}ms`,
      );

      return { sections, tocEntries: entries, tocStats, stats };
    } catch (error) {
      this.tracker.transition('failed');
      this.tracker.incrementErrors();

      this.logger.error(
        `Section extraction failed after ${Date.now() - startTime}ms`,
        error instanceof Error ? error.stack : String(error),
      );

      throw error;
    }
  }

  private createStats(pageIndex: PageIndex): SectionExtractionStats {
    return {
      totalPages: pageIndex.totalPages,
      malformedRecords: pageIndex.skippedRecords,
      outOfRangeRecords: pageIndex.outOfRangeRecords,
      tocEntriesReceived: 0,
      invalidTocEntries: 0,
      outOfRangeTocEntries: 0,
      duplicateTocEntries: 0,
      tocSections: 0,
      failedEntries: 0,
      coveredPages: 0,
      standaloneSections: 0,
      emptyPages: 0,
      failedPages: 0,
      headingStrategies: {},
      processingTime: 0,
    };
  }

  /**
   * Validate supplied entries or extract them, then bound to the document
   * and collapse duplicates
   */
  private prepareTocEntries(
    pageIndex: PageIndex,
    rawEntries: readonly unknown[] | undefined,
    stats: SectionExtractionStats,
    deadline: Deadline,
  ): PreparedEntries {
    let candidates: TocEntry[];
    let tocStats: TocExtractionStats | null = null;

    if (rawEntries === undefined) {
      const extraction = this.tocExtractor.extractFromIndex(
        pageIndex,
        deadline,
      );
      candidates = extraction.entries;
      tocStats = extraction.stats;
    } else {
      candidates = [];
      rawEntries.forEach((entry, index) => {
        if (isTocEntry(entry)) {
          // Hierarchy always follows the section id
          candidates.push({
            ...entry,
            level: deriveLevel(entry.sectionId),
            parentId: deriveParentId(entry.sectionId),
          });
          return;
        }
        const error = new EntryProcessingError(
          `Skipping malformed TOC entry at index ${index}`,
          index,
        );
        this.logger.warn(`[${error.code}] ${error.message}`);
        stats.invalidTocEntries++;
      });
    }
    stats.tocEntriesReceived = rawEntries?.length ?? candidates.length;

    const inRange = candidates.filter(
      (entry) => entry.page >= 1 && entry.page <= pageIndex.totalPages,
    );
    stats.outOfRangeTocEntries = candidates.length - inRange.length;
    if (stats.outOfRangeTocEntries > 0) {
      this.logger.warn(
        `Dropped ${stats.outOfRangeTocEntries} TOC entries outside pages 1-${pageIndex.totalPages}`,
      );
    }

    const { entries, duplicates } = dedupeTocEntries(inRange);
    stats.duplicateTocEntries = duplicates;

    return { entries, tocStats };
  }

  private buildTocSections(
    pageIndex: PageIndex,
    entries: TocEntry[],
    docTitle: string,
    stats: SectionExtractionStats,
    deadline: Deadline,
  ): { sections: TocSection[]; ranges: PageRange[] } {
    const sections: TocSection[] = [];
    const builtRanges: PageRange[] = [];
    const ranges = this.coverageMapper.computeRanges(
      entries,
      pageIndex.totalPages,
    );

    entries.forEach((entry, index) => {
      deadline.check();
      const range = ranges[index];

      try {
        const content = pageIndex.getContentRange(range.start, range.end);
        sections.push(
          this.assembler.buildFromTocEntry(entry, content, range, docTitle),
        );
        builtRanges.push(range);
      } catch (error) {
        const failure = new EntryProcessingError(
          `Failed to build section for TOC entry ${index} ("${entry.title}"): ` +
            (error instanceof Error ? error.message : String(error)),
          index,
          error instanceof Error ? error : undefined,
        );
        this.logger.error(failure.message, failure.originalError?.stack);
        stats.failedEntries++;
      }
    });

    stats.tocSections = sections.length;
    return { sections, ranges: builtRanges };
  }

  private buildPageSections(
    pageIndex: PageIndex,
    covered: ReadonlySet<number>,
    docTitle: string,
    stats: SectionExtractionStats,
    deadline: Deadline,
  ): PageSection[] {
    const sections: PageSection[] = [];

    for (let page = 1; page <= pageIndex.totalPages; page++) {
      deadline.check();
      if (covered.has(page)) {
        continue;
      }

      const content = pageIndex.getPageContent(page).trim();
      if (content.length === 0) {
        stats.emptyPages++;
        continue;
      }

      try {
        const heading = this.findPageHeading(page, content);
        sections.push(
          this.assembler.buildPageSection(page, content, docTitle, heading),
        );
      } catch (error) {
        const failure = new PageProcessingError(
          `Failed to build standalone section for page ${page}: ` +
            (error instanceof Error ? error.message : String(error)),
          page,
          error instanceof Error ? error : undefined,
        );
        this.logger.error(failure.message, failure.originalError?.stack);
        stats.failedPages++;
      }
    }

    stats.standaloneSections = sections.length;
    return sections;
  }

  /**
   * First detected heading among the leading lines, else the first short
   * line, else a page label
   */
  private findPageHeading(page: number, content: string): string {
    const leadingLines = content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .slice(0, this.config.headingScanDepth);

    for (const line of leadingLines) {
      const heading = this.headingDetector.detectHeading(line);
      if (heading !== null) {
        return heading;
      }
    }

    return (
      leadingLines.find((line) => line.length <= this.config.maxHeadingLength) ??
      `Content from Page ${page}`
    );
  }
}

/**
 * Stable by (page, sectionId)
 */
function sortSections(sections: Section[]): Section[] {
  return [...sections].sort((a, b) => {
    if (a.page !== b.page) {
      return a.page - b.page;
    }
    if (a.sectionId === b.sectionId) {
      return 0;
    }
    return a.sectionId < b.sectionId ? -1 : 1;
  });
}
