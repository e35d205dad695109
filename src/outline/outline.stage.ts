/**
 * Outline Stage
 *
 * One call from page records to a complete document outline:
 * metadata → TOC entries → partitioned sections → coverage metrics.
 *
 * The whole call runs under one wall-clock budget
 * (OUTLINE_EXTRACTION_TIMEOUT_MS).
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { OUTLINE_CONFIG, OutlineConfig } from '../config/outline.config';
import { Deadline } from '../common/deadline';
import { DocumentOutline, TocExtractionResult } from './types';
import { InputValidationError } from './errors/outline-errors';
import { PageIndex } from './pages/page-index';
import { SectionExtractionOrchestrator } from './section-extraction.orchestrator';
import { TocEntryExtractor } from './toc/toc-entry.extractor';
import { DocumentMetadataParser } from './metadata/document-metadata.parser';
import { CoverageCalculator } from './coverage/coverage.calculator';
import { CoverageMapper } from './coverage/coverage.mapper';

export interface OutlineStageInput {
  pages: unknown;
  tocEntries?: readonly unknown[];
  docTitle?: string;
}

@Injectable()
export class OutlineStage {
  private readonly logger = new Logger(OutlineStage.name);

  constructor(
    @Inject(OUTLINE_CONFIG) private readonly config: OutlineConfig,
    private readonly orchestrator: SectionExtractionOrchestrator,
    private readonly tocExtractor: TocEntryExtractor,
    private readonly metadataParser: DocumentMetadataParser,
    private readonly coverageMapper: CoverageMapper,
    private readonly coverageCalculator: CoverageCalculator,
  ) {}

  /**
   * Execute Outline Stage
   *
   * @throws InputValidationError when pages is not a page list
   * @throws ExtractionTimeoutError when the budget runs out
   */
  execute(input: OutlineStageInput): DocumentOutline {
    const startTime = Date.now();
    const deadline = new Deadline(this.config.extractionTimeoutMs);

    this.logger.log(
      `=== Outline Stage Start === Pages: ${describeCount(input.pages)}, ` +
        `TOC entries: ${input.tocEntries ? input.tocEntries.length : 'extract'}`,
    );

    try {
      const pageIndex = this.buildPageIndex(input.pages);

      // Step 1: Document metadata
      const metadata = this.metadataParser.parse(pageIndex);
      const docTitle = input.docTitle ?? metadata.title;

      // Step 2: Sections (extracts TOC entries when none were supplied)
      const result = this.orchestrator.extract(input.pages, {
        tocEntries: input.tocEntries,
        docTitle,
        deadline,
      });

      // Step 3: Coverage metrics
      const tocCovered = this.coverageMapper.mapCoverage(
        result.tocEntries,
        pageIndex.totalPages,
      );
      const coverage = this.coverageCalculator.calculate(
        pageIndex,
        result.sections,
        tocCovered,
      );

      const processingTime = Date.now() - startTime;

      this.logger.log(
        `=== Outline Stage Complete === Duration: ${processingTime}ms, ` +
          `TOC entries: ${result.tocEntries.length}, Sections: ${result.sections.length}, ` +
          `TOC coverage: ${coverage.tocCoverage}%`,
      );

      return {
        metadata,
        tocEntries: result.tocEntries,
        sections: result.sections,
        coverage,
        stats: {
          toc: result.tocStats,
          sections: result.stats,
          processingTime,
        },
      };
    } catch (error) {
      const duration = Date.now() - startTime;

      this.logger.error(
        `=== Outline Stage Failed === Duration: ${duration}ms`,
        error instanceof Error ? error.stack : String(error),
      );

      throw error;
    }
  }

  /**
   * TOC entries only, without section assembly
   *
   * @throws InputValidationError when pages is not a page list
   */
  extractToc(pages: unknown): TocExtractionResult {
    const deadline = new Deadline(this.config.extractionTimeoutMs);
    const pageIndex = this.buildPageIndex(pages);
    const result = this.tocExtractor.extractFromIndex(pageIndex, deadline);

    // Entries must point inside the document
    const entries = result.entries.filter(
      (entry) => entry.page <= pageIndex.totalPages,
    );

    return {
      entries,
      stats: {
        ...result.stats,
        outOfRangeRemoved:
          result.stats.outOfRangeRemoved +
          (result.entries.length - entries.length),
      },
    };
  }

  private buildPageIndex(pages: unknown): PageIndex {
    if (!this.orchestrator.validateInput(pages)) {
      throw new InputValidationError();
    }
    return new PageIndex(pages, this.config.maxPage);
  }
}

function describeCount(value: unknown): string {
  return Array.isArray(value) ? String(value.length) : 'invalid';
}
