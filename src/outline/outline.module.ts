/**
 * Outline Module
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  OUTLINE_CONFIG,
  OutlineConfig,
  loadOutlineConfig,
} from '../config/outline.config';
import { OutlineStage } from './outline.stage';
import { OutlineTcpController } from './outline-tcp.controller';
import { SectionExtractionOrchestrator } from './section-extraction.orchestrator';

// Headings
import { HeadingDetector } from './headings';

// TOC
import { DefaultTocHeuristics, TOC_HEURISTICS, TocEntryExtractor } from './toc';

// Coverage and sections
import { CoverageCalculator } from './coverage/coverage.calculator';
import { CoverageMapper } from './coverage/coverage.mapper';
import { SectionAssembler } from './sections/section.assembler';
import { DocumentMetadataParser } from './metadata/document-metadata.parser';

@Module({
  controllers: [OutlineTcpController],
  providers: [
    {
      provide: OUTLINE_CONFIG,
      useFactory: (configService: ConfigService): Readonly<OutlineConfig> =>
        loadOutlineConfig(configService),
      inject: [ConfigService],
    },

    // Main stage
    OutlineStage,
    SectionExtractionOrchestrator,

    // Headings
    HeadingDetector,

    // TOC
    { provide: TOC_HEURISTICS, useClass: DefaultTocHeuristics },
    TocEntryExtractor,

    // Coverage and sections
    CoverageMapper,
    CoverageCalculator,
    SectionAssembler,
    DocumentMetadataParser,
  ],
  exports: [OutlineStage],
})
export class OutlineModule {}
