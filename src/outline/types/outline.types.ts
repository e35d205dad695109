/**
 * Outline Type Definitions
 *
 * Page records come from an upstream text extractor; TOC entries and
 * sections are created once per extraction call and never mutated.
 */

/**
 * Input page record
 */
export interface PageRecord {
  page: number; // >= 1, unique
  text: string;
}

/**
 * Table of Contents entry
 */
export interface TocEntry {
  sectionId: string | null;
  title: string;
  page: number;
  level: number;
  parentId: string | null;
  fullPath: string; // source line as extracted
  tags: ReadonlySet<string>;
}

/**
 * Sections: TOC-derived and standalone are a tagged union, so a standalone
 * id such as "Page-4" is never confused with a TOC section id.
 */
interface SectionBase {
  docTitle: string;
  sectionId: string;
  title: string;
  fullPath: string;
  page: number;
  level: number;
  parentId: string | null;
  tags: ReadonlySet<string>;
  content: string;
}

export interface TocSection extends SectionBase {
  kind: 'toc';
  pageRange: PageRange;
}

export interface PageSection extends SectionBase {
  kind: 'page';
  level: 1;
  parentId: null;
}

export type Section = TocSection | PageSection;

/**
 * Inclusive page range owned by one TOC entry
 */
export interface PageRange {
  start: number;
  end: number;
}

/**
 * Heading detection
 */
export type HeadingStrategyName = 'numbered' | 'all-caps' | 'mixed-cap';

export interface HeadingMatch {
  heading: string;
  strategy: HeadingStrategyName;
  confidence: number;
}

export interface HeadingStrategyStats {
  matchesFound: number;
  totalChecks: number;
}

/**
 * TOC extraction statistics (returned per call)
 */
export interface TocExtractionStats {
  linesScanned: number;
  tocStartIndex: number;
  tocMarkerFound: boolean;
  malformedRecords: number;
  outOfRangeRecords: number;
  primaryEntries: number;
  rejectedByQualityGate: number;
  potentialEntries: number;
  enhancedEntries: number;
  fallbackEntries: number;
  duplicatesRemoved: number;
  outOfRangeRemoved: number;
  patternUsage: Record<string, number>;
}

export interface TocExtractionResult {
  entries: TocEntry[];
  stats: TocExtractionStats;
}

/**
 * Section extraction statistics (returned per call)
 */
export interface SectionExtractionStats {
  totalPages: number;
  malformedRecords: number;
  outOfRangeRecords: number;
  tocEntriesReceived: number;
  invalidTocEntries: number;
  outOfRangeTocEntries: number;
  duplicateTocEntries: number;
  tocSections: number;
  failedEntries: number;
  coveredPages: number;
  standaloneSections: number;
  emptyPages: number;
  failedPages: number;
  headingStrategies: Record<string, HeadingStrategyStats>;
  processingTime: number;
}

export interface SectionExtractionResult {
  sections: Section[];
  tocEntries: TocEntry[];
  tocStats: TocExtractionStats | null; // null when entries were supplied
  stats: SectionExtractionStats;
}

/**
 * Document metadata parsed from the opening pages
 */
export interface DocumentMetadata {
  title: string;
  revision: string;
  version: string;
  releaseDate: string;
}

/**
 * Coverage metrics (percentages, 2 decimals)
 */
export interface CoverageMetrics {
  totalPages: number;
  pagesWithText: number;
  tocCoveredPages: number;
  pageCoverage: number;
  tocCoverage: number;
  sectionCoverage: number;
}

/**
 * Full outline (stage output)
 */
export interface DocumentOutline {
  metadata: DocumentMetadata;
  tocEntries: TocEntry[];
  sections: Section[];
  coverage: CoverageMetrics;
  stats: {
    toc: TocExtractionStats | null;
    sections: SectionExtractionStats;
    processingTime: number;
  };
}

/**
 * Runtime guards for untyped transport payloads
 */
export function isPageRecord(value: unknown): value is PageRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'page' in value &&
    'text' in value &&
    typeof value.page === 'number' &&
    Number.isInteger(value.page) &&
    value.page >= 1 &&
    typeof value.text === 'string'
  );
}

export function isTocEntry(value: unknown): value is TocEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (
    !('sectionId' in value) ||
    !('title' in value) ||
    !('page' in value) ||
    !('level' in value) ||
    !('parentId' in value) ||
    !('fullPath' in value) ||
    !('tags' in value)
  ) {
    return false;
  }
  return (
    (value.sectionId === null || typeof value.sectionId === 'string') &&
    typeof value.title === 'string' &&
    typeof value.page === 'number' &&
    Number.isInteger(value.page) &&
    typeof value.level === 'number' &&
    (value.parentId === null || typeof value.parentId === 'string') &&
    typeof value.fullPath === 'string' &&
    value.tags instanceof Set
  );
}
