/**
 * Outline Configuration
 *
 * Every threshold used by heading detection, TOC extraction and section
 * assembly lives here. Values are read once from ConfigService and frozen.
 */

import { ConfigService } from '@nestjs/config';

export const OUTLINE_CONFIG = 'OUTLINE_CONFIG';

export interface OutlineConfig {
  // Document
  docTitle: string;
  metadataScanPages: number;

  // Page bounds for TOC entries
  minPage: number;
  maxPage: number;

  // TOC location and matching
  tocMarkers: readonly string[];
  maxLineLength: number;
  minTitleLength: number;
  maxTitleLength: number;
  maxTitlePeriods: number;
  maxDigitRatio: number;

  // Recovery passes
  fallbackConfidence: number;
  fallbackMinTitleLength: number;
  genuineKeywords: readonly string[];
  scoringKeywords: readonly string[];

  // Standalone sections
  headingScanDepth: number;
  maxHeadingLength: number;

  // Orchestration
  validationEnabled: boolean;
  validationSampleSize: number;
  extractionTimeoutMs: number;
}

export const DEFAULT_OUTLINE_CONFIG: Readonly<OutlineConfig> = Object.freeze({
  docTitle: 'Untitled Document',
  metadataScanPages: 5,

  minPage: 1,
  maxPage: 9999,

  tocMarkers: ['table of contents', 'contents'],
  maxLineLength: 300,
  minTitleLength: 5,
  maxTitleLength: 120,
  maxTitlePeriods: 15,
  maxDigitRatio: 0.4,

  fallbackConfidence: 0.6,
  fallbackMinTitleLength: 8,
  genuineKeywords: [
    'introduction',
    'overview',
    'specification',
    'requirements',
    'protocol',
    'interface',
    'architecture',
    'appendix',
    'annex',
    'reference',
    'glossary',
    'index',
    'chapter',
    'section',
    'figure',
    'table',
    'example',
  ],
  scoringKeywords: [
    'introduction',
    'overview',
    'summary',
    'conclusion',
    'references',
    'appendix',
    'index',
    'glossary',
    'abstract',
  ],

  headingScanDepth: 5,
  maxHeadingLength: 100,

  validationEnabled: true,
  validationSampleSize: 5,
  extractionTimeoutMs: 300_000,
});

/**
 * Build a frozen config from defaults plus overrides
 */
export function createOutlineConfig(
  overrides: Partial<OutlineConfig> = {},
): Readonly<OutlineConfig> {
  const config: OutlineConfig = { ...DEFAULT_OUTLINE_CONFIG, ...overrides };

  if (config.minPage < 1 || config.maxPage < config.minPage) {
    throw new Error(
      `Invalid page bounds: minPage=${config.minPage}, maxPage=${config.maxPage}`,
    );
  }

  return Object.freeze(config);
}

/**
 * Read outline config from environment (via ConfigService)
 */
export function loadOutlineConfig(
  configService: ConfigService,
): Readonly<OutlineConfig> {
  const defaults = DEFAULT_OUTLINE_CONFIG;

  return createOutlineConfig({
    docTitle: configService.get<string>('OUTLINE_DOC_TITLE', defaults.docTitle),
    minPage: readNumber(configService, 'OUTLINE_MIN_PAGE', defaults.minPage),
    maxPage: readNumber(configService, 'OUTLINE_MAX_PAGE', defaults.maxPage),
    tocMarkers: readList(
      configService,
      'OUTLINE_TOC_MARKERS',
      defaults.tocMarkers,
    ),
    headingScanDepth: readNumber(
      configService,
      'OUTLINE_HEADING_SCAN_DEPTH',
      defaults.headingScanDepth,
    ),
    maxHeadingLength: readNumber(
      configService,
      'OUTLINE_MAX_HEADING_LENGTH',
      defaults.maxHeadingLength,
    ),
    maxLineLength: readNumber(
      configService,
      'OUTLINE_MAX_LINE_LENGTH',
      defaults.maxLineLength,
    ),
    fallbackConfidence: readNumber(
      configService,
      'OUTLINE_FALLBACK_CONFIDENCE',
      defaults.fallbackConfidence,
    ),
    validationEnabled: readBoolean(
      configService,
      'OUTLINE_VALIDATION_ENABLED',
      defaults.validationEnabled,
    ),
    extractionTimeoutMs: readNumber(
      configService,
      'OUTLINE_EXTRACTION_TIMEOUT_MS',
      defaults.extractionTimeoutMs,
    ),
  });
}

export interface TcpOptions {
  host: string;
  port: number;
}

/**
 * Address the TCP microservice listens on
 */
export function loadTcpOptions(configService: ConfigService): TcpOptions {
  return {
    host: configService.get<string>('OUTLINE_TCP_HOST', '0.0.0.0'),
    port: readNumber(configService, 'OUTLINE_TCP_PORT', 4010),
  };
}

// Env values arrive as strings even when typed as numbers
function readNumber(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Config ${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(
  configService: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const raw = configService.get<string | boolean>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (typeof raw === 'boolean') {
    return raw;
  }
  return ['true', '1', 'yes'].includes(raw.toLowerCase());
}

function readList(
  configService: ConfigService,
  key: string,
  fallback: readonly string[],
): readonly string[] {
  const raw = configService.get<string>(key);
  if (!raw) {
    return fallback;
  }
  const items = raw
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}
