/**
 * TOC Entry Factory
 *
 * Pure helpers shared by every extraction pass: title cleanup, hierarchy
 * derivation from section ids, tagging, ordering and de-duplication.
 */

import { TocEntry } from '../types';

export type ExtractionTag = 'enhanced_extraction' | 'fallback_extraction';

export interface TocEntryDraft {
  sectionId: string | null;
  title: string;
  page: number;
  fullPath: string;
}

const TITLE_TAGS: ReadonlyArray<{ tag: string; words: readonly string[] }> = [
  { tag: 'introductory', words: ['introduction', 'overview', 'summary'] },
  { tag: 'concluding', words: ['conclusion', 'summary', 'results'] },
  { tag: 'supplementary', words: ['appendix', 'annex', 'supplement'] },
  { tag: 'reference', words: ['reference', 'bibliography', 'citation'] },
  { tag: 'visual_content', words: ['table', 'figure', 'diagram', 'chart'] },
  {
    tag: 'specification',
    words: ['specification', 'requirement', 'standard'],
  },
];

const DEDUPE_TITLE_PREFIX = 50;
const TRUNCATED_TITLE_LENGTH = 80;

/**
 * "3.2.1" → 3, null or "" → 1
 */
export function deriveLevel(sectionId: string | null): number {
  return sectionId ? sectionId.split('.').length : 1;
}

/**
 * "3.2.1" → "3.2", "3" → null
 */
export function deriveParentId(sectionId: string | null): string | null {
  if (!sectionId || !sectionId.includes('.')) {
    return null;
  }
  return sectionId.split('.').slice(0, -1).join('.');
}

export function cleanTitle(title: string, maxLength: number = 120): string {
  let cleaned = title.trim().replace(/\.{4,}/g, '');

  if (cleaned.length > maxLength) {
    const firstSentence = cleaned.split('.')[0];
    cleaned =
      cleaned.includes('.') && firstSentence.length < TRUNCATED_TITLE_LENGTH
        ? firstSentence.trim()
        : cleaned.slice(0, TRUNCATED_TITLE_LENGTH).trim();
  }

  cleaned = cleaned.replace(/[.\s]+$/, '');
  cleaned = cleaned.split(/\s+/).filter(Boolean).join(' ');

  return cleaned.replace(/ \./g, '.');
}

export function generateTags(
  title: string,
  extraction?: ExtractionTag,
): Set<string> {
  const lowerTitle = title.toLowerCase();
  const tags = new Set<string>();

  for (const { tag, words } of TITLE_TAGS) {
    if (words.some((word) => lowerTitle.includes(word))) {
      tags.add(tag);
    }
  }

  if (extraction) {
    tags.add(extraction);
  }

  return tags;
}

export function createTocEntry(
  draft: TocEntryDraft,
  extraction?: ExtractionTag,
): TocEntry {
  return {
    sectionId: draft.sectionId,
    title: draft.title,
    page: draft.page,
    level: deriveLevel(draft.sectionId),
    parentId: deriveParentId(draft.sectionId),
    fullPath: draft.fullPath,
    tags: generateTags(draft.title, extraction),
  };
}

/**
 * Ascending by page, then title (code-unit order, locale independent)
 */
export function compareTocEntries(a: TocEntry, b: TocEntry): number {
  if (a.page !== b.page) {
    return a.page - b.page;
  }
  if (a.title === b.title) {
    return 0;
  }
  return a.title < b.title ? -1 : 1;
}

export function dedupeKey(entry: Pick<TocEntry, 'page' | 'title'>): string {
  const titlePrefix = entry.title
    .toLowerCase()
    .trim()
    .slice(0, DEDUPE_TITLE_PREFIX);
  return `${entry.page}\u0000${titlePrefix}`;
}

/**
 * Sort by (page, title) and keep the first entry per
 * (page, lowercase title prefix)
 */
export function dedupeTocEntries(entries: readonly TocEntry[]): {
  entries: TocEntry[];
  duplicates: number;
} {
  const seen = new Set<string>();
  const unique: TocEntry[] = [];

  for (const entry of [...entries].sort(compareTocEntries)) {
    const key = dedupeKey(entry);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(entry);
  }

  return { entries: unique, duplicates: entries.length - unique.length };
}
