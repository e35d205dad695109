/**
 * Outline Response DTOs
 *
 * Sets do not survive JSON, so tags travel as sorted arrays in both
 * directions.
 */

import {
  DocumentOutline,
  PageSection,
  TocEntry,
  TocExtractionStats,
  TocSection,
} from '../types';
import { deriveLevel, deriveParentId } from '../toc/toc-entry.factory';

export type TocEntryResponse = Omit<TocEntry, 'tags'> & { tags: string[] };

export type SectionResponse = (
  | Omit<TocSection, 'tags'>
  | Omit<PageSection, 'tags'>
) & { tags: string[] };

export type OutlineResponse = Omit<DocumentOutline, 'tocEntries' | 'sections'> & {
  tocEntries: TocEntryResponse[];
  sections: SectionResponse[];
};

export interface TocResponse {
  entries: TocEntryResponse[];
  stats: TocExtractionStats;
}

export function serializeTocEntry(entry: TocEntry): TocEntryResponse {
  return { ...entry, tags: [...entry.tags].sort() };
}

export function serializeSection(section: TocSection | PageSection): SectionResponse {
  return { ...section, tags: [...section.tags].sort() };
}

export function serializeOutline(outline: DocumentOutline): OutlineResponse {
  return {
    ...outline,
    tocEntries: outline.tocEntries.map(serializeTocEntry),
    sections: outline.sections.map(serializeSection),
  };
}

/**
 * Rebuild a TOC entry from its JSON form. Missing hierarchy fields are
 * derived from the section id; anything without a string title and a
 * page is returned untouched for the core to reject.
 */
export function reviveTocEntry(value: unknown): unknown {
  if (
    typeof value !== 'object' ||
    value === null ||
    !('title' in value) ||
    !('page' in value) ||
    typeof value.title !== 'string'
  ) {
    return value;
  }

  const sectionId =
    'sectionId' in value && typeof value.sectionId === 'string'
      ? value.sectionId
      : null;

  const fullPath =
    'fullPath' in value && typeof value.fullPath === 'string'
      ? value.fullPath
      : `${sectionId ?? ''} ${value.title}`.trim();

  const tags =
    'tags' in value && Array.isArray(value.tags)
      ? value.tags.filter((tag): tag is string => typeof tag === 'string')
      : [];

  return {
    sectionId,
    title: value.title,
    page: value.page,
    level: deriveLevel(sectionId),
    parentId: deriveParentId(sectionId),
    fullPath,
    tags: new Set(tags),
  };
}
