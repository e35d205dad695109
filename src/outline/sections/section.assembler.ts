/**
 * Section Assembler
 *
 * Builds the two section variants. Content slicing is the caller's job;
 * the assembler maps fields and derives level and parent from the id.
 */

import { Injectable } from '@nestjs/common';
import { PageRange, PageSection, TocEntry, TocSection } from '../types';
import { deriveLevel, deriveParentId } from '../toc/toc-entry.factory';

@Injectable()
export class SectionAssembler {
  private created = 0;

  /**
   * Sections built since construction (diagnostic only)
   */
  get sectionsCreated(): number {
    return this.created;
  }

  buildFromTocEntry(
    entry: TocEntry,
    content: string,
    pageRange: PageRange,
    docTitle: string,
  ): TocSection {
    const sectionId = entry.sectionId ?? '';
    this.created++;

    return {
      kind: 'toc',
      docTitle,
      sectionId,
      title: entry.title,
      fullPath: `${sectionId} ${entry.title}`.trim(),
      page: entry.page,
      level: deriveLevel(entry.sectionId),
      parentId: deriveParentId(entry.sectionId),
      tags: new Set(entry.tags),
      content,
      pageRange: { ...pageRange },
    };
  }

  buildPageSection(
    pageNumber: number,
    content: string,
    docTitle: string,
    heading?: string | null,
  ): PageSection {
    const sectionId = `Page-${pageNumber}`;
    const title = heading ?? `Page ${pageNumber}`;
    this.created++;

    return {
      kind: 'page',
      docTitle,
      sectionId,
      title,
      fullPath: `${sectionId} ${title}`,
      page: pageNumber,
      level: 1,
      parentId: null,
      tags: new Set<string>(),
      content,
    };
  }
}
