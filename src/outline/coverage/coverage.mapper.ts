/**
 * Coverage Mapper
 *
 * Entry i owns [page_i, page_{i+1} - 1]; the last entry runs to the end
 * of the document. The end never falls below the start, so entries
 * sharing a page each own that single page.
 */

import { Injectable } from '@nestjs/common';
import { PageRange, TocEntry } from '../types';

@Injectable()
export class CoverageMapper {
  /**
   * Page range per entry, index-aligned with the page-sorted input
   */
  computeRanges(
    entries: readonly Pick<TocEntry, 'page'>[],
    totalPages: number,
  ): PageRange[] {
    return entries.map((entry, index) => {
      const next = entries[index + 1];
      const end = next ? next.page - 1 : totalPages;
      return { start: entry.page, end: Math.max(entry.page, end) };
    });
  }

  /**
   * Set of pages owned by TOC structure
   */
  mapCoverage(
    entries: readonly Pick<TocEntry, 'page'>[],
    totalPages: number,
  ): Set<number> {
    return this.unionOf(this.computeRanges(entries, totalPages));
  }

  unionOf(ranges: readonly PageRange[]): Set<number> {
    const covered = new Set<number>();
    for (const { start, end } of ranges) {
      for (let page = start; page <= end; page++) {
        covered.add(page);
      }
    }
    return covered;
  }
}
