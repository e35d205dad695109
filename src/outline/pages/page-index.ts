/**
 * Page Index
 *
 * Built once per extraction call from raw page records. Lookup by page
 * number is O(1); a missing page reads as empty text. Records numbered
 * past `maxPage` are dropped so the page count stays bounded.
 */

import { DEFAULT_OUTLINE_CONFIG } from '../../config/outline.config';
import { isPageRecord, PageRecord } from '../types';

export class PageIndex {
  private readonly textByPage = new Map<number, string>();
  private readonly skipped: number;
  private readonly beyondMaxPage: number;
  private readonly lastPage: number;

  constructor(
    records: readonly unknown[],
    maxPage: number = DEFAULT_OUTLINE_CONFIG.maxPage,
  ) {
    let skipped = 0;
    let beyondMaxPage = 0;
    let lastPage = 0;

    for (const record of records) {
      if (!isPageRecord(record)) {
        skipped++;
        continue;
      }
      if (record.page > maxPage) {
        beyondMaxPage++;
        continue;
      }
      // First record wins when a page number repeats
      if (this.textByPage.has(record.page)) {
        skipped++;
        continue;
      }
      this.textByPage.set(record.page, record.text);
      lastPage = Math.max(lastPage, record.page);
    }

    this.skipped = skipped;
    this.beyondMaxPage = beyondMaxPage;
    this.lastPage = lastPage;
  }

  /**
   * Highest page number present (0 for an empty document)
   */
  get totalPages(): number {
    return this.lastPage;
  }

  /**
   * Records dropped because they were malformed or repeated a page number
   */
  get skippedRecords(): number {
    return this.skipped;
  }

  /**
   * Well-formed records dropped for a page number above `maxPage`
   */
  get outOfRangeRecords(): number {
    return this.beyondMaxPage;
  }

  getPageContent(pageNumber: number): string {
    return this.textByPage.get(pageNumber) ?? '';
  }

  /**
   * Concatenate pages start..end (inclusive, clamped to the document)
   * with newline separators, trimmed
   */
  getContentRange(startPage: number, endPage: number): string {
    const start = Math.max(1, startPage);
    const end = Math.min(this.totalPages, endPage);

    const parts: string[] = [];
    for (let page = start; page <= end; page++) {
      parts.push(this.getPageContent(page));
    }

    return parts.join('\n').trim();
  }

  /**
   * Records in ascending page order (well-formed only)
   */
  getRecords(): PageRecord[] {
    return [...this.textByPage.entries()]
      .sort(([a], [b]) => a - b)
      .map(([page, text]) => ({ page, text }));
  }
}
