import { Injectable } from '@nestjs/common';
import { CoverageMetrics, Section } from '../types';
import { PageIndex } from '../pages/page-index';

/**
 * Percentages for report consumers: how much of the document has text,
 * how much the TOC claims and how much of the text ended up in a section.
 */
@Injectable()
export class CoverageCalculator {
  calculate(
    pageIndex: PageIndex,
    sections: readonly Section[],
    tocCoveredPages: ReadonlySet<number>,
  ): CoverageMetrics {
    const totalPages = pageIndex.totalPages;
    const sectionPages = this.pagesOf(sections);

    let pagesWithText = 0;
    let pagesInSections = 0;
    for (let page = 1; page <= totalPages; page++) {
      if (pageIndex.getPageContent(page).trim().length === 0) {
        continue;
      }
      pagesWithText++;
      if (sectionPages.has(page)) {
        pagesInSections++;
      }
    }

    return {
      totalPages,
      pagesWithText,
      tocCoveredPages: tocCoveredPages.size,
      pageCoverage: percentage(pagesWithText, totalPages),
      tocCoverage: percentage(tocCoveredPages.size, totalPages),
      sectionCoverage: percentage(pagesInSections, pagesWithText),
    };
  }

  private pagesOf(sections: readonly Section[]): Set<number> {
    const pages = new Set<number>();
    for (const section of sections) {
      if (section.kind === 'page') {
        pages.add(section.page);
        continue;
      }
      for (
        let page = section.pageRange.start;
        page <= section.pageRange.end;
        page++
      ) {
        pages.add(page);
      }
    }
    return pages;
  }
}

function percentage(part: number, whole: number): number {
  if (whole === 0) {
    return 0;
  }
  return Math.round((part / whole) * 10000) / 100;
}
