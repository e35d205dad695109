import { PageIndex } from '../pages/page-index';
import { SectionAssembler } from '../sections/section.assembler';
import { createTocEntry } from '../toc/toc-entry.factory';
import { CoverageCalculator } from './coverage.calculator';

describe('CoverageCalculator', () => {
  const calculator = new CoverageCalculator();
  const assembler = new SectionAssembler();

  it('reports page, TOC and section coverage', () => {
    const pageIndex = new PageIndex([
      { page: 1, text: 'cover' },
      { page: 2, text: '   ' },
      { page: 3, text: 'body' },
      { page: 4, text: 'more body' },
    ]);
    const entry = createTocEntry({
      sectionId: '1',
      title: 'Body',
      page: 3,
      fullPath: '1 Body 3',
    });
    const sections = [
      assembler.buildPageSection(1, 'cover', 'Doc'),
      assembler.buildFromTocEntry(entry, 'body', { start: 3, end: 4 }, 'Doc'),
    ];

    expect(calculator.calculate(pageIndex, sections, new Set([3, 4]))).toEqual({
      totalPages: 4,
      pagesWithText: 3,
      tocCoveredPages: 2,
      pageCoverage: 75,
      tocCoverage: 50,
      sectionCoverage: 100,
    });
  });

  it('rounds to two decimals', () => {
    const pageIndex = new PageIndex([
      { page: 1, text: 'only page with text' },
      { page: 3, text: '' },
    ]);

    const metrics = calculator.calculate(pageIndex, [], new Set());

    expect(metrics.pageCoverage).toBe(33.33);
    expect(metrics.sectionCoverage).toBe(0);
  });

  it('returns zeros for an empty document', () => {
    expect(calculator.calculate(new PageIndex([]), [], new Set())).toEqual({
      totalPages: 0,
      pagesWithText: 0,
      tocCoveredPages: 0,
      pageCoverage: 0,
      tocCoverage: 0,
      sectionCoverage: 0,
    });
  });
});
