import { createOutlineConfig } from '../../config/outline.config';
import { Deadline } from '../../common/deadline';
import { ExtractionTimeoutError } from '../errors/outline-errors';
import { DefaultTocHeuristics } from './toc-heuristics';
import { TocEntryExtractor } from './toc-entry.extractor';

describe('TocEntryExtractor', () => {
  let extractor: TocEntryExtractor;

  const scenarioPages = [
    { page: 1, text: 'Table of Contents' },
    { page: 2, text: '1 Introduction .... 3' },
    { page: 3, text: '2 Overview .... 5' },
  ];

  beforeEach(() => {
    const config = createOutlineConfig();
    extractor = new TocEntryExtractor(config, new DefaultTocHeuristics(config));
  });

  it('extracts dot-leader entries after the TOC marker', () => {
    const { entries, stats } = extractor.extract(scenarioPages);

    expect(
      entries.map(({ sectionId, title, page }) => ({ sectionId, title, page })),
    ).toEqual([
      { sectionId: '1', title: 'Introduction', page: 3 },
      { sectionId: '2', title: 'Overview', page: 5 },
    ]);
    expect(entries[0]).toMatchObject({
      level: 1,
      parentId: null,
      fullPath: '1 Introduction .... 3',
      tags: new Set(['introductory']),
    });
    expect(stats).toMatchObject({
      tocMarkerFound: true,
      tocStartIndex: 1,
      linesScanned: 2,
      primaryEntries: 2,
      patternUsage: { 'numbered-dot-leader': 2 },
    });
  });

  it('never accepts a long line without a trailing page number', () => {
    const longLine = 'x'.repeat(100) + ' ' + 'y'.repeat(99);
    expect(longLine).toHaveLength(200);

    const { entries, stats } = extractor.extract([
      { page: 1, text: 'Contents' },
      { page: 2, text: longLine },
    ]);

    expect(entries).toEqual([]);
    expect(stats.potentialEntries).toBe(0);
  });

  it('rejects technical data at the quality gate', () => {
    const { entries, stats } = extractor.extract([
      { page: 1, text: 'Contents\n7 0x1F 0x2A Register ..... 12' },
    ]);

    expect(entries).toEqual([]);
    expect(stats.rejectedByQualityGate).toBe(1);
    expect(stats.potentialEntries).toBe(1);
  });

  it('recovers leaderless numbered entries in the enhanced pass', () => {
    const { entries, stats } = extractor.extract([
      { page: 1, text: 'Contents\n5 Security Considerations 44' },
    ]);

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      sectionId: '5',
      title: 'Security Considerations',
      page: 44,
      tags: new Set(['enhanced_extraction']),
    });
    expect(stats).toMatchObject({
      primaryEntries: 0,
      enhancedEntries: 1,
      fallbackEntries: 0,
    });
  });

  it('keeps confident unnumbered candidates in the fallback pass', () => {
    const { entries, stats } = extractor.extract([
      { page: 1, text: 'Contents\nSummary of Results and Conclusions 45' },
    ]);

    expect(entries).toEqual([
      {
        sectionId: null,
        title: 'Summary of Results and Conclusions',
        page: 45,
        level: 1,
        parentId: null,
        fullPath: 'Summary of Results and Conclusions 45',
        tags: new Set(['introductory', 'concluding', 'fallback_extraction']),
      },
    ]);
    expect(stats.fallbackEntries).toBe(1);
  });

  it('collapses duplicate entries', () => {
    const { entries, stats } = extractor.extract([
      { page: 1, text: 'Contents\n1 Introduction .... 3\n1 Introduction .... 3' },
    ]);

    expect(entries).toHaveLength(1);
    expect(stats.duplicatesRemoved).toBe(1);
  });

  it('scans the whole document when no marker exists', () => {
    const { entries, stats } = extractor.extract([
      { page: 1, text: '1 Introduction .... 3' },
    ]);

    expect(entries.map((e) => e.title)).toEqual(['Introduction']);
    expect(stats.tocMarkerFound).toBe(false);
    expect(stats.tocStartIndex).toBe(0);
  });

  it('skips malformed page records', () => {
    const { entries, stats } = extractor.extract([
      ...scenarioPages,
      { page: 'four', text: 'x' },
      null,
    ]);

    expect(entries).toHaveLength(2);
    expect(stats.malformedRecords).toBe(2);
  });

  it('is deterministic', () => {
    expect(extractor.extract(scenarioPages)).toEqual(
      extractor.extract(scenarioPages),
    );
  });

  it('stops once the deadline has passed', () => {
    let clock = 0;
    const deadline = new Deadline(10, () => (clock += 100));

    expect(() => extractor.extract(scenarioPages, deadline)).toThrow(
      ExtractionTimeoutError,
    );
  });
});
