/**
 * TOC Line Patterns
 *
 * Ordered lists, most specific first. Arrays (never object keys) fix the
 * evaluation order. Every quantifier on free text is bounded so a
 * pathological line cannot trigger runaway backtracking.
 */

export interface TocPattern {
  name: string;
  regex: RegExp;
}

export interface TocLineMatch {
  pattern: string;
  sectionId: string | null;
  rawTitle: string;
  page: number;
}

export const PRIMARY_TOC_PATTERNS: readonly TocPattern[] = [
  {
    // "4.2 Message Format ........ 37"
    name: 'numbered-dot-leader',
    regex:
      /^\s*(?<sectionId>\d+(?:\.\d+)*)\s+(?<title>[^.]{1,200}?)\s*\.{3,}\s*(?<page>\d{1,4})\s*$/i,
  },
  {
    // "4.2 Message Format      37"
    name: 'numbered-wide-gap',
    regex:
      /^\s*(?<sectionId>\d+(?:\.\d+)*)\s+(?<title>.{5,80}?)\s{3,}(?<page>\d{1,4})\s*$/i,
  },
  {
    name: 'table-figure',
    regex:
      /^\s*(?<prefix>Table|Figure)\s*(?<sectionId>\d+(?:\.\d+)*)\s+(?<title>.{5,100}?)\s*\.{3,}\s*(?<page>\d{1,4})\s*$/i,
  },
  {
    name: 'appendix',
    regex:
      /^\s*(?<prefix>Appendix|Annex)\s+(?<sectionId>[A-Z])\s+(?<title>.{5,80}?)\s*\.{3,}\s*(?<page>\d{1,4})\s*$/i,
  },
  {
    name: 'chapter',
    regex:
      /^\s*(?<prefix>Chapter)\s+(?<sectionId>\d+)\s+(?<title>.{5,80}?)\s*\.{3,}\s*(?<page>\d{1,4})\s*$/i,
  },
  {
    // "Revision History ........ 2"
    name: 'titled-dot-leader',
    regex: /^(?<title>[A-Z][^.]{10,80}?)\s*\.{4,}\s*(?<page>\d{1,4})\s*$/i,
  },
  {
    // "A.1 Test Vectors ........ 210"
    name: 'lettered',
    regex:
      /^\s*(?<sectionId>[A-Z]\.\d+(?:\.\d+)*)\s+(?<title>.{5,80}?)\s*\.{3,}\s*(?<page>\d{1,4})\s*$/i,
  },
];

/**
 * Broader shapes used only by the recovery pass
 */
export const ENHANCED_TOC_PATTERNS: readonly TocPattern[] = [
  {
    name: 'numbered-loose',
    regex:
      /^\s*(?<sectionId>\d+(?:\.\d+)*)\s*(?<title>.{3,100}?)\s+(?<page>\d{1,4})\s*$/i,
  },
  {
    name: 'table-figure-loose',
    regex:
      /^\s*(?<prefix>Table|Figure|Equation)\s*(?<sectionId>\d+(?:\.\d+)*)\s*(?<title>.{3,80}?)\s+(?<page>\d{1,4})\s*$/i,
  },
  {
    name: 'bullet',
    regex: /^\s*[•*-]\s*(?<title>.{5,80}?)\s+(?<page>\d{1,4})\s*$/i,
  },
  {
    name: 'subsection',
    regex:
      /^\s*(?<sectionId>\d+\.\d+\.\d+)\s+(?<title>.{5,60}?)\s+(?<page>\d{1,4})\s*$/i,
  },
  {
    name: 'back-matter',
    regex:
      /^\s*(?<title>References?|Bibliography|Index|Glossary)\s+(?<page>\d{1,4})\s*$/i,
  },
  {
    name: 'roman',
    regex:
      /^\s*(?<sectionId>[IVX]+(?:\.[IVX]+)*)\s+(?<title>.{5,80}?)\s*\.{3,}\s*(?<page>\d{1,4})\s*$/i,
  },
  {
    name: 'lettered-loose',
    regex:
      /^\s*(?<sectionId>[A-Z](?:\.[A-Z])*(?:\.\d+)*)\s+(?<title>.{5,80}?)\s*\.{3,}\s*(?<page>\d{1,4})\s*$/i,
  },
];

/**
 * Apply one pattern to a trimmed line
 */
export function matchTocPattern(
  pattern: TocPattern,
  line: string,
): TocLineMatch | null {
  const groups = pattern.regex.exec(line)?.groups;
  if (!groups) {
    return null;
  }

  return {
    pattern: pattern.name,
    sectionId: formatSectionId(groups.prefix, groups.sectionId),
    rawTitle: groups.title ?? '',
    page: Number.parseInt(groups.page ?? '0', 10),
  };
}

/**
 * First pattern whose regex matches wins
 */
export function matchFirstTocPattern(
  patterns: readonly TocPattern[],
  line: string,
): TocLineMatch | null {
  for (const pattern of patterns) {
    const match = matchTocPattern(pattern, line);
    if (match) {
      return match;
    }
  }
  return null;
}

/**
 * First pattern whose match the validator also accepts wins
 */
export function matchFirstAcceptedTocPattern<T>(
  patterns: readonly TocPattern[],
  line: string,
  accept: (match: TocLineMatch) => T | null,
): T | null {
  for (const pattern of patterns) {
    const match = matchTocPattern(pattern, line);
    if (!match) {
      continue;
    }
    const accepted = accept(match);
    if (accepted !== null) {
      return accepted;
    }
  }
  return null;
}

function formatSectionId(
  prefix: string | undefined,
  sectionId: string | undefined,
): string | null {
  if (!sectionId) {
    return null;
  }
  if (!prefix) {
    return sectionId;
  }

  const label = prefix.charAt(0).toUpperCase() + prefix.slice(1).toLowerCase();
  const id = /^[A-Z]$/i.test(sectionId) ? sectionId.toUpperCase() : sectionId;
  return `${label} ${id}`;
}
