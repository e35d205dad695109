/**
 * Headings Barrel Export
 */

export * from './heading-strategy';
export * from './numbered-heading.strategy';
export * from './all-caps-heading.strategy';
export * from './mixed-cap-heading.strategy';
export * from './heading.detector';
