/**
 * TOC Barrel Export
 */

export * from './toc-patterns';
export * from './toc-heuristics';
export * from './toc-entry.factory';
export * from './toc-entry.extractor';
