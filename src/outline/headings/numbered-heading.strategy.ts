/**
 * Numbered Heading Strategy
 *
 * Matches "1 Scope", "4.2.1 Message Format". Deeper numbering scores
 * higher: 0.6 + 0.2 per dot in the number prefix.
 */

import { BaseHeadingStrategy } from './heading-strategy';

export class NumberedHeadingStrategy extends BaseHeadingStrategy {
  private readonly numberedRegex = /^(\d+(?:\.\d+)*)\s+\S/;

  constructor() {
    super('numbered');
  }

  protected isMatch(line: string): boolean {
    return this.numberedRegex.test(line);
  }

  protected score(line: string): number {
    const prefix = this.numberedRegex.exec(line)?.[1] ?? '';
    const dotCount = prefix.split('.').length - 1;
    return 0.6 + dotCount * 0.2;
  }
}
