/**
 * ALL CAPS Heading Strategy
 *
 * Matches lines such as "REQUIREMENTS" or "3 POWER RULES (SUMMARY)".
 * Confidence is the share of uppercase among alphabetic characters.
 */

import { BaseHeadingStrategy } from './heading-strategy';

export class AllCapsHeadingStrategy extends BaseHeadingStrategy {
  // Uppercase letters, digits, spaces and common heading punctuation only
  private readonly allCapsRegex = /^[A-Z0-9\s\-()/.,:&]+$/;

  constructor(
    private readonly minLength: number = 4,
    private readonly minUpperChars: number = 2,
  ) {
    super('all-caps');
  }

  protected isMatch(line: string): boolean {
    return (
      line.length >= this.minLength &&
      this.allCapsRegex.test(line) &&
      this.countUpper(line) >= this.minUpperChars
    );
  }

  protected score(line: string): number {
    const alphaCount = (line.match(/[A-Za-z]/g) ?? []).length;
    if (alphaCount === 0) {
      return 0;
    }
    return this.countUpper(line) / alphaCount;
  }

  private countUpper(line: string): number {
    return (line.match(/[A-Z]/g) ?? []).length;
  }
}
