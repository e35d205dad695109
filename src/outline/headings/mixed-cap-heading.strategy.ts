/**
 * Mixed Capitalization Heading Strategy
 *
 * Matches Title Case lines: at least two words, at least half of them
 * starting with an uppercase letter or a digit.
 */

import { BaseHeadingStrategy } from './heading-strategy';

export class MixedCapHeadingStrategy extends BaseHeadingStrategy {
  private readonly capitalizedRegex = /^[\p{Lu}\p{Nd}]/u;

  constructor(private readonly minWords: number = 2) {
    super('mixed-cap');
  }

  protected isMatch(line: string): boolean {
    const words = this.splitWords(line);
    if (words.length < this.minWords) {
      return false;
    }
    return this.countCapitalized(words) * 2 >= words.length;
  }

  protected score(line: string): number {
    const words = this.splitWords(line);
    return words.length === 0
      ? 0
      : this.countCapitalized(words) / words.length;
  }

  private splitWords(line: string): string[] {
    return line.split(/\s+/).filter((word) => word.length > 0);
  }

  private countCapitalized(words: string[]): number {
    return words.filter((word) => this.capitalizedRegex.test(word)).length;
  }
}
