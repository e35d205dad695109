import { Inject, Injectable } from '@nestjs/common';
import { OUTLINE_CONFIG, OutlineConfig } from '../../config/outline.config';
import { PageIndex } from '../pages/page-index';
import { DocumentMetadata } from '../types';

const UNKNOWN = 'Unknown';

const TITLE_HINT = /\b(?:specification|standard|manual|guide|handbook|reference)\b/i;
const REVISION_REGEX = /(?:Revision|Rev\.?)[: ]+\s*([0-9.]+)/i;
const VERSION_REGEX = /\b(?:Version\s*:?\s*|v)([0-9][0-9.]*)/i;
const RELEASE_DATE_REGEX =
  /(?:Release Date|Published)\s*:?\s*([0-9]{4}(?:-[0-9]{1,2})?)/i;

/**
 * Title, revision, version and release date from the opening pages
 */
@Injectable()
export class DocumentMetadataParser {
  constructor(@Inject(OUTLINE_CONFIG) private readonly config: OutlineConfig) {}

  parse(pageIndex: PageIndex): DocumentMetadata {
    const text = pageIndex
      .getRecords()
      .slice(0, this.config.metadataScanPages)
      .map((record) => record.text)
      .join('\n');

    return {
      title: this.findTitle(text),
      revision: firstGroup(REVISION_REGEX, text),
      version: firstGroup(VERSION_REGEX, text),
      releaseDate: firstGroup(RELEASE_DATE_REGEX, text),
    };
  }

  private findTitle(text: string): string {
    const line = text
      .split(/\r?\n/)
      .map((candidate) => candidate.trim())
      .find(
        (candidate) =>
          candidate.length > 0 &&
          candidate.length <= this.config.maxTitleLength &&
          TITLE_HINT.test(candidate),
      );

    return line ?? this.config.docTitle;
  }
}

function firstGroup(regex: RegExp, text: string): string {
  const value = regex.exec(text)?.[1]?.replace(/\.+$/, '');
  return value && value.length > 0 ? value : UNKNOWN;
}
