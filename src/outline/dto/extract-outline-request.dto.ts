/**
 * Extract Outline Request DTOs
 *
 * Only the top-level shape is validated here. Individual page records and
 * TOC entries are checked by the core, which skips malformed ones instead
 * of rejecting the whole request.
 */

import { IsArray, IsOptional, IsString, MaxLength } from 'class-validator';

export class ExtractOutlineRequestDto {
  @IsArray()
  pages!: unknown[];

  @IsOptional()
  @IsArray()
  tocEntries?: unknown[]; // skips TOC extraction when present

  @IsOptional()
  @IsString()
  @MaxLength(500)
  docTitle?: string;
}

export class ExtractTocRequestDto {
  @IsArray()
  pages!: unknown[];
}
