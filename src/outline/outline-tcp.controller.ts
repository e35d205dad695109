import { Controller, Logger, ValidationPipe } from '@nestjs/common';
import { MessagePattern, Payload, RpcException } from '@nestjs/microservices';
import { OutlineStage } from './outline.stage';
import {
  ExtractOutlineRequestDto,
  ExtractTocRequestDto,
  OutlineResponse,
  TocEntryResponse,
  TocResponse,
  reviveTocEntry,
  serializeOutline,
  serializeTocEntry,
} from './dto';

const payloadValidationPipe = new ValidationPipe({
  transform: true,
  exceptionFactory: (errors) =>
    new RpcException({
      success: false,
      error: errors
        .flatMap((error) => Object.values(error.constraints ?? {}))
        .join('; '),
    }),
});

@Controller()
export class OutlineTcpController {
  private readonly logger = new Logger(OutlineTcpController.name);

  constructor(private readonly outlineStage: OutlineStage) {}

  @MessagePattern('extract_outline')
  extractOutline(@Payload(payloadValidationPipe) data: ExtractOutlineRequestDto): {
    success: boolean;
    outline: OutlineResponse | null;
    error?: string;
  } {
    try {
      this.logger.log(
        `Received request to extract outline from ${data.pages.length} pages`,
      );

      const outline = this.outlineStage.execute({
        pages: data.pages,
        tocEntries: data.tocEntries?.map(reviveTocEntry),
        docTitle: data.docTitle,
      });

      return {
        success: true,
        outline: serializeOutline(outline),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      this.logger.error(
        'Error extracting outline',
        error instanceof Error ? error.stack : String(error),
      );

      return {
        success: false,
        outline: null,
        error: message,
      };
    }
  }

  @MessagePattern('extract_toc')
  extractToc(@Payload(payloadValidationPipe) data: ExtractTocRequestDto): {
    success: boolean;
    entries: TocEntryResponse[];
    stats: TocResponse['stats'] | null;
    error?: string;
  } {
    try {
      this.logger.log(
        `Received request to extract TOC from ${data.pages.length} pages`,
      );

      const result = this.outlineStage.extractToc(data.pages);

      return {
        success: true,
        entries: result.entries.map(serializeTocEntry),
        stats: result.stats,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      this.logger.error(
        'Error extracting TOC',
        error instanceof Error ? error.stack : String(error),
      );

      return {
        success: false,
        entries: [],
        stats: null,
        error: message,
      };
    }
  }
}
