import type { LoggerMethods } from '@glyphorder/logger';
import type { OcrBackend, OcrRequest, Token } from '@glyphorder/model';

import { spawnAsync } from '@glyphorder/shared';

import { parseTesseractTsv } from './tesseract-tsv';

export interface TesseractOcrBackendOptions {
  logger: LoggerMethods;

  /**
   * Path of the tesseract binary (default: 'tesseract')
   */
  command?: string;

  /**
   * Tesseract language codes joined with '+' (e.g., 'eng+kor')
   */
  languages?: string;
}

/**
 * Local OCR through the tesseract CLI. Needs the page's rendered image.
 */
export class TesseractOcrBackend implements OcrBackend {
  readonly kind = 'local';
  readonly name = 'tesseract';

  private readonly logger: LoggerMethods;
  private readonly command: string;
  private readonly languages?: string;

  constructor(options: TesseractOcrBackendOptions) {
    this.logger = options.logger;
    this.command = options.command ?? 'tesseract';
    this.languages = options.languages;
  }

  async recognize(request: OcrRequest): Promise<readonly Token[]> {
    const { page } = request;
    if (!page.imagePath) {
      throw new Error(`Page ${page.pageNo} has no rendered image`);
    }

    const args = [page.imagePath, '-'];
    if (this.languages) args.push('-l', this.languages);
    args.push('tsv');

    this.logger.debug(
      `[TesseractOcrBackend] Page ${page.pageNo}: ${this.command} ${args.join(' ')}`,
    );
    const result = await spawnAsync(this.command, args, {
      captureStderr: true,
      rejectOnNonZero: true,
      signal: request.abortSignal,
    });

    const tokens = parseTesseractTsv(result.stdout, page);
    this.logger.debug(
      `[TesseractOcrBackend] Page ${page.pageNo}: ${tokens.length} word(s) (${request.reason})`,
    );
    return tokens;
  }
}
