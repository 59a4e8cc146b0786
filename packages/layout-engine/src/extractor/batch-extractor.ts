import type { LoggerMethods } from '@glyphorder/logger';
import type { ExtractionResult } from '@glyphorder/model';

import type { ExtractOptions, LayoutExtractorOptions } from './layout-extractor';

import { Logger } from '@glyphorder/logger';
import { ConcurrentPool } from '@glyphorder/shared';

import { BATCH } from '../config/constants';
import { ExtractionError } from '../errors/extraction-error';
import { LayoutExtractor } from './layout-extractor';

export interface BatchExtractorOptions extends LayoutExtractorOptions {
  /**
   * Documents extracted at once (default: 4)
   */
  concurrency?: number;
}

export type BatchItemResult =
  | {
      documentId: string;
      status: 'fulfilled';
      result: ExtractionResult;
    }
  | {
      documentId: string;
      status: 'rejected';
      error: Error;
    };

/**
 * Best-effort id of a raw input, used to label failures of inputs that may
 * not pass validation.
 */
function documentIdOf(input: unknown, index: number): string {
  if (
    typeof input === 'object' &&
    input !== null &&
    'documentId' in input &&
    typeof input.documentId === 'string' &&
    input.documentId.length > 0
  ) {
    return input.documentId;
  }
  return `#${index + 1}`;
}

/**
 * BatchExtractor
 *
 * Extracts several documents through a worker pool. Each document gets its
 * own LayoutExtractor, so nothing is shared between documents. A failing
 * document becomes a rejected entry; the batch itself never rejects.
 */
export class BatchExtractor {
  private readonly logger: LoggerMethods;
  private readonly options: BatchExtractorOptions;

  constructor(options: BatchExtractorOptions = {}) {
    this.logger = options.logger ?? Logger.silent();
    this.options = options;
  }

  /**
   * @returns One entry per input, in input order
   */
  async extractAll(
    inputs: readonly unknown[],
    options: ExtractOptions = {},
  ): Promise<BatchItemResult[]> {
    const concurrency = this.options.concurrency ?? BATCH.DEFAULT_CONCURRENCY;
    this.logger.info(
      `[BatchExtractor] Extracting ${inputs.length} document(s) with concurrency ${concurrency}`,
    );

    const outcomes = await ConcurrentPool.runSettled(
      inputs,
      (input) =>
        new LayoutExtractor({ ...this.options, logger: this.logger }).extract(
          input,
          options,
        ),
      {
        concurrency,
        abortSignal: options.abortSignal,
        onItemComplete: (outcome, index) => {
          if (outcome.status === 'rejected') {
            this.logger.warn(
              `[BatchExtractor] Document ${documentIdOf(inputs[index], index)} failed: ${ExtractionError.getErrorMessage(outcome.reason)}`,
            );
          }
        },
      },
    );

    const results = outcomes.map((outcome, index): BatchItemResult => {
      const documentId = documentIdOf(inputs[index], index);
      return outcome.status === 'fulfilled'
        ? { documentId, status: 'fulfilled', result: outcome.value }
        : {
            documentId,
            status: 'rejected',
            error:
              outcome.reason instanceof Error
                ? outcome.reason
                : new ExtractionError(
                    ExtractionError.getErrorMessage(outcome.reason),
                  ),
          };
    });

    const failed = results.filter((r) => r.status === 'rejected').length;
    this.logger.info(
      `[BatchExtractor] Finished: ${results.length - failed} succeeded, ${failed} failed`,
    );
    return results;
  }
}
