import type { LoggerMethods } from '@glyphorder/logger';
import type {
  CorrectionRecord,
  DocumentInput,
  DocumentInventory,
  ExtractionResult,
  OcrBackend,
  PageResult,
  SpanCorrector,
} from '@glyphorder/model';

import type {
  ExtractionConfig,
  ExtractionConfigInput,
  ParameterSet,
} from '../config/extraction-config';
import type { PipelineRun } from '../pipeline/document-pipeline';
import type { PreparedPage } from '../preparation/page-preparer';

import { Logger } from '@glyphorder/logger';

import {
  NoOcrBackend,
  NoSpanCorrector,
} from '../collaborators/none-collaborators';
import {
  DEFAULT_PARAMETER_SETS,
  createExtractionConfig,
} from '../config/extraction-config';
import { SpanCorrectionApplier } from '../correction/span-correction-applier';
import { MalformedTokenStreamError } from '../errors/extraction-error';
import { ElementInventory } from '../inventory/element-inventory';
import { DocumentPipeline } from '../pipeline/document-pipeline';
import { PagePreparer } from '../preparation/page-preparer';
import { RemediationController } from '../remediation/remediation-controller';
import { buildExtractionReport } from '../report/report-builder';
import { validateDocumentInput } from '../types/token-schema';

/**
 * LayoutExtractor Options
 */
export interface LayoutExtractorOptions {
  /**
   * Logger instance (default: silent)
   */
  logger?: LoggerMethods;

  /**
   * Threshold overrides, validated and frozen at construction
   */
  config?: ExtractionConfigInput;

  /**
   * OCR collaborator for sparse or corrupted pages (default: none)
   */
  ocrBackend?: OcrBackend;

  /**
   * Corrector for suspect OCR spans (default: none)
   */
  spanCorrector?: SpanCorrector;

  /**
   * Remediation parameter sets, tried in order up to `maxAttempts`
   */
  parameterSets?: readonly ParameterSet[];
}

export interface ExtractOptions {
  /**
   * Cancels collaborator calls and remediation. Once an attempt has
   * completed its result is returned instead of an AbortError.
   */
  abortSignal?: AbortSignal;
}

/**
 * LayoutExtractor
 *
 * Turns one document's upstream token stream into reading-order page text
 * with a verification report and quality score.
 *
 * ## Extraction Process
 *
 * 1. Validate the token stream
 * 2. Prepare pages (rotation, encoding anomalies, OCR)
 * 3. Capture the frozen element inventory
 * 4. Run the pipeline under each remediation parameter set until one is
 *    accepted
 * 5. Correct suspect spans when a span corrector is configured, then verify
 *    and score again
 * 6. Build the report
 *
 * @example
 * ```typescript
 * const extractor = new LayoutExtractor({
 *   logger: console,
 *   config: { columnGap: 40, tableFormat: 'plain' },
 * });
 * const result = await extractor.extract(parserOutput);
 * console.log(result.report.grade, result.pages[0].text);
 * ```
 */
export class LayoutExtractor {
  private readonly logger: LoggerMethods;
  private readonly config: ExtractionConfig;
  private readonly ocrBackend: OcrBackend;
  private readonly spanCorrector: SpanCorrector;
  private readonly parameterSets: readonly ParameterSet[];

  constructor(options: LayoutExtractorOptions = {}) {
    this.logger = options.logger ?? Logger.silent();
    this.config = createExtractionConfig(options.config);
    this.ocrBackend = options.ocrBackend ?? new NoOcrBackend();
    this.spanCorrector = options.spanCorrector ?? new NoSpanCorrector();
    this.parameterSets = options.parameterSets ?? DEFAULT_PARAMETER_SETS;
  }

  /**
   * @throws MalformedTokenStreamError when the input fails validation
   * @throws EmptyDocumentError when no page holds a token
   * @throws AbortError when cancelled before the first attempt completes
   */
  async extract(
    input: unknown,
    options: ExtractOptions = {},
  ): Promise<ExtractionResult> {
    const { abortSignal } = options;
    const document = this.validate(input);
    this.logger.info(
      `[LayoutExtractor] Extracting ${document.documentId}: ${document.pages.length} page(s)`,
    );

    const prepared = await new PagePreparer(
      this.logger,
      this.config,
      this.ocrBackend,
    ).prepare(document, abortSignal);
    const inventory = ElementInventory.capture(prepared);

    const remediation = new RemediationController(
      this.logger,
      this.config,
      this.parameterSets,
    ).execute(
      (config) => new DocumentPipeline(this.logger, config).run(prepared, inventory),
      abortSignal,
    );

    let run = remediation.best;
    let corrections: CorrectionRecord[] = [];
    if (this.spanCorrector.kind !== 'none') {
      ({ run, corrections } = await this.correctSpans(
        run,
        prepared,
        inventory,
        abortSignal,
      ));
    }

    const report = buildExtractionReport({
      documentId: document.documentId,
      run,
      remediation,
      corrections,
    });
    this.logger.info(
      `[LayoutExtractor] ${document.documentId}: score ${report.score} (${report.grade}), coverage ${report.coverage.toFixed(3)}, remediation ${report.remediation.state}`,
    );

    return {
      documentId: document.documentId,
      pages: run.pages,
      footnotes: run.footnotes,
      verification: run.verification,
      quality: run.quality,
      report,
    };
  }

  private validate(input: unknown): DocumentInput {
    try {
      return validateDocumentInput(input);
    } catch (error) {
      if (error instanceof MalformedTokenStreamError) {
        this.logger.error(`[LayoutExtractor] ${error.getSummary()}`);
      }
      throw error;
    }
  }

  /**
   * Correct suspect spans page by page, then verify and score the changed
   * text. Cancellation keeps the pages corrected so far.
   */
  private async correctSpans(
    run: PipelineRun,
    prepared: readonly PreparedPage[],
    inventory: DocumentInventory,
    abortSignal: AbortSignal | undefined,
  ): Promise<{ run: PipelineRun; corrections: CorrectionRecord[] }> {
    const applier = new SpanCorrectionApplier(
      this.logger,
      this.config,
      this.spanCorrector,
    );
    const tokensByPage = new Map(
      prepared.map((page) => [page.pageNo, page.tokens]),
    );
    const pages: PageResult[] = [...run.pages];
    const corrections: CorrectionRecord[] = [];

    for (const [i, page] of run.pages.entries()) {
      try {
        const corrected = await applier.correctPage(
          page,
          tokensByPage.get(page.pageNo) ?? [],
          abortSignal,
        );
        pages[i] = corrected.page;
        corrections.push(...corrected.records);
      } catch (error) {
        if (!abortSignal?.aborted) throw error;
        this.logger.warn(
          `[LayoutExtractor] Span correction cancelled at page ${page.pageNo}`,
        );
        break;
      }
    }

    return {
      run: new DocumentPipeline(this.logger, this.config).evaluate(
        pages,
        prepared,
        inventory,
        run.footnotes,
      ),
      corrections,
    };
  }
}
