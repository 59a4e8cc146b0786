import type { LoggerMethods } from '@glyphorder/logger';
import type {
  CorrectionOutcome,
  CorrectionRecord,
  PageIssue,
  PageResult,
  SpanCorrection,
  SpanCorrector,
  SuspectSpan,
  Token,
} from '@glyphorder/model';

import type { ExtractionConfig } from '../config/extraction-config';
import type { SourceCorpus } from '../verification/hallucination-rules';

import { callWithBounds } from '@glyphorder/shared';

import { CollaboratorError } from '../errors/extraction-error';
import {
  buildSourceCorpus,
  scanForHallucinations,
} from '../verification/hallucination-rules';
import { SuspectSpanDetector } from './suspect-span-detector';

export type SpanCorrectionConfig = Pick<
  ExtractionConfig,
  | 'llmConfidenceCutoff'
  | 'llmContextChars'
  | 'collaboratorTimeoutMs'
  | 'collaboratorRetries'
>;

export interface PageCorrection {
  readonly page: PageResult;
  readonly records: readonly CorrectionRecord[];
}

/**
 * Sends a page's suspect spans to the span corrector and splices accepted
 * corrections back into the text.
 *
 * A correction is applied only when it changes the span, meets
 * `llmConfidenceCutoff`, and introduces nothing the hallucination rules
 * reject. Every span sent yields a CorrectionRecord.
 */
export class SpanCorrectionApplier {
  private readonly logger: LoggerMethods;
  private readonly config: SpanCorrectionConfig;
  private readonly corrector: SpanCorrector;
  private readonly detector: SuspectSpanDetector;

  constructor(
    logger: LoggerMethods,
    config: SpanCorrectionConfig,
    corrector: SpanCorrector,
  ) {
    this.logger = logger;
    this.config = config;
    this.corrector = corrector;
    this.detector = new SuspectSpanDetector(config);
  }

  async correctPage(
    page: PageResult,
    sourceTokens: readonly Token[],
    abortSignal?: AbortSignal,
  ): Promise<PageCorrection> {
    if (page.status === 'placeholder' || page.status === 'unextractable') {
      return { page, records: [] };
    }
    const spans = this.detector.detect(page, sourceTokens);
    if (spans.length === 0) return { page, records: [] };

    const corpus = buildSourceCorpus(sourceTokens.map((token) => token.text));
    const records: CorrectionRecord[] = [];
    const applied: { span: SuspectSpan; text: string }[] = [];
    let failure: CollaboratorError | undefined;

    for (const span of spans) {
      const base = {
        pageNo: span.pageNo,
        issueType: span.issueType,
        original: span.text,
      };
      try {
        const correction = await callWithBounds(
          (signal) => this.corrector.correct(span, signal),
          {
            timeoutMs: this.config.collaboratorTimeoutMs,
            retries: this.config.collaboratorRetries,
            abortSignal,
          },
        );
        const outcome = this.judge(span, correction, corpus);

        records.push({
          ...base,
          corrected: correction.correctedText,
          confidence: correction.confidence,
          outcome,
        });
        if (outcome === 'applied') {
          applied.push({ span, text: correction.correctedText });
        }
      } catch (error) {
        if (abortSignal?.aborted) throw error;
        failure = CollaboratorError.wrap(this.corrector.name, error);
        records.push({
          ...base,
          corrected: span.text,
          confidence: 0,
          outcome: 'failed',
        });
      }
    }

    const issues: PageIssue[] = [...page.issues];
    if (applied.length > 0) {
      issues.push({
        code: 'LLM_CORRECTION_APPLIED',
        pageNo: page.pageNo,
        message: `Applied ${applied.length} of ${spans.length} correction(s) from ${this.corrector.name}`,
      });
      this.logger.info(
        `[SpanCorrectionApplier] Page ${page.pageNo}: applied ${applied.length}/${spans.length} correction(s)`,
      );
    }
    if (failure) {
      issues.push({
        code: 'COLLABORATOR_FAILURE',
        pageNo: page.pageNo,
        message: failure.message,
      });
      this.logger.warn(
        `[SpanCorrectionApplier] Page ${page.pageNo}: ${failure.message}`,
      );
    }

    let text = page.text;
    for (const { span, text: replacement } of [...applied].reverse()) {
      text = text.slice(0, span.start) + replacement + text.slice(span.end);
    }

    return {
      page: {
        ...page,
        text,
        status: failure ? 'degraded' : page.status,
        issues,
      },
      records,
    };
  }

  private judge(
    span: SuspectSpan,
    correction: SpanCorrection,
    corpus: SourceCorpus,
  ): CorrectionOutcome {
    if (correction.correctedText === span.text) return 'unchanged';
    if (correction.confidence < this.config.llmConfidenceCutoff) {
      return 'below_cutoff';
    }
    if (scanForHallucinations(correction.correctedText, corpus).length > 0) {
      return 'rejected_unsupported';
    }
    return 'applied';
  }
}
