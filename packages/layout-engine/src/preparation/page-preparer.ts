import type { LoggerMethods } from '@glyphorder/logger';
import type {
  DocumentInput,
  LineSegment,
  OcrBackend,
  OcrReason,
  PageInput,
  PageIssue,
  PageStatus,
  Token,
} from '@glyphorder/model';

import type { ExtractionConfig } from '../config/extraction-config';

import { callWithBounds } from '@glyphorder/shared';

import {
  CollaboratorError,
  EmptyDocumentError,
} from '../errors/extraction-error';
import { countCorruptedTokens } from './encoding-rules';
import { isRightAngle, normalizeRotation, rotatePage } from './rotation';

export type PagePreparerConfig = Pick<
  ExtractionConfig,
  | 'ocrWordThreshold'
  | 'encodingAnomalyRatio'
  | 'collaboratorTimeoutMs'
  | 'collaboratorRetries'
>;

/**
 * A page in upright coordinates with the tokens the layout stages will
 * see. Shared read-only by every remediation attempt.
 */
export interface PreparedPage {
  readonly pageNo: number;
  readonly width: number;
  readonly height: number;
  readonly tokens: readonly Token[];
  readonly lines: readonly LineSegment[];
  readonly status: PageStatus;
  readonly issues: readonly PageIssue[];

  /** Text emitted instead of the layout output, for placeholder pages */
  readonly placeholderText?: string;
}

interface Draft {
  width: number;
  height: number;
  tokens: readonly Token[];
  lines: readonly LineSegment[];
  status: PageStatus;
  issues: PageIssue[];
}

/**
 * Turns raw parser pages into PreparedPages: rotation is normalized,
 * encoding anomalies are detected, and sparse or corrupted pages go to the
 * OCR backend when one is configured.
 *
 * Collaborator failures degrade the page and never reject; only
 * cancellation and an empty document do.
 */
export class PagePreparer {
  private readonly logger: LoggerMethods;
  private readonly config: PagePreparerConfig;
  private readonly ocrBackend: OcrBackend;

  constructor(
    logger: LoggerMethods,
    config: PagePreparerConfig,
    ocrBackend: OcrBackend,
  ) {
    this.logger = logger;
    this.config = config;
    this.ocrBackend = ocrBackend;
  }

  /**
   * Prepare every page in order.
   *
   * @throws EmptyDocumentError when no page holds a token afterwards
   */
  async prepare(
    document: DocumentInput,
    abortSignal?: AbortSignal,
  ): Promise<PreparedPage[]> {
    const prepared: PreparedPage[] = [];
    for (const page of document.pages) {
      prepared.push(await this.preparePage(page, abortSignal));
    }

    if (prepared.every((page) => page.tokens.length === 0)) {
      this.logger.error(
        `[PagePreparer] Document ${document.documentId} has no tokens on any page`,
      );
      throw new EmptyDocumentError(document.documentId);
    }
    return prepared;
  }

  async preparePage(
    page: PageInput,
    abortSignal?: AbortSignal,
  ): Promise<PreparedPage> {
    const draft = this.normalizeRotation(page);

    const corrupted = countCorruptedTokens(draft.tokens);
    let anomaly =
      draft.tokens.length > 0 &&
      corrupted / draft.tokens.length > this.config.encodingAnomalyRatio;
    if (anomaly) {
      draft.issues.push({
        code: 'ENCODING_ANOMALY',
        pageNo: page.pageNo,
        message: `${corrupted} of ${draft.tokens.length} token(s) carry encoding artifacts`,
      });
    }

    const sparse = draft.tokens.length < this.config.ocrWordThreshold;
    if ((sparse || anomaly) && this.ocrBackend.kind !== 'none') {
      const reason: OcrReason = anomaly ? 'encoding' : 'sparse';
      const replaced = await this.applyOcr(page, draft, reason, abortSignal);
      if (replaced) anomaly = false;
    }

    if (anomaly) {
      this.logger.warn(
        `[PagePreparer] Page ${page.pageNo}: encoding anomaly without OCR, emitting placeholder`,
      );
      return {
        pageNo: page.pageNo,
        ...draft,
        status: 'placeholder',
        placeholderText: `[unreadable page ${page.pageNo}: encoding anomaly]`,
      };
    }

    if (draft.tokens.length === 0) {
      draft.issues.push({
        code: 'EMPTY_TOKEN_STREAM',
        pageNo: page.pageNo,
        message: `Page ${page.pageNo} has no tokens`,
      });
      this.logger.warn(`[PagePreparer] Page ${page.pageNo}: no tokens`);
      return { pageNo: page.pageNo, ...draft, status: 'unextractable' };
    }

    return { pageNo: page.pageNo, ...draft };
  }

  private normalizeRotation(page: PageInput): Draft {
    const rotation = normalizeRotation(page.rotation ?? 0);
    const draft: Draft = {
      width: page.width,
      height: page.height,
      tokens: page.tokens,
      lines: page.lines ?? [],
      status: 'ok',
      issues: [],
    };
    if (rotation === 0) return draft;

    if (!isRightAngle(rotation)) {
      draft.status = 'degraded';
      draft.issues.push({
        code: 'LOW_CONFIDENCE',
        pageNo: page.pageNo,
        message: `Unsupported rotation ${rotation} degrees; coordinates left unchanged`,
      });
      this.logger.warn(
        `[PagePreparer] Page ${page.pageNo}: cannot normalize rotation ${rotation}`,
      );
      return draft;
    }

    const upright = rotatePage(page, rotation);
    draft.issues.push({
      code: 'ROTATED_PAGE',
      pageNo: page.pageNo,
      message: `Page rotated ${rotation} degrees; coordinates normalized`,
    });
    this.logger.debug(
      `[PagePreparer] Page ${page.pageNo}: normalized ${rotation} degree rotation`,
    );
    return { ...draft, ...upright };
  }

  /**
   * Returns true when OCR tokens replaced the page's tokens.
   */
  private async applyOcr(
    page: PageInput,
    draft: Draft,
    reason: OcrReason,
    abortSignal: AbortSignal | undefined,
  ): Promise<boolean> {
    const backend = this.ocrBackend;
    try {
      const tokens = await callWithBounds(
        (signal) => backend.recognize({ page, reason, abortSignal: signal }),
        {
          timeoutMs: this.config.collaboratorTimeoutMs,
          retries: this.config.collaboratorRetries,
          abortSignal,
          onRetry: (error, nextAttempt) =>
            this.logger.warn(
              `[PagePreparer] Page ${page.pageNo}: ${backend.name} failed (${CollaboratorError.getErrorMessage(error)}), attempt ${nextAttempt}`,
            ),
        },
      );

      const useful =
        reason === 'encoding'
          ? tokens.length > 0
          : tokens.length > draft.tokens.length;
      if (!useful) {
        this.logger.debug(
          `[PagePreparer] Page ${page.pageNo}: ${backend.name} returned ${tokens.length} token(s), keeping parser output`,
        );
        return false;
      }

      draft.issues.push({
        code: 'OCR_APPLIED',
        pageNo: page.pageNo,
        message: `Replaced ${draft.tokens.length} token(s) with ${tokens.length} from ${backend.name} (${reason})`,
      });
      draft.tokens = tokens;
      this.logger.info(
        `[PagePreparer] Page ${page.pageNo}: applied ${tokens.length} OCR token(s) from ${backend.name}`,
      );
      return true;
    } catch (error) {
      if (abortSignal?.aborted) throw error;

      const wrapped = CollaboratorError.wrap(backend.name, error);
      draft.status = 'degraded';
      draft.issues.push({
        code: 'COLLABORATOR_FAILURE',
        pageNo: page.pageNo,
        message: wrapped.message,
      });
      this.logger.warn(
        `[PagePreparer] Page ${page.pageNo}: OCR failed, keeping parser output: ${wrapped.message}`,
      );
      return false;
    }
  }
}
