import type { PageInput, Token } from './token';

/**
 * Capability variant of an optional collaborator.
 *
 * The pipeline only depends on the interfaces below; `none` variants make
 * the capability explicit without a null check at every call site.
 */
export type CollaboratorKind = 'none' | 'local' | 'remote';

export type OcrReason = 'sparse' | 'encoding';

export interface OcrRequest {
  readonly page: PageInput;
  readonly reason: OcrReason;
  readonly abortSignal?: AbortSignal;
}

/**
 * Recognises text on a rendered page and returns Token-compatible output
 * with per-token confidence.
 */
export interface OcrBackend {
  readonly kind: CollaboratorKind;
  readonly name: string;
  recognize(request: OcrRequest): Promise<readonly Token[]>;
}

export type SuspectIssueType =
  | 'digit_in_word'
  | 'letter_in_number'
  | 'ambiguous_il1'
  | 'ambiguous_o0'
  | 'low_ocr_confidence';

/**
 * A flagged span of page text handed to the span corrector.
 */
export interface SuspectSpan {
  readonly pageNo: number;
  readonly issueType: SuspectIssueType;
  readonly text: string;

  /** Character offsets into the page text */
  readonly start: number;
  readonly end: number;

  readonly contextBefore: string;
  readonly contextAfter: string;
}

export interface SpanCorrection {
  readonly correctedText: string;

  /** Corrector confidence in [0,1] */
  readonly confidence: number;
  readonly explanation: string;
}

export interface SpanCorrector {
  readonly kind: CollaboratorKind;
  readonly name: string;
  correct(span: SuspectSpan, abortSignal?: AbortSignal): Promise<SpanCorrection>;
}

export type CorrectionOutcome =
  | 'applied'
  | 'unchanged'
  | 'below_cutoff'
  | 'rejected_unsupported'
  | 'failed';

/**
 * Audit entry for every span sent to the corrector.
 */
export interface CorrectionRecord {
  readonly pageNo: number;
  readonly issueType: SuspectIssueType;
  readonly original: string;
  readonly corrected: string;
  readonly confidence: number;
  readonly outcome: CorrectionOutcome;
}
