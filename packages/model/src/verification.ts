import type { CoverageStatus } from './inventory';

export type FlagType =
  | 'hallucination'
  | 'missing_content'
  | 'footnote_mismatch'
  | 'table_issue'
  | 'encoding_error'
  | 'layout_issue'
  | 'ocr_error'
  | 'low_confidence';

export type FlagSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * A recorded finding for review. Flags never block extraction.
 */
export interface Flag {
  readonly type: FlagType;
  readonly severity: FlagSeverity;

  /** 1-based page number, 0 for document-wide findings */
  readonly pageNo: number;

  /** Rule identifier that produced the flag */
  readonly rule: string;
  readonly message: string;

  /** Offending text, when the flag concerns a span */
  readonly span?: string;

  /** Whether the span was removed from the output */
  readonly stripped: boolean;
}

export interface VerificationReport {
  /** Extracted tokens / inventory total, clamped to [0,1] */
  readonly coverage: number;
  readonly coverageStatus: CoverageStatus;

  /** Output element count / inventory count */
  readonly elementCountRatio: number;

  /** 1 - half the L1 distance of position distributions */
  readonly positionSimilarity: number;

  /** Both inventory checks passed */
  readonly passed: boolean;

  readonly flags: readonly Flag[];
  readonly footnoteMatchRate: number;

  /** Average table confidence, 1 when no table was detected */
  readonly tableMatchRate: number;

  /** Band tops non-decreasing in every column of every page */
  readonly orderingConsistent: boolean;
}
