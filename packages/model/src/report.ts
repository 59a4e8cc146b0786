import type { CorrectionRecord } from './collaborators';
import type { FootnoteReport } from './footnote';
import type { CoverageStatus } from './inventory';
import type { PageIssue, PageResult, RemovalReason } from './page-result';
import type { QualityGrade, QualityScore } from './quality';
import type { Flag, VerificationReport } from './verification';

export type RemediationState = 'accepted' | 'exhausted' | 'cancelled';

export interface RemediationAttempt {
  /** 1-based attempt number */
  readonly attempt: number;

  /** Label of the parameter set used */
  readonly label: string;
  readonly score: number;
  readonly grade: QualityGrade;
  readonly coverage: number;
}

/**
 * JSON-serializable per-document report.
 */
export interface ExtractionReport {
  readonly documentId: string;
  readonly pageCount: number;
  readonly coverage: number;
  readonly coverageStatus: CoverageStatus;
  readonly flags: readonly Flag[];
  readonly footnoteMatchRate: number;
  readonly tableMatchRate: number;
  readonly unmatchedFootnoteMarkers: readonly string[];
  readonly unmatchedFootnoteDefinitions: readonly string[];
  readonly score: number;
  readonly grade: QualityGrade;
  readonly remediation: {
    readonly state: RemediationState;
    readonly chosenAttempt: number;
    readonly attempts: readonly RemediationAttempt[];
  };
  readonly pageIssues: readonly PageIssue[];
  readonly removals: Readonly<Record<RemovalReason, number>>;
  readonly corrections: readonly CorrectionRecord[];
}

/**
 * Everything handed to the output consumer for one document.
 */
export interface ExtractionResult {
  readonly documentId: string;
  readonly pages: readonly PageResult[];
  readonly footnotes: FootnoteReport;
  readonly verification: VerificationReport;
  readonly quality: QualityScore;
  readonly report: ExtractionReport;
}
