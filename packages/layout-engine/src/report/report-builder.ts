import type {
  CorrectionRecord,
  ExtractionReport,
  PageResult,
  RemovalReason,
} from '@glyphorder/model';

import type { PipelineRun } from '../pipeline/document-pipeline';
import type { RemediationOutcome } from '../remediation/remediation-controller';

export interface ReportInput {
  readonly documentId: string;

  /** Final run, after any span correction */
  readonly run: PipelineRun;
  readonly remediation: Pick<
    RemediationOutcome<PipelineRun>,
    'state' | 'chosenAttempt' | 'attempts'
  >;
  readonly corrections: readonly CorrectionRecord[];
}

export function countRemovals(
  pages: readonly PageResult[],
): Record<RemovalReason, number> {
  const counts: Record<RemovalReason, number> = {
    REPEATING_ELEMENT: 0,
    PAGE_NUMBER_PATTERN: 0,
    MARGIN_PAGE_NUMBER: 0,
    DUPLICATE_GLYPH: 0,
  };
  for (const page of pages) {
    for (const removal of page.removals) {
      counts[removal.reason]++;
    }
  }
  return counts;
}

/**
 * Assemble the JSON-serializable report persisted for each document.
 */
export function buildExtractionReport(input: ReportInput): ExtractionReport {
  const { run, remediation } = input;
  const { verification, footnotes } = run;

  return {
    documentId: input.documentId,
    pageCount: run.pages.length,
    coverage: verification.coverage,
    coverageStatus: verification.coverageStatus,
    flags: verification.flags,
    footnoteMatchRate: verification.footnoteMatchRate,
    tableMatchRate: verification.tableMatchRate,
    unmatchedFootnoteMarkers: footnotes.unmatchedMarkers.map(
      (marker) => marker.markerText,
    ),
    unmatchedFootnoteDefinitions: footnotes.unmatchedDefinitions.map(
      (definition) => definition.markerText,
    ),
    score: run.quality.score,
    grade: run.quality.grade,
    remediation: {
      state: remediation.state,
      chosenAttempt: remediation.chosenAttempt,
      attempts: remediation.attempts,
    },
    pageIssues: run.pages.flatMap((page) => page.issues),
    removals: countRemovals(run.pages),
    corrections: input.corrections,
  };
}

export function serializeReport(report: ExtractionReport): string {
  return JSON.stringify(report, null, 2);
}
