import type { FootnoteDefinition, FootnoteMarker } from './footnote';
import type { PositionBand } from './inventory';
import type { Column } from './layout';
import type { Table } from './table';
import type { BBox } from './token';

export type PageIssueCode =
  | 'EMPTY_TOKEN_STREAM'
  | 'ENCODING_ANOMALY'
  | 'ROTATED_PAGE'
  | 'LOW_CONFIDENCE'
  | 'TABLE_DETECTION_AMBIGUOUS'
  | 'COLLABORATOR_FAILURE'
  | 'OCR_APPLIED'
  | 'LLM_CORRECTION_APPLIED';

export interface PageIssue {
  readonly code: PageIssueCode;
  readonly pageNo: number;
  readonly message: string;
}

export type RemovalReason =
  | 'REPEATING_ELEMENT'
  | 'PAGE_NUMBER_PATTERN'
  | 'MARGIN_PAGE_NUMBER'
  | 'DUPLICATE_GLYPH';

export type RetentionReason =
  | 'SECTION_NUMBER'
  | 'FOOTNOTE_MARKER'
  | 'POLICY_OVERRIDE'
  | 'DEFAULT_ALLOW';

/**
 * Audit entry written for every token the pipeline drops.
 */
export interface RemovalRecord {
  readonly pageNo: number;
  readonly text: string;
  readonly bbox: BBox;
  readonly reason: RemovalReason;
}

/**
 * - ok: extracted normally
 * - degraded: extracted, but a collaborator or transform failed on the way
 * - placeholder: text could not be recovered; a tagged placeholder is emitted
 * - unextractable: no tokens at all
 */
export type PageStatus = 'ok' | 'degraded' | 'placeholder' | 'unextractable';

export interface PageResult {
  readonly pageNo: number;
  readonly status: PageStatus;

  /** Final page text: columns, reinserted tables and the footnote section */
  readonly text: string;

  readonly columns: readonly Column[];
  readonly tables: readonly Table[];
  readonly markers: readonly FootnoteMarker[];
  readonly definitions: readonly FootnoteDefinition[];
  readonly removals: readonly RemovalRecord[];

  /** Tokens that survived filtering and reached the output */
  readonly extractedTokenCount: number;

  /** Surviving tokens bucketed like the inventory, for distribution checks */
  readonly extractedByPosition: Readonly<Record<PositionBand, number>>;

  readonly issues: readonly PageIssue[];
}
