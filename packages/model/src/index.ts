export type {
  BBox,
  DocumentInput,
  LineSegment,
  PageInput,
  Token,
} from './token';
export type { Band, Column } from './layout';
export type {
  Table,
  TableCell,
  TableFormat,
  TableStrategy,
} from './table';
export type {
  FootnoteDefinition,
  FootnoteMarker,
  FootnoteMatch,
  FootnoteReport,
} from './footnote';
export type {
  CoverageStatus,
  DocumentInventory,
  PageInventory,
  PositionBand,
  SizeClass,
} from './inventory';
export type {
  Flag,
  FlagSeverity,
  FlagType,
  VerificationReport,
} from './verification';
export type { QualityGrade, QualityScore } from './quality';
export type {
  PageIssue,
  PageIssueCode,
  PageResult,
  PageStatus,
  RemovalReason,
  RemovalRecord,
  RetentionReason,
} from './page-result';
export type {
  CollaboratorKind,
  CorrectionOutcome,
  CorrectionRecord,
  OcrBackend,
  OcrReason,
  OcrRequest,
  SpanCorrection,
  SpanCorrector,
  SuspectIssueType,
  SuspectSpan,
} from './collaborators';
export type {
  ExtractionReport,
  ExtractionResult,
  RemediationAttempt,
  RemediationState,
} from './report';
