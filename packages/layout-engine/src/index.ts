/**
 * @glyphorder/layout-engine
 *
 * Reconstructs reading-order text from positioned glyph tokens.
 *
 * ## Key Features
 *
 * - Column segmentation and band-based reading order
 * - Header, footer and page-number removal with audited reasons
 * - Superscript/subscript attachment and footnote matching
 * - Table detection from ruled lines and text alignment
 * - Inventory-based verification, quality scoring and remediation
 *
 * @packageDocumentation
 */

export { LayoutExtractor } from './extractor/layout-extractor';
export type {
  ExtractOptions,
  LayoutExtractorOptions,
} from './extractor/layout-extractor';
export { BatchExtractor } from './extractor/batch-extractor';
export type {
  BatchExtractorOptions,
  BatchItemResult,
} from './extractor/batch-extractor';
export {
  DEFAULT_PARAMETER_SETS,
  applyParameterSet,
  createExtractionConfig,
  extractionConfigSchema,
} from './config/extraction-config';
export type {
  ExtractionConfig,
  ExtractionConfigInput,
  ParameterSet,
} from './config/extraction-config';
export {
  CollaboratorError,
  EmptyDocumentError,
  ExtractionError,
  InvalidConfigError,
  MalformedTokenStreamError,
} from './errors/extraction-error';
export type { ValidationIssue } from './errors/extraction-error';
export {
  NoOcrBackend,
  NoSpanCorrector,
} from './collaborators/none-collaborators';
export { validateDocumentInput } from './types/token-schema';
export { PagePreparer } from './preparation/page-preparer';
export type { PreparedPage } from './preparation/page-preparer';
export { DocumentPipeline } from './pipeline/document-pipeline';
export type { PipelineRun } from './pipeline/document-pipeline';
export { PageAssembler } from './pipeline/page-assembler';
export { RepeatingElementDetector } from './detectors/repeating-element-detector';
export { ColumnSegmenter } from './layout/column-segmenter';
export { ReadingOrderSorter } from './layout/reading-order-sorter';
export { MetadataFilter } from './filters/metadata-filter';
export { RetentionPolicy } from './filters/retention-policy';
export { METADATA_RULES } from './filters/metadata-rules';
export { ScriptAttacher } from './scripts/script-attacher';
export { TableDetector } from './tables/table-detector';
export { formatTable } from './tables/table-formatter';
export { FootnoteExtractor } from './footnotes/footnote-extractor';
export { FootnoteMatcher } from './footnotes/footnote-matcher';
export { MARKER_RULES } from './footnotes/footnote-patterns';
export { ElementInventory } from './inventory/element-inventory';
export { AntiHallucinationVerifier } from './verification/anti-hallucination-verifier';
export { HALLUCINATION_RULES } from './verification/hallucination-rules';
export type { HallucinationRule } from './verification/hallucination-rules';
export { QualityScorer } from './scoring/quality-scorer';
export { RemediationController } from './remediation/remediation-controller';
export type { RemediationOutcome } from './remediation/remediation-controller';
export { SuspectSpanDetector } from './correction/suspect-span-detector';
export { SpanCorrectionApplier } from './correction/span-correction-applier';
export {
  buildExtractionReport,
  serializeReport,
} from './report/report-builder';
export {
  checkPageMarkers,
  renderDocumentText,
} from './report/document-text-renderer';
