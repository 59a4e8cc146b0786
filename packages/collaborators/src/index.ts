/**
 * @glyphorder/collaborators
 *
 * OCR backends, span correctors and a model factory for the optional
 * collaborator interfaces of @glyphorder/layout-engine.
 *
 * @packageDocumentation
 */

export { TesseractOcrBackend } from './ocr/tesseract-ocr-backend';
export type { TesseractOcrBackendOptions } from './ocr/tesseract-ocr-backend';
export { parseTesseractTsv } from './ocr/tesseract-tsv';
export { VisionOcrBackend, visionOcrSchema } from './ocr/vision-ocr-backend';
export type {
  VisionOcrBackendOptions,
  VisionOcrOutput,
} from './ocr/vision-ocr-backend';
export {
  LlmSpanCorrector,
  spanCorrectionSchema,
} from './correction/llm-span-corrector';
export type { LlmSpanCorrectorOptions } from './correction/llm-span-corrector';
export { createModel } from './models/model-factory';
export type { ModelFactoryOptions } from './models/model-factory';
