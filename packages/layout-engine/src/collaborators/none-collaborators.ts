import type {
  OcrBackend,
  SpanCorrection,
  SpanCorrector,
  SuspectSpan,
  Token,
} from '@glyphorder/model';

/**
 * OCR capability switched off. The preparer never calls it; a direct call
 * recognizes nothing.
 */
export class NoOcrBackend implements OcrBackend {
  readonly kind = 'none';
  readonly name = 'none';

  async recognize(): Promise<readonly Token[]> {
    return [];
  }
}

/**
 * Span correction switched off. A direct call returns the span unchanged.
 */
export class NoSpanCorrector implements SpanCorrector {
  readonly kind = 'none';
  readonly name = 'none';

  async correct(span: SuspectSpan): Promise<SpanCorrection> {
    return { correctedText: span.text, confidence: 0, explanation: '' };
  }
}
