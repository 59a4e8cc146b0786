import type { LoggerMethods } from '@glyphorder/logger';
import type {
  SpanCorrection,
  SpanCorrector,
  SuspectSpan,
} from '@glyphorder/model';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@glyphorder/shared';
import { z } from 'zod';

export const spanCorrectionSchema = z.object({
  correctedText: z.string(),
  confidence: z.number().min(0).max(1),
  explanation: z.string(),
});

const SPAN_CORRECTION_SYSTEM_PROMPT = `You fix OCR recognition errors in short spans of text.

You receive one suspect span with the text before and after it. Typical errors: digits read as letters or letters as digits (0/O, 1/l/I, 5/S, 8/B), and characters dropped or merged.

Return only the corrected span, never the context. If the span is already correct, return it unchanged. Do not add formatting, punctuation, or words that are not implied by the span itself. Give your confidence in [0,1] and a one-line explanation.`;

export interface LlmSpanCorrectorOptions {
  logger: LoggerMethods;
  model: LanguageModel;
  fallbackModel?: LanguageModel;

  /**
   * Transport retries per model (default: 2)
   */
  maxRetries?: number;
}

/**
 * Remote span corrector backed by a text language model.
 */
export class LlmSpanCorrector implements SpanCorrector {
  readonly kind = 'remote';
  readonly name: string;

  private readonly logger: LoggerMethods;
  private readonly model: LanguageModel;
  private readonly fallbackModel?: LanguageModel;
  private readonly maxRetries: number;

  constructor(options: LlmSpanCorrectorOptions) {
    this.logger = options.logger;
    this.model = options.model;
    this.fallbackModel = options.fallbackModel;
    this.maxRetries = options.maxRetries ?? 2;
    this.name = `llm:${LLMCaller.extractModelName(options.model)}`;
  }

  static buildPrompt(span: SuspectSpan): string {
    return [
      `Issue: ${span.issueType}`,
      `Before: ${JSON.stringify(span.contextBefore)}`,
      `Span: ${JSON.stringify(span.text)}`,
      `After: ${JSON.stringify(span.contextAfter)}`,
    ].join('\n');
  }

  async correct(
    span: SuspectSpan,
    abortSignal?: AbortSignal,
  ): Promise<SpanCorrection> {
    const result = await LLMCaller.call({
      schema: spanCorrectionSchema,
      systemPrompt: SPAN_CORRECTION_SYSTEM_PROMPT,
      userPrompt: LlmSpanCorrector.buildPrompt(span),
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: 0,
      abortSignal,
      component: 'LlmSpanCorrector',
    });

    if (result.usedFallback) {
      this.logger.warn(
        `[LlmSpanCorrector] Page ${span.pageNo}: primary model failed, used ${result.usage.modelName}`,
      );
    }
    return result.output;
  }
}
