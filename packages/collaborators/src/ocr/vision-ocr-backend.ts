import type { LoggerMethods } from '@glyphorder/logger';
import type { OcrBackend, OcrRequest, Token } from '@glyphorder/model';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@glyphorder/shared';
import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Words with boxes normalized to [0,1] of the page image
 */
export const visionOcrSchema = z.object({
  words: z.array(
    z.object({
      text: z.string(),
      x0: z.number().min(0).max(1),
      y0: z.number().min(0).max(1),
      x1: z.number().min(0).max(1),
      y1: z.number().min(0).max(1),
      confidence: z.number().min(0).max(1),
    }),
  ),
});

export type VisionOcrOutput = z.infer<typeof visionOcrSchema>;

const VISION_OCR_SYSTEM_PROMPT = `You are an OCR engine. Read every word printed on the page image.

Return each word exactly as printed, with its bounding box as fractions of the image width and height (x0,y0 top-left, x1,y1 bottom-right, origin at the top-left corner) and your confidence in [0,1].

Do not translate, summarize, reorder, or add any text that is not printed on the page.`;

export interface VisionOcrBackendOptions {
  logger: LoggerMethods;
  model: LanguageModel;
  fallbackModel?: LanguageModel;

  /**
   * Transport retries per model (default: 2)
   */
  maxRetries?: number;
}

/**
 * Remote OCR through a vision language model.
 */
export class VisionOcrBackend implements OcrBackend {
  readonly kind = 'remote';
  readonly name: string;

  private readonly logger: LoggerMethods;
  private readonly model: LanguageModel;
  private readonly fallbackModel?: LanguageModel;
  private readonly maxRetries: number;

  constructor(options: VisionOcrBackendOptions) {
    this.logger = options.logger;
    this.model = options.model;
    this.fallbackModel = options.fallbackModel;
    this.maxRetries = options.maxRetries ?? 2;
    this.name = `vision:${LLMCaller.extractModelName(options.model)}`;
  }

  async recognize(request: OcrRequest): Promise<readonly Token[]> {
    const { page } = request;
    if (!page.imagePath) {
      throw new Error(`Page ${page.pageNo} has no rendered image`);
    }
    const image = readFileSync(page.imagePath).toString('base64');

    const result = await LLMCaller.callVision({
      schema: visionOcrSchema,
      systemPrompt: VISION_OCR_SYSTEM_PROMPT,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: `Page ${page.pageNo}` },
            { type: 'image', image: `data:image/png;base64,${image}` },
          ],
        },
      ],
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: 0,
      abortSignal: request.abortSignal,
      component: 'VisionOcrBackend',
    });

    this.logger.debug(
      `[VisionOcrBackend] Page ${page.pageNo}: ${result.output.words.length} word(s), ${result.usage.totalTokens} token(s) from ${result.usage.modelName}`,
    );

    return result.output.words
      .filter((word) => word.text.trim().length > 0)
      .map((word) => {
        const y0 = word.y0 * page.height;
        const y1 = word.y1 * page.height;
        return {
          text: word.text.trim(),
          bbox: {
            x0: word.x0 * page.width,
            y0,
            x1: word.x1 * page.width,
            y1,
          },
          fontSize: y1 - y0,
          baselineY: y1,
          pageNo: page.pageNo,
          confidence: word.confidence,
        };
      });
  }
}
