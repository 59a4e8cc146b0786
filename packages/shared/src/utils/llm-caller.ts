import type { LanguageModel, LanguageModelUsage, ModelMessage } from 'ai';
import type { z } from 'zod';

import { NoObjectGeneratedError, generateObject } from 'ai';

/**
 * Settings shared by text and vision calls
 */
interface BaseCallConfig<TOutput> {
  /**
   * Zod schema for response validation
   */
  schema: z.ZodType<TOutput>;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model, tried once the primary model has failed
   */
  fallbackModel?: LanguageModel;

  /**
   * Transport-level retry count per model, handled by the AI SDK
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'LlmSpanCorrector')
   */
  component: string;
}

/**
 * Configuration for a text LLM call
 */
export interface LLMCallConfig<TOutput> extends BaseCallConfig<TOutput> {
  systemPrompt: string;
  userPrompt: string;
}

/**
 * Configuration for a vision LLM call using the message format
 */
export interface LLMVisionCallConfig<TOutput> extends BaseCallConfig<TOutput> {
  systemPrompt?: string;
  messages: ModelMessage[];
}

/**
 * Token usage of one call, with the model that produced it
 */
export interface CallUsage {
  component: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface LLMCallResult<T> {
  output: T;
  usage: CallUsage;
  usedFallback: boolean;
}

type PromptParams =
  | { system: string; prompt: string }
  | { system?: string; messages: ModelMessage[] };

/**
 * LLMCaller - Structured-output LLM calls with schema retry and fallback
 *
 * 1. Ask the primary model for an object matching the schema, retrying when
 *    the response does not match
 * 2. If the primary model fails and a fallback model is configured, repeat
 *    with the fallback model
 * 3. Validate the object with the schema and return it with usage data
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   schema: spanCorrectionSchema,
 *   systemPrompt: 'You fix OCR errors in short spans of text.',
 *   userPrompt: 'Span: "c1ass"',
 *   primaryModel: openai('gpt-4.1-mini'),
 *   maxRetries: 2,
 *   component: 'LlmSpanCorrector',
 * });
 * ```
 */
export class LLMCaller {
  /**
   * Extra attempts when the model returns an object that fails the schema.
   */
  private static readonly MAX_STRUCTURED_OUTPUT_RETRIES = 2;

  static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  /**
   * Call a text model with system and user prompts
   */
  static async call<TOutput>(
    config: LLMCallConfig<TOutput>,
  ): Promise<LLMCallResult<TOutput>> {
    return this.executeWithFallback(config, {
      system: config.systemPrompt,
      prompt: config.userPrompt,
    });
  }

  /**
   * Call a vision model with a message list (text and image parts)
   */
  static async callVision<TOutput>(
    config: LLMVisionCallConfig<TOutput>,
  ): Promise<LLMCallResult<TOutput>> {
    return this.executeWithFallback(config, {
      system: config.systemPrompt,
      messages: config.messages,
    });
  }

  private static async executeWithFallback<TOutput>(
    config: BaseCallConfig<TOutput>,
    prompt: PromptParams,
  ): Promise<LLMCallResult<TOutput>> {
    try {
      const response = await this.generate(config.primaryModel, config, prompt);
      return {
        output: response.output,
        usage: this.buildUsage(config, config.primaryModel, response.usage, false),
        usedFallback: false,
      };
    } catch (primaryError) {
      // Aborted calls never fall back
      if (config.abortSignal?.aborted || !config.fallbackModel) {
        throw primaryError;
      }

      const response = await this.generate(config.fallbackModel, config, prompt);
      return {
        output: response.output,
        usage: this.buildUsage(config, config.fallbackModel, response.usage, true),
        usedFallback: true,
      };
    }
  }

  private static async generate<TOutput>(
    model: LanguageModel,
    config: BaseCallConfig<TOutput>,
    prompt: PromptParams,
  ): Promise<{ output: TOutput; usage: LanguageModelUsage }> {
    let lastError: unknown;

    for (
      let attempt = 0;
      attempt <= this.MAX_STRUCTURED_OUTPUT_RETRIES;
      attempt++
    ) {
      try {
        const result = await generateObject({
          model,
          schema: config.schema,
          temperature: config.temperature,
          maxRetries: config.maxRetries,
          abortSignal: config.abortSignal,
          ...prompt,
        });
        return {
          output: config.schema.parse(result.object),
          usage: result.usage,
        };
      } catch (error) {
        if (NoObjectGeneratedError.isInstance(error)) {
          lastError = error;
          continue;
        }
        throw error;
      }
    }

    throw lastError;
  }

  private static buildUsage<TOutput>(
    config: BaseCallConfig<TOutput>,
    model: LanguageModel,
    usage: LanguageModelUsage,
    usedFallback: boolean,
  ): CallUsage {
    return {
      component: config.component,
      model: usedFallback ? 'fallback' : 'primary',
      modelName: this.extractModelName(model),
      inputTokens: usage.inputTokens ?? 0,
      outputTokens: usage.outputTokens ?? 0,
      totalTokens: usage.totalTokens ?? 0,
    };
  }
}
