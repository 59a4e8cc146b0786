import type { LanguageModel } from 'ai';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';

export interface ModelFactoryOptions {
  /**
   * Falls back to OPENAI_API_KEY
   */
  openaiApiKey?: string;

  /**
   * Falls back to ANTHROPIC_API_KEY
   */
  anthropicApiKey?: string;
}

/**
 * Converts a model ID string to a LanguageModel instance.
 *
 * Model ID format: "provider/model-name", e.g. "openai/gpt-4.1-mini" or
 * "anthropic/claude-sonnet-4-5".
 */
export function createModel(
  modelId: string,
  options: ModelFactoryOptions = {},
): LanguageModel {
  const [provider, ...rest] = modelId.split('/');
  const modelName = rest.join('/');
  if (!modelName) {
    throw new Error(`Model ID must look like "provider/model": ${modelId}`);
  }

  switch (provider) {
    case 'openai':
      return createOpenAI({
        apiKey: options.openaiApiKey ?? process.env.OPENAI_API_KEY,
      })(modelName);
    case 'anthropic':
      return createAnthropic({
        apiKey: options.anthropicApiKey ?? process.env.ANTHROPIC_API_KEY,
      })(modelName);
    default:
      throw new Error(`Unknown provider: ${provider}`);
  }
}
