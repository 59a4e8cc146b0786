import type { LoggerMethods } from '@glyphorder/logger';
import type { SuspectSpan } from '@glyphorder/model';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@glyphorder/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { LlmSpanCorrector } from './llm-span-corrector';

const model: LanguageModel = 'test-text-model';

const span: SuspectSpan = {
  pageNo: 2,
  issueType: 'digit_in_word',
  text: 'w0rd',
  start: 4,
  end: 8,
  contextBefore: 'The ',
  contextAfter: ' is here',
};

const output = {
  correctedText: 'word',
  confidence: 0.9,
  explanation: 'zero read for o',
};

describe('LlmSpanCorrector', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
  });

  test('sends the span with its context and returns the correction', async () => {
    const call = vi.spyOn(LLMCaller, 'call').mockResolvedValue({
      output,
      usage: {
        component: 'LlmSpanCorrector',
        model: 'primary',
        modelName: 'test-text-model',
        inputTokens: 120,
        outputTokens: 20,
        totalTokens: 140,
      },
      usedFallback: false,
    });
    const corrector = new LlmSpanCorrector({ logger: mockLogger, model });

    await expect(corrector.correct(span)).resolves.toEqual(output);
    expect(corrector.name).toBe('llm:test-text-model');
    expect(call).toHaveBeenCalledWith(
      expect.objectContaining({
        userPrompt:
          'Issue: digit_in_word\nBefore: "The "\nSpan: "w0rd"\nAfter: " is here"',
        component: 'LlmSpanCorrector',
        temperature: 0,
      }),
    );
    expect(mockLogger.warn).not.toHaveBeenCalled();
  });

  test('warns when the fallback model answered', async () => {
    vi.spyOn(LLMCaller, 'call').mockResolvedValue({
      output,
      usage: {
        component: 'LlmSpanCorrector',
        model: 'fallback',
        modelName: 'backup-model',
        inputTokens: 120,
        outputTokens: 20,
        totalTokens: 140,
      },
      usedFallback: true,
    });
    const corrector = new LlmSpanCorrector({ logger: mockLogger, model });

    await corrector.correct(span);

    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[LlmSpanCorrector] Page 2: primary model failed, used backup-model',
    );
  });
});
