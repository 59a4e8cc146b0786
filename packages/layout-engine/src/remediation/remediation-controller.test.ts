import type { LoggerMethods } from '@glyphorder/logger';

import type { ExtractionConfig } from '../config/extraction-config';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { createExtractionConfig } from '../config/extraction-config';
import { QualityScorer } from '../scoring/quality-scorer';
import { RemediationController } from './remediation-controller';

const scored = (score: number, coverage = 0.9) => ({
  quality: {
    score,
    grade: QualityScorer.grade(score),
    components: {
      coverage,
      hallucination: 1,
      footnotes: 1,
      tables: 1,
      ordering: 1,
    },
  },
  verification: {
    coverage,
    coverageStatus: 'GOOD' as const,
    elementCountRatio: coverage,
    positionSimilarity: 1,
    passed: true,
    flags: [],
    footnoteMatchRate: 1,
    tableMatchRate: 1,
    orderingConsistent: true,
  },
});

describe('RemediationController', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
  });

  const queue = (...runs: ReturnType<typeof scored>[]) => {
    const seen: ExtractionConfig[] = [];
    const run = vi.fn((config: ExtractionConfig) => {
      seen.push(config);
      const next = runs[seen.length - 1];
      if (!next) throw new Error('unexpected attempt');
      return next;
    });
    return { run, seen };
  };

  test('accepts the first attempt when it meets both thresholds', () => {
    const controller = new RemediationController(
      mockLogger,
      createExtractionConfig(),
    );
    const { run, seen } = queue(scored(85));

    const outcome = controller.execute(run);

    expect(outcome.state).toBe('accepted');
    expect(outcome.chosenAttempt).toBe(1);
    expect(outcome.best.quality.score).toBe(85);
    expect(outcome.attempts).toEqual([
      { attempt: 1, label: 'baseline', score: 85, grade: 'B', coverage: 0.9 },
    ]);
    expect(seen[0].marginFiltering).toBe(true);
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[RemediationController] Attempt 1 (baseline): score 85, coverage 0.900',
    );
  });

  test('retries with margin filtering off after a low score', () => {
    const controller = new RemediationController(
      mockLogger,
      createExtractionConfig(),
    );
    const { run, seen } = queue(scored(55), scored(72));

    const outcome = controller.execute(run);

    expect(outcome.state).toBe('accepted');
    expect(outcome.chosenAttempt).toBe(2);
    expect(seen.map((config) => config.marginFiltering)).toEqual([true, false]);
    expect(outcome.attempts.map((a) => a.label)).toEqual([
      'baseline',
      'margin-filtering-off',
    ]);
  });

  test('keeps the best attempt once attempts are exhausted', () => {
    const controller = new RemediationController(
      mockLogger,
      createExtractionConfig(),
    );
    const { run } = queue(scored(60), scored(50));

    const outcome = controller.execute(run);

    expect(outcome.state).toBe('exhausted');
    expect(outcome.chosenAttempt).toBe(1);
    expect(outcome.best.quality.score).toBe(60);
    expect(run).toHaveBeenCalledTimes(2);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[RemediationController] No attempt met the thresholds; keeping attempt 1 (score 60)',
    );
  });

  test('prefers the earliest attempt on a tie', () => {
    const controller = new RemediationController(
      mockLogger,
      createExtractionConfig({ maxAttempts: 5 }),
    );
    const { run, seen } = queue(scored(55), scored(65), scored(65));

    const outcome = controller.execute(run);

    expect(run).toHaveBeenCalledTimes(3);
    expect(outcome.chosenAttempt).toBe(2);
    expect(seen[2].columnGap).toBeCloseTo(30, 10);
  });

  test('a high score with low coverage is not accepted', () => {
    const controller = new RemediationController(
      mockLogger,
      createExtractionConfig({ maxAttempts: 1 }),
    );
    const { run } = queue(scored(90, 0.5));

    expect(controller.execute(run).state).toBe('exhausted');
  });

  test('throws when cancelled before the first attempt', () => {
    const controller = new RemediationController(
      mockLogger,
      createExtractionConfig(),
    );
    const abort = new AbortController();
    abort.abort();
    const { run } = queue(scored(85));

    expect(() => controller.execute(run, abort.signal)).toThrow(
      'Operation aborted',
    );
    expect(run).not.toHaveBeenCalled();
  });

  test('returns the best attempt so far when cancelled later', () => {
    const controller = new RemediationController(
      mockLogger,
      createExtractionConfig(),
    );
    const abort = new AbortController();
    const run = vi.fn(() => {
      abort.abort();
      return scored(40);
    });

    const outcome = controller.execute(run, abort.signal);

    expect(outcome.state).toBe('cancelled');
    expect(outcome.chosenAttempt).toBe(1);
    expect(run).toHaveBeenCalledTimes(1);
  });
});
