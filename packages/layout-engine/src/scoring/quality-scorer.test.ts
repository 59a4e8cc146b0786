import type { Flag, VerificationReport } from '@glyphorder/model';

import { describe, expect, test } from 'vitest';

import { QualityScorer } from './quality-scorer';

const report = (
  overrides: Partial<VerificationReport> = {},
): VerificationReport => ({
  coverage: 1,
  coverageStatus: 'GOOD',
  elementCountRatio: 1,
  positionSimilarity: 1,
  passed: true,
  flags: [],
  footnoteMatchRate: 1,
  tableMatchRate: 1,
  orderingConsistent: true,
  ...overrides,
});

const hallucination: Flag = {
  type: 'hallucination',
  severity: 'high',
  pageNo: 1,
  rule: 'html-tag',
  message: 'HTML tag not found in source tokens',
  span: '<b>',
  stripped: true,
};

describe('QualityScorer', () => {
  test('a perfect extraction scores 100', () => {
    expect(QualityScorer.score(report(), 3)).toEqual({
      score: 100,
      grade: 'A',
      components: {
        coverage: 1,
        hallucination: 1,
        footnotes: 1,
        tables: 1,
        ordering: 1,
      },
    });
  });

  test('weights the components', () => {
    const result = QualityScorer.score(
      report({
        coverage: 0.8,
        footnoteMatchRate: 0.5,
        orderingConsistent: false,
      }),
      2,
    );

    expect(result.score).toBe(70.5);
    expect(result.grade).toBe('C');
  });

  test('hallucination flags count per page and saturate', () => {
    const two = QualityScorer.score(report({ flags: [hallucination] }), 2);
    const saturated = QualityScorer.score(
      report({ flags: [hallucination, hallucination, hallucination] }),
      2,
    );

    expect(two.components.hallucination).toBe(0.5);
    expect(two.score).toBe(87.5);
    expect(saturated.components.hallucination).toBe(0);
    expect(saturated.score).toBe(75);
  });

  test('ignores flags of other types', () => {
    const flag: Flag = { ...hallucination, type: 'table_issue' };

    expect(QualityScorer.score(report({ flags: [flag] }), 1).score).toBe(100);
  });

  test('maps scores to grades', () => {
    expect(QualityScorer.grade(90)).toBe('A');
    expect(QualityScorer.grade(89.9)).toBe('B');
    expect(QualityScorer.grade(70)).toBe('C');
    expect(QualityScorer.grade(60)).toBe('D');
    expect(QualityScorer.grade(59.9)).toBe('F');
  });
});
