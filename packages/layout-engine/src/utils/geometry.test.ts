import type { Token } from '@glyphorder/model';

import { describe, expect, test } from 'vitest';

import {
  bboxDistance,
  bboxOf,
  clamp01,
  containsPoint,
  median,
  overlapRatio,
  quantize,
  stableSortBy,
} from './geometry';

describe('geometry', () => {
  test('clamp01 bounds values and maps non-finite to 0', () => {
    expect(clamp01(-0.2)).toBe(0);
    expect(clamp01(0.4)).toBe(0.4);
    expect(clamp01(3)).toBe(1);
    expect(clamp01(Number.NaN)).toBe(0);
  });

  test('quantize returns the bucket index', () => {
    expect(quantize(0.93, 0.02)).toBe(47);
    expect(quantize(0.05, 0.02)).toBe(3);
  });

  test('median handles odd and even counts', () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 2, 3])).toBe(2.5);
    expect(median([])).toBe(0);
  });

  test('stableSortBy keeps input order on ties', () => {
    const items = [
      { id: 'a', y: 2, x: 1 },
      { id: 'b', y: 1, x: 5 },
      { id: 'c', y: 2, x: 1 },
      { id: 'd', y: 1, x: 3 },
    ];

    const sorted = stableSortBy(
      items,
      (item) => item.y,
      (item) => item.x,
    );

    expect(sorted.map((item) => item.id)).toEqual(['d', 'b', 'a', 'c']);
  });

  test('bboxOf unions token boxes', () => {
    const tokens: Token[] = [
      {
        text: 'a',
        bbox: { x0: 10, y0: 5, x1: 20, y1: 15 },
        fontSize: 10,
        baselineY: 14,
        pageNo: 1,
      },
      {
        text: 'b',
        bbox: { x0: 30, y0: 2, x1: 35, y1: 12 },
        fontSize: 10,
        baselineY: 11,
        pageNo: 1,
      },
    ];

    expect(bboxOf(tokens)).toEqual({ x0: 10, y0: 2, x1: 35, y1: 15 });
    expect(bboxOf([])).toEqual({ x0: 0, y0: 0, x1: 0, y1: 0 });
  });

  test('overlapRatio is relative to the smaller box', () => {
    const big = { x0: 0, y0: 0, x1: 100, y1: 100 };
    const small = { x0: 50, y0: 50, x1: 70, y1: 70 };
    const half = { x0: 90, y0: 0, x1: 110, y1: 10 };

    expect(overlapRatio(big, small)).toBe(1);
    expect(overlapRatio(big, half)).toBe(0.5);
  });

  test('containsPoint includes the edges', () => {
    const box = { x0: 0, y0: 0, x1: 10, y1: 10 };

    expect(containsPoint(box, { x: 10, y: 5 })).toBe(true);
    expect(containsPoint(box, { x: 11, y: 5 })).toBe(false);
  });

  test('bboxDistance measures the gap between boxes', () => {
    const a = { x0: 0, y0: 0, x1: 10, y1: 10 };

    expect(bboxDistance(a, { x0: 13, y0: 14, x1: 20, y1: 20 })).toBe(5);
    expect(bboxDistance(a, { x0: 5, y0: 5, x1: 20, y1: 20 })).toBe(0);
  });
});
