import type { BBox, Token } from '@glyphorder/model';

export function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

/**
 * Bucket index of `n` on a grid of `step`.
 */
export function quantize(n: number, step: number): number {
  return Math.round(n / Math.max(1e-9, Math.abs(step)));
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2
    ? sorted[mid]
    : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sort by numeric keys, falling back to input order on ties.
 */
export function stableSortBy<T>(
  items: readonly T[],
  ...keys: ((item: T) => number)[]
): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => {
      for (const key of keys) {
        const diff = key(a.item) - key(b.item);
        if (diff !== 0) return diff;
      }
      return a.index - b.index;
    })
    .map((entry) => entry.item);
}

export function bboxUnion(a: BBox, b: BBox): BBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

/**
 * Union of the token boxes; a zero box for no tokens.
 */
export function bboxOf(tokens: readonly Token[]): BBox {
  if (tokens.length === 0) return { x0: 0, y0: 0, x1: 0, y1: 0 };
  return tokens
    .map((token) => token.bbox)
    .reduce((acc, bbox) => bboxUnion(acc, bbox));
}

export function bboxArea(b: BBox): number {
  return Math.max(0, b.x1 - b.x0) * Math.max(0, b.y1 - b.y0);
}

export function intersectionArea(a: BBox, b: BBox): number {
  const w = Math.min(a.x1, b.x1) - Math.max(a.x0, b.x0);
  const h = Math.min(a.y1, b.y1) - Math.max(a.y0, b.y0);
  return w > 0 && h > 0 ? w * h : 0;
}

/**
 * Intersection area relative to the smaller box, in [0,1].
 */
export function overlapRatio(a: BBox, b: BBox): number {
  const smaller = Math.min(bboxArea(a), bboxArea(b));
  return smaller > 0 ? intersectionArea(a, b) / smaller : 0;
}

export function horizontalOverlap(a: BBox, b: BBox): number {
  return Math.max(0, Math.min(a.x1, b.x1) - Math.max(a.x0, b.x0));
}

export function centroid(b: BBox): { x: number; y: number } {
  return { x: (b.x0 + b.x1) / 2, y: (b.y0 + b.y1) / 2 };
}

export function containsPoint(
  b: BBox,
  point: { x: number; y: number },
): boolean {
  return (
    point.x >= b.x0 && point.x <= b.x1 && point.y >= b.y0 && point.y <= b.y1
  );
}

/**
 * Shortest distance between two boxes, 0 when they touch or overlap.
 */
export function bboxDistance(a: BBox, b: BBox): number {
  const dx = Math.max(0, a.x0 - b.x1, b.x0 - a.x1);
  const dy = Math.max(0, a.y0 - b.y1, b.y0 - a.y1);
  return Math.hypot(dx, dy);
}
