import type { BBox, LineSegment, PageInput, Token } from '@glyphorder/model';

export type RightAngle = 90 | 180 | 270;

export interface UprightPage {
  readonly width: number;
  readonly height: number;
  readonly tokens: readonly Token[];
  readonly lines: readonly LineSegment[];
}

/**
 * Rotation in [0, 360).
 */
export function normalizeRotation(degrees: number): number {
  return ((degrees % 360) + 360) % 360;
}

export function isRightAngle(degrees: number): degrees is RightAngle {
  return degrees === 90 || degrees === 180 || degrees === 270;
}

type Point = readonly [number, number];

function mapPoint(
  [x, y]: Point,
  rotation: RightAngle,
  width: number,
  height: number,
): Point {
  switch (rotation) {
    case 90:
      return [height - y, x];
    case 180:
      return [width - x, height - y];
    case 270:
      return [y, width - x];
  }
}

function mapBBox(
  bbox: BBox,
  rotation: RightAngle,
  width: number,
  height: number,
): BBox {
  const [ax, ay] = mapPoint([bbox.x0, bbox.y0], rotation, width, height);
  const [bx, by] = mapPoint([bbox.x1, bbox.y1], rotation, width, height);
  return {
    x0: Math.min(ax, bx),
    y0: Math.min(ay, by),
    x1: Math.max(ax, bx),
    y1: Math.max(ay, by),
  };
}

/**
 * Map a clockwise-rotated page onto upright coordinates.
 *
 * Returns new Tokens; the baseline of a rotated token becomes the bottom
 * edge of its new box.
 */
export function rotatePage(page: PageInput, rotation: RightAngle): UprightPage {
  const { width, height } = page;
  const swap = rotation !== 180;

  const tokens = page.tokens.map((token): Token => {
    const bbox = mapBBox(token.bbox, rotation, width, height);
    return { ...token, bbox, baselineY: bbox.y1 };
  });
  const lines = (page.lines ?? []).map((line) =>
    mapBBox(line, rotation, width, height),
  );

  return {
    width: swap ? height : width,
    height: swap ? width : height,
    tokens,
    lines,
  };
}
