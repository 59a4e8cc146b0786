import type {
  BBox,
  LineSegment,
  Table,
  TableCell,
  Token,
} from '@glyphorder/model';

import type { TableDetectorConfig } from './table-detector-config';

import { TABLE_DETECTION } from '../config/constants';
import { ReadingOrderSorter } from '../layout/reading-order-sorter';
import { centroid } from '../utils/geometry';
import { joinTokens } from '../utils/text';

type Orientation = 'horizontal' | 'vertical';

interface Rule {
  orientation: Orientation;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * Table strategy for grids drawn with ruling lines.
 *
 * Horizontal and vertical rules that cross each other are grouped into
 * connected components; each component with at least three distinct rows
 * and columns of rules becomes a table whose cells are the grid rectangles.
 */
export class RuledLineDetector {
  private readonly config: TableDetectorConfig;

  constructor(config: TableDetectorConfig) {
    this.config = config;
  }

  detect(
    pageNo: number,
    lines: readonly LineSegment[],
    tokens: readonly Token[],
  ): Table[] {
    const rules = lines
      .map(toRule)
      .filter((rule): rule is Rule => rule !== undefined);
    const tables: Table[] = [];

    for (const component of connectedComponents(rules)) {
      const ys = cluster(
        component
          .filter((rule) => rule.orientation === 'horizontal')
          .map((rule) => (rule.y0 + rule.y1) / 2),
      );
      const xs = cluster(
        component
          .filter((rule) => rule.orientation === 'vertical')
          .map((rule) => (rule.x0 + rule.x1) / 2),
      );
      if (ys.length < 3 || xs.length < 3) continue;

      tables.push(this.buildTable(pageNo, xs, ys, tokens));
    }
    return tables;
  }

  private buildTable(
    pageNo: number,
    xs: readonly number[],
    ys: readonly number[],
    tokens: readonly Token[],
  ): Table {
    const rows = ys.length - 1;
    const cols = xs.length - 1;
    const boxes: BBox[][] = Array.from({ length: rows }, (_, r) =>
      Array.from({ length: cols }, (_, c) => ({
        x0: xs[c],
        y0: ys[r],
        x1: xs[c + 1],
        y1: ys[r + 1],
      })),
    );

    const members: Token[][][] = boxes.map((row) => row.map(() => []));
    for (const token of tokens) {
      const point = centroid(token.bbox);
      const r = findSlot(ys, point.y);
      const c = findSlot(xs, point.x);
      if (r !== -1 && c !== -1) {
        members[r][c].push(token);
      }
    }

    let filled = 0;
    const cells: TableCell[][] = boxes.map((row, r) =>
      row.map((bbox, c) => {
        const text = this.cellText(members[r][c]);
        if (text) filled++;
        return { row: r, col: c, text, bbox };
      }),
    );

    const fill = filled / (rows * cols);
    return {
      pageNo,
      bbox: { x0: xs[0], y0: ys[0], x1: xs[cols], y1: ys[rows] },
      rows,
      cols,
      cells,
      strategy: 'ruled',
      confidence:
        TABLE_DETECTION.RULED_BASE_CONFIDENCE +
        TABLE_DETECTION.RULED_FILL_WEIGHT * fill,
      ambiguous: false,
    };
  }

  /** Cell lines in reading order, joined by single spaces */
  private cellText(tokens: readonly Token[]): string {
    return ReadingOrderSorter.buildBands(tokens, this.config.lineOverlapRatio)
      .map((band) => joinTokens(band.tokens, this.config.wordGapRatio))
      .join(' ');
  }
}

function toRule(segment: LineSegment): Rule | undefined {
  const x0 = Math.min(segment.x0, segment.x1);
  const x1 = Math.max(segment.x0, segment.x1);
  const y0 = Math.min(segment.y0, segment.y1);
  const y1 = Math.max(segment.y0, segment.y1);
  const width = x1 - x0;
  const height = y1 - y0;

  if (
    height <= TABLE_DETECTION.LINE_TOLERANCE &&
    width >= TABLE_DETECTION.MIN_LINE_LENGTH
  ) {
    return { orientation: 'horizontal', x0, y0, x1, y1 };
  }
  if (
    width <= TABLE_DETECTION.LINE_TOLERANCE &&
    height >= TABLE_DETECTION.MIN_LINE_LENGTH
  ) {
    return { orientation: 'vertical', x0, y0, x1, y1 };
  }
  return undefined;
}

function crosses(a: Rule, b: Rule): boolean {
  if (a.orientation === b.orientation) return false;
  const [h, v] = a.orientation === 'horizontal' ? [a, b] : [b, a];
  const tolerance = TABLE_DETECTION.CLUSTER_TOLERANCE;
  const vx = (v.x0 + v.x1) / 2;
  const hy = (h.y0 + h.y1) / 2;
  return (
    vx >= h.x0 - tolerance &&
    vx <= h.x1 + tolerance &&
    hy >= v.y0 - tolerance &&
    hy <= v.y1 + tolerance
  );
}

/**
 * Groups of rules connected through crossings (union-find).
 */
function connectedComponents(rules: readonly Rule[]): Rule[][] {
  const parent = rules.map((_, i) => i);
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  for (let i = 0; i < rules.length; i++) {
    for (let j = i + 1; j < rules.length; j++) {
      if (crosses(rules[i], rules[j])) {
        parent[find(i)] = find(j);
      }
    }
  }

  const groups = new Map<number, Rule[]>();
  rules.forEach((rule, i) => {
    const root = find(i);
    const group = groups.get(root) ?? [];
    group.push(rule);
    groups.set(root, group);
  });
  return [...groups.values()];
}

/**
 * Sorted positions merged when closer than CLUSTER_TOLERANCE; each cluster
 * is represented by its mean.
 */
function cluster(values: readonly number[]): number[] {
  const sorted = [...values].sort((a, b) => a - b);
  const clusters: number[][] = [];
  for (const value of sorted) {
    const last = clusters.at(-1);
    const gap = last ? value - last[last.length - 1] : Infinity;
    if (last && gap <= TABLE_DETECTION.CLUSTER_TOLERANCE) {
      last.push(value);
    } else {
      clusters.push([value]);
    }
  }
  return clusters.map(
    (members) => members.reduce((sum, v) => sum + v, 0) / members.length,
  );
}

/**
 * Index of the grid interval holding `value`, -1 outside the grid.
 */
function findSlot(edges: readonly number[], value: number): number {
  for (let i = 0; i < edges.length - 1; i++) {
    if (value >= edges[i] && value <= edges[i + 1]) return i;
  }
  return -1;
}
