import type { BBox, Table, TableStrategy } from '@glyphorder/model';

import { describe, expect, test } from 'vitest';

import { TableReconciler } from './table-reconciler';

const makeTable = (
  strategy: TableStrategy,
  bbox: BBox,
  rows: number,
  cols: number,
  confidence: number,
): Table => ({
  pageNo: 1,
  bbox,
  rows,
  cols,
  cells: [],
  strategy,
  confidence,
  ambiguous: false,
});

const region = { x0: 50, y0: 100, x1: 250, y1: 200 };

describe('TableReconciler', () => {
  test('keeps a ruled table with no alignment counterpart', () => {
    const ruled = makeTable('ruled', region, 3, 3, 0.9);

    const result = TableReconciler.reconcile(1, [ruled], []);

    expect(result.tables).toEqual([ruled]);
    expect(result.issues).toEqual([]);
  });

  test('agreeing strategies keep the ruled grid with a bonus', () => {
    const ruled = makeTable('ruled', region, 3, 3, 0.9);
    const aligned = makeTable('alignment', region, 3, 3, 0.8);

    const result = TableReconciler.reconcile(1, [ruled], [aligned]);

    expect(result.tables).toHaveLength(1);
    expect(result.tables[0].strategy).toBe('ruled');
    expect(result.tables[0].confidence).toBeCloseTo(0.95, 10);
    expect(result.tables[0].ambiguous).toBe(false);
  });

  test('disagreeing grids keep the aligned table at reduced confidence', () => {
    const ruled = makeTable('ruled', region, 3, 3, 0.9);
    const aligned = makeTable('alignment', region, 4, 3, 0.8);

    const result = TableReconciler.reconcile(1, [ruled], [aligned]);

    expect(result.tables).toHaveLength(1);
    expect(result.tables[0].strategy).toBe('alignment');
    expect(result.tables[0].confidence).toBeCloseTo(0.6, 10);
    expect(result.tables[0].ambiguous).toBe(true);
    expect(result.issues).toEqual([
      {
        code: 'TABLE_DETECTION_AMBIGUOUS',
        pageNo: 1,
        message:
          'Strategies disagree on the grid: ruled 3x3, aligned 4x3; kept the aligned grid',
      },
    ]);
  });

  test('partial overlap keeps the ruled table marked ambiguous', () => {
    const ruled = makeTable('ruled', region, 3, 3, 0.9);
    // shares 50x100 of its 200x100 area with the ruled region
    const aligned = makeTable(
      'alignment',
      { x0: 200, y0: 100, x1: 400, y1: 200 },
      3,
      3,
      0.8,
    );

    const result = TableReconciler.reconcile(1, [ruled], [aligned]);

    expect(result.tables).toHaveLength(1);
    expect(result.tables[0].strategy).toBe('ruled');
    expect(result.tables[0].confidence).toBeCloseTo(0.81, 10);
    expect(result.tables[0].ambiguous).toBe(true);
    expect(result.issues.map((i) => i.message)).toEqual([
      'Ruled and aligned tables overlap partially (0.25); kept the ruled grid',
    ]);
  });

  test('disjoint detections are both kept in reading order', () => {
    const aligned = makeTable('alignment', region, 3, 3, 0.8);
    const ruled = makeTable(
      'ruled',
      { x0: 50, y0: 400, x1: 250, y1: 500 },
      2,
      2,
      0.9,
    );

    const result = TableReconciler.reconcile(1, [ruled], [aligned]);

    expect(result.tables).toEqual([aligned, ruled]);
  });
});
