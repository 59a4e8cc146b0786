import type { BBox } from './token';

export type TableStrategy = 'ruled' | 'alignment';

export type TableFormat = 'markdown' | 'plain';

export interface TableCell {
  readonly row: number;
  readonly col: number;
  readonly text: string;
  readonly bbox: BBox;
}

/**
 * Tabular region detected on a page.
 */
export interface Table {
  readonly pageNo: number;
  readonly bbox: BBox;
  readonly rows: number;
  readonly cols: number;

  /** Row-major grid, `cells[row][col]` */
  readonly cells: readonly (readonly TableCell[])[];

  readonly strategy: TableStrategy;

  /** Detection confidence in [0,1] */
  readonly confidence: number;

  /** Set when the two strategies disagreed over this region */
  readonly ambiguous: boolean;
}
