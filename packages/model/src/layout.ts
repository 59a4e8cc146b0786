import type { BBox, Token } from './token';

/**
 * Tokens sharing one visual line, ordered by x0.
 */
export interface Band {
  readonly tokens: readonly Token[];
  readonly bbox: BBox;

  /** Median baseline of the band's body tokens */
  readonly baselineY: number;

  /** Dominant font size of the band's body tokens */
  readonly fontSize: number;
}

/**
 * A left-to-right reading column made of Bands ordered top to bottom.
 */
export interface Column {
  /** 0-based position from the left */
  readonly index: number;
  readonly bbox: BBox;
  readonly bands: readonly Band[];
}
