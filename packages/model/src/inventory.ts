export type PositionBand = 'top' | 'middle' | 'bottom';

export type SizeClass = 'large' | 'standard' | 'small' | 'tiny';

export type CoverageStatus = 'GOOD' | 'WARNING' | 'POOR';

/**
 * Token counts of one page, captured before any filtering.
 */
export interface PageInventory {
  readonly pageNo: number;
  readonly total: number;
  readonly byPosition: Readonly<Record<PositionBand, number>>;
  readonly bySize: Readonly<Record<SizeClass, number>>;
}

/**
 * Frozen pre-filtering baseline of a document.
 */
export interface DocumentInventory {
  readonly pages: readonly PageInventory[];
  readonly total: number;
  readonly byPosition: Readonly<Record<PositionBand, number>>;
}
