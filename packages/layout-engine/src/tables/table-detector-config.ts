import type { ExtractionConfig } from '../config/extraction-config';

export type TableDetectorConfig = Pick<
  ExtractionConfig,
  | 'columnGap'
  | 'tableMinRows'
  | 'tableMinCols'
  | 'tableCellGap'
  | 'tableAlignTolerance'
  | 'lineOverlapRatio'
  | 'wordGapRatio'
>;
