/**
 * Axis-aligned bounding box in page coordinates.
 *
 * Origin is the top-left corner of the page; y grows downwards.
 */
export interface BBox {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

/**
 * A positioned text unit produced by the upstream document parser.
 *
 * Tokens are never mutated by the pipeline. Derived structures hold
 * references to them; coordinate transforms create new Tokens.
 */
export interface Token {
  readonly text: string;
  readonly bbox: BBox;

  /** Font size in points */
  readonly fontSize: number;

  /** Baseline y coordinate (usually close to bbox.y1) */
  readonly baselineY: number;

  /** 1-based page number */
  readonly pageNo: number;

  /** Recognition confidence in [0,1], present on OCR output only */
  readonly confidence?: number;
}

/**
 * A drawn line segment (table rule, underline, border) reported by the parser.
 */
export interface LineSegment {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

/**
 * One page of upstream parser output.
 */
export interface PageInput {
  /** 1-based page number */
  readonly pageNo: number;
  readonly width: number;
  readonly height: number;

  /** Clockwise page rotation in degrees (default: 0) */
  readonly rotation?: number;

  readonly tokens: readonly Token[];

  /** Ruling lines, used by the ruled-line table strategy */
  readonly lines?: readonly LineSegment[];

  /** Rendered page image, used by OCR collaborators */
  readonly imagePath?: string;
}

/**
 * Complete upstream parser output for one document.
 */
export interface DocumentInput {
  readonly documentId: string;
  readonly pages: readonly PageInput[];
}
