import type { BBox } from './token';

export interface FootnoteMarker {
  /** Canonical marker text, e.g. `*1`, `†`, `[3]`, `2` for a superscript two */
  readonly markerText: string;
  readonly bbox: BBox;
  readonly pageNo: number;
}

export interface FootnoteDefinition {
  readonly markerText: string;

  /** Definition body without the marker and separator */
  readonly text: string;
  readonly bbox: BBox;
  readonly pageNo: number;
}

export interface FootnoteMatch {
  readonly marker: FootnoteMarker;
  readonly definition: FootnoteDefinition;

  /** Match confidence in (0.5, 1] for accepted matches */
  readonly confidence: number;
}

/**
 * Document-level result of footnote matching.
 */
export interface FootnoteReport {
  readonly matches: readonly FootnoteMatch[];
  readonly unmatchedMarkers: readonly FootnoteMarker[];
  readonly unmatchedDefinitions: readonly FootnoteDefinition[];

  /** matches / markers, 1 when the document has no markers */
  readonly matchRate: number;
}
