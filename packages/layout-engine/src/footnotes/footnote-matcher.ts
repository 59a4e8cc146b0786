import type { LoggerMethods } from '@glyphorder/logger';
import type {
  FootnoteDefinition,
  FootnoteMarker,
  FootnoteMatch,
  FootnoteReport,
} from '@glyphorder/model';

import { FOOTNOTE_MATCHING } from '../config/constants';

/**
 * Pairs footnote markers with definitions across the whole document.
 *
 * Only definitions with the same canonical marker text are candidates.
 * Confidence is `EXACT_WEIGHT + PROXIMITY_WEIGHT * proximity`, where
 * proximity falls linearly from 1 on the same page to 0 at
 * `PROXIMITY_PAGE_SPAN` pages away. Markers are taken in document order and
 * each definition pairs with at most one marker.
 */
export class FootnoteMatcher {
  private readonly logger: LoggerMethods;
  private readonly acceptThreshold: number;

  constructor(logger: LoggerMethods, acceptThreshold: number) {
    this.logger = logger;
    this.acceptThreshold = acceptThreshold;
  }

  static confidence(
    marker: FootnoteMarker,
    definition: FootnoteDefinition,
  ): number {
    if (marker.markerText !== definition.markerText) return 0;
    const distance = Math.abs(marker.pageNo - definition.pageNo);
    const proximity = Math.max(
      0,
      1 - distance / FOOTNOTE_MATCHING.PROXIMITY_PAGE_SPAN,
    );
    return (
      FOOTNOTE_MATCHING.EXACT_WEIGHT +
      FOOTNOTE_MATCHING.PROXIMITY_WEIGHT * proximity
    );
  }

  match(
    markers: readonly FootnoteMarker[],
    definitions: readonly FootnoteDefinition[],
  ): FootnoteReport {
    const matches: FootnoteMatch[] = [];
    const unmatchedMarkers: FootnoteMarker[] = [];
    const used = new Set<FootnoteDefinition>();

    for (const marker of markers) {
      let best: FootnoteMatch | undefined;
      for (const definition of definitions) {
        if (used.has(definition)) continue;
        const confidence = FootnoteMatcher.confidence(marker, definition);
        if (confidence > (best?.confidence ?? 0)) {
          best = { marker, definition, confidence };
        }
      }

      if (best && best.confidence > this.acceptThreshold) {
        matches.push(best);
        used.add(best.definition);
      } else {
        unmatchedMarkers.push(marker);
      }
    }

    const unmatchedDefinitions = definitions.filter((d) => !used.has(d));
    const matchRate =
      markers.length === 0 ? 1 : matches.length / markers.length;

    this.logger.info(
      `[FootnoteMatcher] Matched ${matches.length}/${markers.length} marker(s), ${unmatchedDefinitions.length} definition(s) unused`,
    );

    return { matches, unmatchedMarkers, unmatchedDefinitions, matchRate };
  }
}
