import type {
  BBox,
  FootnoteDefinition,
  FootnoteMarker,
} from '@glyphorder/model';

import type { ExtractionConfig } from '../config/extraction-config';
import type { AttachedBand, BandSegment } from '../scripts/script-attacher';

import { bboxUnion } from '../utils/geometry';
import {
  canonicalMarker,
  extractAttachedMarker,
  isMarkerText,
  isScriptMarker,
  parseDefinitionStart,
} from './footnote-patterns';

export type FootnoteExtractorConfig = Pick<
  ExtractionConfig,
  'footnoteZone' | 'marginRatio'
>;

export interface PageFootnotes {
  readonly markers: readonly FootnoteMarker[];
  readonly definitions: readonly FootnoteDefinition[];

  /** Bands that make up the definitions; they leave the column text */
  readonly definitionBands: ReadonlySet<AttachedBand>;
}

interface DraftDefinition {
  markerText: string;
  parts: string[];
  bbox: BBox;
}

/**
 * Collects footnote markers from body text and footnote definitions from
 * the bottom footnote zone of one page.
 *
 * Markers are raised script digits or symbols, standalone marker tokens and
 * markers glued to the end of a word. A definition starts with a marker and
 * a separator; following zone lines without a marker continue it.
 */
export class FootnoteExtractor {
  private readonly config: FootnoteExtractorConfig;

  constructor(config: FootnoteExtractorConfig) {
    this.config = config;
  }

  extract(
    pageNo: number,
    pageHeight: number,
    columns: readonly (readonly AttachedBand[])[],
  ): PageFootnotes {
    const zoneTop = (1 - this.config.footnoteZone) * pageHeight;
    const marginBottom = this.config.marginRatio * pageHeight;

    const markers: FootnoteMarker[] = [];
    const definitions: FootnoteDefinition[] = [];
    const definitionBands = new Set<AttachedBand>();

    for (const bands of columns) {
      let current: DraftDefinition | undefined;
      const flush = () => {
        if (current) {
          definitions.push({
            markerText: current.markerText,
            text: current.parts.join(' ').trim(),
            bbox: current.bbox,
            pageNo,
          });
        }
        current = undefined;
      };

      for (const attached of bands) {
        const { bbox } = attached.band;

        if (bbox.y0 >= zoneTop) {
          const start = parseDefinitionStart(attached.text);
          if (start) {
            flush();
            definitionBands.add(attached);
            current = {
              markerText: canonicalMarker(start.marker),
              parts: [start.body],
              bbox,
            };
          } else if (current) {
            definitionBands.add(attached);
            current.parts.push(attached.text.trim());
            current.bbox = bboxUnion(current.bbox, bbox);
          }
          continue;
        }

        if (bbox.y1 <= marginBottom) continue;
        for (const segment of attached.segments) {
          markers.push(...this.segmentMarkers(segment, pageNo));
        }
      }
      flush();
    }

    return { markers, definitions, definitionBands };
  }

  private segmentMarkers(
    segment: BandSegment,
    pageNo: number,
  ): FootnoteMarker[] {
    const found: FootnoteMarker[] = [];
    const { base } = segment;

    if (segment.baseKind === 'superscript') {
      if (isScriptMarker(base.text)) {
        found.push(marker(base.text, base.bbox, pageNo));
      }
    } else if (segment.baseKind === undefined) {
      if (isMarkerText(base.text)) {
        found.push(marker(base.text, base.bbox, pageNo));
      } else {
        const attachedMarker = extractAttachedMarker(base.text);
        if (attachedMarker) {
          found.push(marker(attachedMarker, base.bbox, pageNo));
        }
      }
    }

    for (const script of segment.scripts) {
      if (script.kind === 'superscript' && isScriptMarker(script.token.text)) {
        found.push(marker(script.token.text, script.token.bbox, pageNo));
      }
    }
    return found;
  }
}

function marker(text: string, bbox: BBox, pageNo: number): FootnoteMarker {
  return { markerText: canonicalMarker(text), bbox, pageNo };
}
