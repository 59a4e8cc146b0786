import type { LoggerMethods } from '@glyphorder/logger';
import type { Column, PageResult, Table, Token } from '@glyphorder/model';

import type { ExtractionConfig } from '../config/extraction-config';
import type { PreparedPage } from '../preparation/page-preparer';
import type { AttachedBand } from '../scripts/script-attacher';

import { FootnoteExtractor } from '../footnotes/footnote-extractor';
import { MetadataFilter } from '../filters/metadata-filter';
import {
  ElementInventory,
  emptyPositionCounts,
} from '../inventory/element-inventory';
import { ColumnSegmenter } from '../layout/column-segmenter';
import { ReadingOrderSorter } from '../layout/reading-order-sorter';
import { ScriptAttacher } from '../scripts/script-attacher';
import { formatTable } from '../tables/table-formatter';
import { TableDetector } from '../tables/table-detector';
import {
  bboxOf,
  centroid,
  containsPoint,
  horizontalOverlap,
} from '../utils/geometry';

interface ColumnLayout {
  readonly column: Column;
  readonly bands: readonly AttachedBand[];
}

/**
 * Builds one page's result from its prepared tokens.
 *
 * Order: metadata filtering, table detection, exclusion of table tokens,
 * column segmentation, bands, script attachment, footnotes. Tables are
 * then reinserted into the column they overlap most, before the first band
 * at or below their top edge, and the footnote section is appended.
 */
export class PageAssembler {
  private readonly config: ExtractionConfig;
  private readonly filter: MetadataFilter;
  private readonly tableDetector: TableDetector;
  private readonly segmenter: ColumnSegmenter;
  private readonly attacher: ScriptAttacher;
  private readonly footnoteExtractor: FootnoteExtractor;

  constructor(
    logger: LoggerMethods,
    config: ExtractionConfig,
    repeating: ReadonlySet<Token> = new Set(),
  ) {
    this.config = config;
    this.filter = new MetadataFilter(logger, config, repeating);
    this.tableDetector = new TableDetector(logger, config);
    this.segmenter = new ColumnSegmenter(logger, config);
    this.attacher = new ScriptAttacher(config);
    this.footnoteExtractor = new FootnoteExtractor(config);
  }

  assemble(page: PreparedPage): PageResult {
    if (page.status === 'placeholder' || page.status === 'unextractable') {
      return {
        pageNo: page.pageNo,
        status: page.status,
        text: page.placeholderText ?? '',
        columns: [],
        tables: [],
        markers: [],
        definitions: [],
        removals: [],
        extractedTokenCount: 0,
        extractedByPosition: emptyPositionCounts(),
        issues: page.issues,
      };
    }

    const { kept, removals } = this.filter.filter(page);
    const detection = this.tableDetector.detect(page, kept);
    const { tables } = detection;

    const flowing = kept.filter(
      (token) =>
        !tables.some((table) =>
          containsPoint(table.bbox, centroid(token.bbox)),
        ),
    );

    const layouts = this.segmenter.segment(flowing).map(
      (tokens, index): ColumnLayout => {
        const bands = ReadingOrderSorter.buildBands(
          tokens,
          this.config.lineOverlapRatio,
        );
        return {
          column: { index, bbox: bboxOf(tokens), bands },
          bands: bands.map((band) => this.attacher.attach(band)),
        };
      },
    );

    const footnotes = this.footnoteExtractor.extract(
      page.pageNo,
      page.height,
      layouts.map((layout) => layout.bands),
    );

    const body = this.renderBody(
      layouts,
      tables,
      footnotes.definitionBands,
    );
    const section = footnotes.definitions
      .map((definition) => `[${definition.markerText}] ${definition.text}`)
      .join('\n');

    return {
      pageNo: page.pageNo,
      status: page.status,
      text: [body, section].filter((part) => part.length > 0).join('\n\n'),
      columns: layouts.map((layout) => layout.column),
      tables,
      markers: footnotes.markers,
      definitions: footnotes.definitions,
      removals,
      extractedTokenCount: kept.length,
      extractedByPosition: ElementInventory.countByPosition(kept, page.height),
      issues: [...page.issues, ...detection.issues],
    };
  }

  private renderBody(
    layouts: readonly ColumnLayout[],
    tables: readonly Table[],
    definitionBands: ReadonlySet<AttachedBand>,
  ): string {
    const placed = new Map<number, Table[]>();
    const orphans: Table[] = [];
    for (const table of tables) {
      const target = PageAssembler.targetColumn(layouts, table);
      if (target === undefined) {
        orphans.push(table);
      } else {
        placed.set(target, [...(placed.get(target) ?? []), table]);
      }
    }

    const columnTexts = layouts.map((layout, index) => {
      const pending = [...(placed.get(index) ?? [])];
      const lines: string[] = [];
      const flushTables = (until: number) => {
        while (pending.length > 0 && pending[0].bbox.y0 <= until) {
          const table = pending.shift();
          if (table) lines.push(formatTable(table, this.config.tableFormat));
        }
      };

      for (const attached of layout.bands) {
        if (definitionBands.has(attached)) continue;
        flushTables(attached.band.bbox.y0);
        lines.push(attached.text);
      }
      flushTables(Infinity);
      return lines.filter((line) => line.length > 0).join('\n');
    });

    return [
      ...columnTexts,
      ...orphans.map((table) => formatTable(table, this.config.tableFormat)),
    ]
      .filter((text) => text.length > 0)
      .join('\n\n');
  }

  /**
   * Index of the column with the most horizontal overlap, the leftmost on
   * a tie; undefined when the page has no column.
   */
  static targetColumn(
    layouts: readonly Pick<ColumnLayout, 'column'>[],
    table: Pick<Table, 'bbox'>,
  ): number | undefined {
    let best: { index: number; overlap: number } | undefined;
    for (const { column } of layouts) {
      const overlap = horizontalOverlap(column.bbox, table.bbox);
      if (!best || overlap > best.overlap) {
        best = { index: column.index, overlap };
      }
    }
    return best?.index;
  }
}
