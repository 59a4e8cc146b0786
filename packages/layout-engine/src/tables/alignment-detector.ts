import type { Band, BBox, Table, TableCell, Token } from '@glyphorder/model';

import type { TableDetectorConfig } from './table-detector-config';

import { TABLE_DETECTION } from '../config/constants';
import { ReadingOrderSorter } from '../layout/reading-order-sorter';
import { bboxOf } from '../utils/geometry';
import { joinTokens } from '../utils/text';

interface Anchor {
  x0: number;
  x1: number;
}

interface AlignedRow {
  band: Band;

  /** One slot per anchor; undefined for an empty cell */
  cells: (Token[] | undefined)[];
}

interface Group {
  anchors: Anchor[];
  rows: AlignedRow[];
}

/**
 * Table strategy for borderless tables.
 *
 * A band whose tokens split into at least `tableMinCols` short cells is a
 * row candidate. Consecutive candidates whose cells line up with the first
 * row's cells (overlapping, or with an edge within `tableAlignTolerance`)
 * form a table once there are `tableMinRows` of them. A group whose cells
 * are all prose-length and separated by more than `columnGap` is a set of
 * text columns and is left to ColumnSegmenter.
 */
export class AlignmentDetector {
  private readonly config: TableDetectorConfig;

  constructor(config: TableDetectorConfig) {
    this.config = config;
  }

  detect(pageNo: number, tokens: readonly Token[]): Table[] {
    const tables: Table[] = [];
    let group: Group | undefined;

    const close = () => {
      if (
        group &&
        group.rows.length >= this.config.tableMinRows &&
        !this.isTextColumns(group)
      ) {
        tables.push(this.toTable(pageNo, group));
      }
      group = undefined;
    };

    const bands = ReadingOrderSorter.buildBands(
      tokens,
      this.config.lineOverlapRatio,
    );
    for (const band of bands) {
      const cells = ReadingOrderSorter.splitByGap(
        band.tokens,
        this.config.tableCellGap,
      );
      if (!this.isRowCandidate(cells)) {
        close();
        continue;
      }

      if (group) {
        const mapped = this.continuesGroup(group, band)
          ? this.mapToAnchors(group.anchors, cells)
          : undefined;
        if (mapped) {
          group.rows.push({ band, cells: mapped });
          widenAnchors(group.anchors, mapped);
          continue;
        }
        close();
      }

      group = {
        anchors: cells.map((cell) => {
          const box = bboxOf(cell);
          return { x0: box.x0, x1: box.x1 };
        }),
        rows: [{ band, cells }],
      };
    }
    close();

    return tables;
  }

  private isRowCandidate(cells: readonly Token[][]): boolean {
    return (
      cells.length >= this.config.tableMinCols &&
      cells.every((cell) => cell.length <= TABLE_DETECTION.MAX_CELL_TOKENS)
    );
  }

  private isTextColumns(group: Group): boolean {
    return group.rows.every((row) => {
      const boxes = row.cells
        .filter((cell): cell is Token[] => cell !== undefined)
        .map((cell) => ({
          box: bboxOf(cell),
          prose: cell.length >= TABLE_DETECTION.PROSE_CELL_TOKENS,
        }));
      return boxes.every(
        ({ box, prose }, i) =>
          prose &&
          (i === 0 || box.x0 - boxes[i - 1].box.x1 > this.config.columnGap),
      );
    });
  }

  private continuesGroup(group: Group, band: Band): boolean {
    const previous = group.rows[group.rows.length - 1].band;
    const gap = band.bbox.y0 - previous.bbox.y1;
    return gap <= TABLE_DETECTION.MAX_ROW_GAP_RATIO * band.fontSize;
  }

  /**
   * Assign every cell to a distinct anchor, left to right. Undefined when a
   * cell lines up with no remaining anchor.
   */
  private mapToAnchors(
    anchors: readonly Anchor[],
    cells: readonly Token[][],
  ): (Token[] | undefined)[] | undefined {
    const slots: (Token[] | undefined)[] = anchors.map(() => undefined);
    let next = 0;
    for (const cell of cells) {
      const box = bboxOf(cell);
      let index = next;
      while (index < anchors.length && !this.aligned(box, anchors[index])) {
        index++;
      }
      if (index === anchors.length) return undefined;
      slots[index] = cell;
      next = index + 1;
    }
    return slots;
  }

  private aligned(box: BBox, anchor: Anchor): boolean {
    const tolerance = this.config.tableAlignTolerance;
    return (
      Math.min(box.x1, anchor.x1) > Math.max(box.x0, anchor.x0) ||
      Math.abs(box.x0 - anchor.x0) <= tolerance ||
      Math.abs(box.x1 - anchor.x1) <= tolerance
    );
  }

  private toTable(pageNo: number, group: Group): Table {
    let filled = 0;
    const cells: TableCell[][] = group.rows.map((row, r) =>
      group.anchors.map((anchor, c) => {
        const members = row.cells[c];
        if (!members) {
          return {
            row: r,
            col: c,
            text: '',
            bbox: {
              x0: anchor.x0,
              y0: row.band.bbox.y0,
              x1: anchor.x1,
              y1: row.band.bbox.y1,
            },
          };
        }
        filled++;
        return {
          row: r,
          col: c,
          text: joinTokens(members, this.config.wordGapRatio),
          bbox: bboxOf(members),
        };
      }),
    );

    const rows = group.rows.length;
    const cols = group.anchors.length;
    return {
      pageNo,
      bbox: bboxOf(group.rows.flatMap((row) => row.band.tokens)),
      rows,
      cols,
      cells,
      strategy: 'alignment',
      confidence:
        TABLE_DETECTION.ALIGNMENT_BASE_CONFIDENCE +
        (TABLE_DETECTION.ALIGNMENT_FILL_WEIGHT * filled) / (rows * cols),
      ambiguous: false,
    };
  }
}

function widenAnchors(
  anchors: Anchor[],
  cells: readonly (Token[] | undefined)[],
): void {
  cells.forEach((cell, index) => {
    if (!cell) return;
    const box = bboxOf(cell);
    anchors[index] = {
      x0: Math.min(anchors[index].x0, box.x0),
      x1: Math.max(anchors[index].x1, box.x1),
    };
  });
}
