import type { PageIssue, Table } from '@glyphorder/model';

import { TABLE_DETECTION } from '../config/constants';
import { clamp01, overlapRatio, stableSortBy } from '../utils/geometry';

export interface ReconciledTables {
  readonly tables: readonly Table[];
  readonly issues: readonly PageIssue[];
}

/**
 * Merges the output of the two table strategies into one set of regions.
 *
 * For each ruled table, the alignment table overlapping it most is its
 * counterpart:
 * - same region and same grid: the ruled table wins with a small bonus
 * - same region, different grid: the alignment grid is kept at reduced
 *   confidence and marked ambiguous
 * - partial overlap: the ruled table is kept at reduced confidence and
 *   marked ambiguous
 *
 * Other alignment tables overlapping a ruled table are dropped; the rest
 * pass through.
 */
export class TableReconciler {
  static reconcile(
    pageNo: number,
    ruled: readonly Table[],
    aligned: readonly Table[],
  ): ReconciledTables {
    const tables: Table[] = [];
    const issues: PageIssue[] = [];
    const consumed = new Set<Table>();

    for (const table of ruled) {
      const overlapping = aligned
        .filter((candidate) => !consumed.has(candidate))
        .map((candidate) => ({
          candidate,
          ratio: overlapRatio(table.bbox, candidate.bbox),
        }))
        .filter(({ ratio }) => ratio > 0)
        .sort((a, b) => b.ratio - a.ratio);

      for (const { candidate } of overlapping) consumed.add(candidate);

      const counterpart = overlapping.at(0);
      if (!counterpart) {
        tables.push(table);
        continue;
      }

      const { candidate, ratio } = counterpart;
      if (ratio < TABLE_DETECTION.SAME_REGION_OVERLAP) {
        tables.push({
          ...table,
          confidence: table.confidence * TABLE_DETECTION.PARTIAL_OVERLAP_FACTOR,
          ambiguous: true,
        });
        issues.push({
          code: 'TABLE_DETECTION_AMBIGUOUS',
          pageNo,
          message: `Ruled and aligned tables overlap partially (${ratio.toFixed(2)}); kept the ruled grid`,
        });
      } else if (
        candidate.rows === table.rows &&
        candidate.cols === table.cols
      ) {
        tables.push({
          ...table,
          confidence: clamp01(table.confidence + TABLE_DETECTION.AGREEMENT_BONUS),
        });
      } else {
        tables.push({
          ...candidate,
          confidence: candidate.confidence * TABLE_DETECTION.DISAGREEMENT_FACTOR,
          ambiguous: true,
        });
        issues.push({
          code: 'TABLE_DETECTION_AMBIGUOUS',
          pageNo,
          message: `Strategies disagree on the grid: ruled ${table.rows}x${table.cols}, aligned ${candidate.rows}x${candidate.cols}; kept the aligned grid`,
        });
      }
    }

    tables.push(...aligned.filter((table) => !consumed.has(table)));

    return {
      tables: stableSortBy(
        tables,
        (t) => t.bbox.y0,
        (t) => t.bbox.x0,
      ),
      issues,
    };
  }
}
