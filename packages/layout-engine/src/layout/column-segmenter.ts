import type { LoggerMethods } from '@glyphorder/logger';
import type { Token } from '@glyphorder/model';

import { stableSortBy } from '../utils/geometry';

export interface ColumnSegmenterOptions {
  /** Minimum horizontal whitespace gap between two columns */
  columnGap: number;

  /** Groups with fewer tokens are merged into a neighbour */
  minColumnTokens: number;
}

interface Group {
  tokens: Token[];
}

/**
 * Splits a page's tokens into vertical columns.
 *
 * Tokens are swept by x0 while tracking the running right edge; a column
 * boundary is a horizontal gap wider than `columnGap` that no token spans.
 * Undersized groups (stray marks, a lone page number) are merged into the
 * neighbour across the smaller gap.
 */
export class ColumnSegmenter {
  private readonly logger: LoggerMethods;
  private readonly options: ColumnSegmenterOptions;

  constructor(logger: LoggerMethods, options: ColumnSegmenterOptions) {
    this.logger = logger;
    this.options = options;
  }

  /**
   * Token groups ordered left to right. Every token lands in exactly one
   * group; a page without a qualifying gap is one group.
   */
  segment(tokens: readonly Token[]): Token[][] {
    if (tokens.length === 0) return [];

    const sorted = stableSortBy(
      tokens,
      (t) => t.bbox.x0,
      (t) => t.bbox.y0,
    );

    const groups: Group[] = [{ tokens: [sorted[0]] }];
    // gaps[i] separates groups[i] and groups[i + 1]
    const gaps: number[] = [];
    let rightEdge = sorted[0].bbox.x1;

    for (const token of sorted.slice(1)) {
      const gap = token.bbox.x0 - rightEdge;
      if (gap > this.options.columnGap) {
        groups.push({ tokens: [token] });
        gaps.push(gap);
        rightEdge = token.bbox.x1;
      } else {
        groups[groups.length - 1].tokens.push(token);
        rightEdge = Math.max(rightEdge, token.bbox.x1);
      }
    }

    this.mergeUndersized(groups, gaps);

    this.logger.debug(
      `[ColumnSegmenter] Page ${sorted[0].pageNo}: ${groups.length} column(s)`,
    );
    return groups.map((group) => group.tokens);
  }

  private mergeUndersized(groups: Group[], gaps: number[]): void {
    while (groups.length > 1) {
      let index = -1;
      for (let i = 0; i < groups.length; i++) {
        const size = groups[i].tokens.length;
        if (
          size < this.options.minColumnTokens &&
          (index === -1 || size < groups[index].tokens.length)
        ) {
          index = i;
        }
      }
      if (index === -1) return;

      const leftGap = index > 0 ? gaps[index - 1] : Infinity;
      const rightGap = index < groups.length - 1 ? gaps[index] : Infinity;
      const into = leftGap <= rightGap ? index - 1 : index;

      groups[into].tokens.push(...groups[into + 1].tokens);
      groups.splice(into + 1, 1);
      gaps.splice(into, 1);
    }
  }
}
