import type { Band, Token } from '@glyphorder/model';

import { READING_ORDER } from '../config/constants';
import { bboxOf, median, stableSortBy } from '../utils/geometry';

interface DraftBand {
  tokens: Token[];
  top: number;
  bottom: number;
  seedFont: number;
}

/**
 * Groups tokens into visual lines (Bands) and orders them top-to-bottom,
 * left-to-right.
 *
 * A band's vertical extent covers only its body tokens (font close to the
 * largest in the band), so a superscript or subscript joins the line of its
 * base without dragging the neighbouring line in.
 */
export class ReadingOrderSorter {
  /**
   * Build the bands of a token set, ordered by top edge then left edge.
   * Tokens inside a band are ordered by x0.
   */
  static buildBands(
    tokens: readonly Token[],
    lineOverlapRatio: number,
  ): Band[] {
    const sorted = stableSortBy(
      tokens,
      (t) => t.bbox.y0,
      (t) => t.bbox.x0,
    );
    const drafts: DraftBand[] = [];

    for (const token of sorted) {
      const target = ReadingOrderSorter.findBand(
        drafts,
        token,
        lineOverlapRatio,
      );
      if (!target) {
        drafts.push({
          tokens: [token],
          top: token.bbox.y0,
          bottom: token.bbox.y1,
          seedFont: token.fontSize,
        });
        continue;
      }

      target.tokens.push(token);
      ReadingOrderSorter.updateExtent(target);
    }

    const bands = drafts.map((draft) => ReadingOrderSorter.toBand(draft.tokens));
    return stableSortBy(
      bands,
      (band) => band.bbox.y0,
      (band) => band.bbox.x0,
    );
  }

  /**
   * Split every band of the token set into horizontal runs wherever the gap
   * between neighbours exceeds `gap`. Runs keep band order.
   */
  static lineRuns(
    tokens: readonly Token[],
    lineOverlapRatio: number,
    gap: number,
  ): Token[][] {
    return ReadingOrderSorter.buildBands(tokens, lineOverlapRatio).flatMap(
      (band) => ReadingOrderSorter.splitByGap(band.tokens, gap),
    );
  }

  /**
   * Split tokens already ordered by x0 wherever the whitespace before a
   * token exceeds `gap`.
   */
  static splitByGap(tokens: readonly Token[], gap: number): Token[][] {
    const runs: Token[][] = [];
    let current: Token[] = [];
    let rightEdge = -Infinity;
    for (const token of tokens) {
      if (current.length > 0 && token.bbox.x0 - rightEdge > gap) {
        runs.push(current);
        current = [];
        rightEdge = -Infinity;
      }
      current.push(token);
      rightEdge = Math.max(rightEdge, token.bbox.x1);
    }
    if (current.length > 0) {
      runs.push(current);
    }
    return runs;
  }

  /**
   * Assemble a Band from tokens that share a line.
   *
   * Baseline and font size are medians over the body tokens, so scripts do
   * not shift them.
   */
  static toBand(tokens: readonly Token[]): Band {
    const ordered = stableSortBy(tokens, (t) => t.bbox.x0);
    const maxFont = Math.max(...ordered.map((t) => t.fontSize));
    const body = ordered.filter(
      (t) => t.fontSize >= maxFont * READING_ORDER.BODY_FONT_RATIO,
    );
    return {
      tokens: ordered,
      bbox: bboxOf(ordered),
      baselineY: median(body.map((t) => t.baselineY)),
      fontSize: median(body.map((t) => t.fontSize)),
    };
  }

  private static updateExtent(draft: DraftBand): void {
    draft.seedFont = Math.max(...draft.tokens.map((t) => t.fontSize));
    const body = draft.tokens.filter(
      (t) => t.fontSize >= draft.seedFont * READING_ORDER.BODY_FONT_RATIO,
    );
    draft.top = Math.min(...body.map((t) => t.bbox.y0));
    draft.bottom = Math.max(...body.map((t) => t.bbox.y1));
  }

  private static findBand(
    drafts: readonly DraftBand[],
    token: Token,
    lineOverlapRatio: number,
  ): DraftBand | undefined {
    let best: DraftBand | undefined;
    let bestRatio = 0;
    const height = token.bbox.y1 - token.bbox.y0;

    for (const draft of drafts) {
      const overlap =
        Math.min(token.bbox.y1, draft.bottom) - Math.max(token.bbox.y0, draft.top);
      if (overlap <= 0) continue;

      const smaller = Math.min(height, draft.bottom - draft.top);
      const ratio = smaller > 0 ? overlap / smaller : 0;
      if (ratio >= lineOverlapRatio && ratio > bestRatio) {
        best = draft;
        bestRatio = ratio;
      }
    }
    return best;
  }
}
