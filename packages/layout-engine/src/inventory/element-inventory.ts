import type {
  CoverageStatus,
  DocumentInventory,
  PageInput,
  PageInventory,
  PositionBand,
  SizeClass,
  Token,
} from '@glyphorder/model';

import { INVENTORY } from '../config/constants';
import { centroid, clamp01 } from '../utils/geometry';

type PageTokens = Pick<PageInput, 'pageNo' | 'height' | 'tokens'>;

export function emptyPositionCounts(): Record<PositionBand, number> {
  return { top: 0, middle: 0, bottom: 0 };
}

/**
 * Pre-filtering census of every token in a document; the baseline all
 * coverage figures are measured against.
 */
export class ElementInventory {
  static positionBand(token: Token, pageHeight: number): PositionBand {
    const ratio = pageHeight > 0 ? centroid(token.bbox).y / pageHeight : 0;
    if (ratio < INVENTORY.TOP_REGION) return 'top';
    if (ratio > INVENTORY.BOTTOM_REGION) return 'bottom';
    return 'middle';
  }

  static sizeClass(fontSize: number): SizeClass {
    if (fontSize > INVENTORY.LARGE_FONT) return 'large';
    if (fontSize >= INVENTORY.STANDARD_FONT) return 'standard';
    if (fontSize >= INVENTORY.SMALL_FONT) return 'small';
    return 'tiny';
  }

  /**
   * Count tokens per position band on one page.
   */
  static countByPosition(
    tokens: readonly Token[],
    pageHeight: number,
  ): Record<PositionBand, number> {
    const counts = emptyPositionCounts();
    for (const token of tokens) {
      counts[ElementInventory.positionBand(token, pageHeight)]++;
    }
    return counts;
  }

  /**
   * Capture the frozen inventory. Must run before any filtering.
   */
  static capture(pages: readonly PageTokens[]): DocumentInventory {
    const byPosition = emptyPositionCounts();
    const pageInventories: PageInventory[] = pages.map((page) => {
      const positions = ElementInventory.countByPosition(
        page.tokens,
        page.height,
      );
      const sizes: Record<SizeClass, number> = {
        large: 0,
        standard: 0,
        small: 0,
        tiny: 0,
      };
      for (const token of page.tokens) {
        sizes[ElementInventory.sizeClass(token.fontSize)]++;
      }

      byPosition.top += positions.top;
      byPosition.middle += positions.middle;
      byPosition.bottom += positions.bottom;

      return Object.freeze({
        pageNo: page.pageNo,
        total: page.tokens.length,
        byPosition: Object.freeze(positions),
        bySize: Object.freeze(sizes),
      });
    });

    return Object.freeze({
      pages: Object.freeze(pageInventories),
      total: pageInventories.reduce((sum, page) => sum + page.total, 0),
      byPosition: Object.freeze(byPosition),
    });
  }

  /**
   * Extracted share of the inventory, clamped to [0,1]. An empty inventory
   * has coverage 0.
   */
  static coverage(inventory: DocumentInventory, extracted: number): number {
    return inventory.total > 0 ? clamp01(extracted / inventory.total) : 0;
  }

  static coverageStatus(coverage: number): CoverageStatus {
    if (coverage >= INVENTORY.GOOD_COVERAGE) return 'GOOD';
    if (coverage >= INVENTORY.WARNING_COVERAGE) return 'WARNING';
    return 'POOR';
  }
}
