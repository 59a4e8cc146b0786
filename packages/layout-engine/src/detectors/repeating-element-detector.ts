import type { LoggerMethods } from '@glyphorder/logger';
import type { PageInput, Token } from '@glyphorder/model';

import type { ExtractionConfig } from '../config/extraction-config';

import { ReadingOrderSorter } from '../layout/reading-order-sorter';
import { bboxOf, centroid, quantize } from '../utils/geometry';
import { joinTokens, normalizeForRepetition } from '../utils/text';

export type RepeatingRegion = 'header' | 'footer';

export interface RepeatingSignature {
  readonly signature: string;
  readonly region: RepeatingRegion;

  /** Text of the first occurrence */
  readonly text: string;
  readonly pageNos: readonly number[];
}

export interface RepeatingElements {
  /** Tokens belonging to a repeating line on any page */
  readonly tokens: ReadonlySet<Token>;
  readonly signatures: readonly RepeatingSignature[];
}

export type RepeatingDetectorConfig = Pick<
  ExtractionConfig,
  | 'headerFooterZone'
  | 'repeatThreshold'
  | 'positionPrecision'
  | 'lineOverlapRatio'
  | 'columnGap'
  | 'wordGapRatio'
>;

type PageTokens = Pick<PageInput, 'pageNo' | 'width' | 'height' | 'tokens'>;

interface Occurrences {
  region: RepeatingRegion;
  text: string;
  pageNos: Set<number>;
  tokens: Token[];
}

/**
 * Finds header and footer lines that recur across pages.
 *
 * A line's signature is its text with digit runs folded to `#` plus its
 * quantized position, so "Page 3" and "Page 4" in the same spot collide.
 * A signature repeats when it appears on at least two pages and on more
 * than `repeatThreshold` of them (or on all of them).
 */
export class RepeatingElementDetector {
  private readonly logger: LoggerMethods;
  private readonly config: RepeatingDetectorConfig;

  constructor(logger: LoggerMethods, config: RepeatingDetectorConfig) {
    this.logger = logger;
    this.config = config;
  }

  detect(pages: readonly PageTokens[]): RepeatingElements {
    const populated = pages.filter((page) => page.tokens.length > 0);
    if (populated.length < 2) {
      return { tokens: new Set(), signatures: [] };
    }

    const occurrences = new Map<string, Occurrences>();
    for (const page of populated) {
      this.collectPage(page, occurrences);
    }

    const tokens = new Set<Token>();
    const signatures: RepeatingSignature[] = [];
    for (const [signature, entry] of occurrences) {
      if (!this.isRepeating(entry.pageNos.size, populated.length)) continue;
      signatures.push({
        signature,
        region: entry.region,
        text: entry.text,
        pageNos: [...entry.pageNos].sort((a, b) => a - b),
      });
      for (const token of entry.tokens) {
        tokens.add(token);
      }
    }

    this.logger.info(
      `[RepeatingElementDetector] Found ${signatures.length} repeating signature(s) across ${populated.length} page(s)`,
    );
    return { tokens, signatures };
  }

  private isRepeating(pagesSeen: number, pageCount: number): boolean {
    if (pagesSeen < 2) return false;
    return (
      pagesSeen === pageCount ||
      pagesSeen / pageCount > this.config.repeatThreshold
    );
  }

  private collectPage(
    page: PageTokens,
    occurrences: Map<string, Occurrences>,
  ): void {
    const zone = this.config.headerFooterZone * page.height;
    const zoneTokens = page.tokens.filter((token) => {
      const { y } = centroid(token.bbox);
      return y < zone || y > page.height - zone;
    });

    const runs = ReadingOrderSorter.lineRuns(
      zoneTokens,
      this.config.lineOverlapRatio,
      this.config.columnGap,
    );

    for (const run of runs) {
      const text = joinTokens(run, this.config.wordGapRatio);
      const normalized = normalizeForRepetition(text);
      if (!normalized) continue;

      const box = bboxOf(run);
      const region: RepeatingRegion =
        centroid(box).y < page.height / 2 ? 'header' : 'footer';
      const signature = [
        region,
        normalized,
        quantize(box.x0 / page.width, this.config.positionPrecision),
        quantize(box.y0 / page.height, this.config.positionPrecision),
      ].join('|');

      let entry = occurrences.get(signature);
      if (!entry) {
        entry = { region, text, pageNos: new Set(), tokens: [] };
        occurrences.set(signature, entry);
      }
      entry.pageNos.add(page.pageNo);
      entry.tokens.push(...run);
    }
  }
}
