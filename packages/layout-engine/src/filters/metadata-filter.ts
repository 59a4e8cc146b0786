import type { LoggerMethods } from '@glyphorder/logger';
import type {
  PageInput,
  RemovalReason,
  RemovalRecord,
  RetentionReason,
  Token,
} from '@glyphorder/model';

import type { ExtractionConfig } from '../config/extraction-config';

import { METADATA_FILTER } from '../config/constants';
import { ReadingOrderSorter } from '../layout/reading-order-sorter';
import { bboxDistance, centroid } from '../utils/geometry';
import { joinTokens } from '../utils/text';
import { BARE_NUMBER_PATTERN, matchMetadataRule } from './metadata-rules';
import { RetentionPolicy } from './retention-policy';

export type MetadataFilterConfig = Pick<
  ExtractionConfig,
  | 'marginFiltering'
  | 'marginRatio'
  | 'proximityRadius'
  | 'columnGap'
  | 'lineOverlapRatio'
  | 'wordGapRatio'
>;

export interface MetadataFilterResult {
  /** Surviving tokens, in input order */
  readonly kept: readonly Token[];
  readonly removals: readonly RemovalRecord[];

  /** Retained token counts per reason */
  readonly retentions: Readonly<Record<RetentionReason, number>>;
}

type PageTokens = Pick<PageInput, 'pageNo' | 'width' | 'height' | 'tokens'>;

type RunDecision =
  | { kind: 'retain'; reason: RetentionReason }
  | { kind: 'remove'; reason: RemovalReason }
  | { kind: 'default' };

/**
 * Removes page furniture: page numbers, repeating headers and footers,
 * duplicated glyphs.
 *
 * Short line runs go through the ordered METADATA_RULES; the first match
 * decides. Every proposed removal is then reviewed by RetentionPolicy, and
 * every actual removal is recorded with its reason.
 */
export class MetadataFilter {
  private readonly logger: LoggerMethods;
  private readonly config: MetadataFilterConfig;
  private readonly repeating: ReadonlySet<Token>;
  private readonly policy: RetentionPolicy;

  constructor(
    logger: LoggerMethods,
    config: MetadataFilterConfig,
    repeating: ReadonlySet<Token> = new Set(),
  ) {
    this.logger = logger;
    this.config = config;
    this.repeating = repeating;
    this.policy = new RetentionPolicy(config);
  }

  filter(page: PageTokens): MetadataFilterResult {
    const proposals = new Map<Token, RemovalReason>();
    const retentions: Record<RetentionReason, number> = {
      SECTION_NUMBER: 0,
      FOOTNOTE_MARKER: 0,
      POLICY_OVERRIDE: 0,
      DEFAULT_ALLOW: 0,
    };

    const unique = this.proposeDuplicates(page.tokens, proposals);

    const runs = ReadingOrderSorter.lineRuns(
      unique,
      this.config.lineOverlapRatio,
      this.config.columnGap,
    );
    for (const run of runs) {
      const decision = this.classifyRun(run, unique, page.height);
      if (decision.kind === 'retain') {
        retentions[decision.reason] += run.length;
      } else if (decision.kind === 'remove') {
        for (const token of run) proposals.set(token, decision.reason);
      } else {
        for (const token of run) {
          if (this.repeating.has(token)) {
            proposals.set(token, 'REPEATING_ELEMENT');
          } else {
            retentions.DEFAULT_ALLOW++;
          }
        }
      }
    }

    const removed = new Set<Token>();
    const removals: RemovalRecord[] = [];
    for (const [token, proposed] of proposals) {
      const decision = this.policy.review(token, proposed);
      if (decision.action === 'retain') {
        retentions[decision.reason]++;
        continue;
      }
      removed.add(token);
      removals.push({
        pageNo: page.pageNo,
        text: token.text,
        bbox: token.bbox,
        reason: decision.reason,
      });
    }

    this.logger.debug(
      `[MetadataFilter] Page ${page.pageNo}: removed ${removals.length} token(s), ${retentions.POLICY_OVERRIDE} kept by policy override`,
    );

    return {
      kept: page.tokens.filter((token) => !removed.has(token)),
      removals,
      retentions,
    };
  }

  /**
   * Propose every glyph drawn twice at the same spot; returns the rest.
   */
  private proposeDuplicates(
    tokens: readonly Token[],
    proposals: Map<Token, RemovalReason>,
  ): Token[] {
    const step = METADATA_FILTER.DUPLICATE_POSITION_STEP;
    const seen = new Set<string>();
    const unique: Token[] = [];
    for (const token of tokens) {
      const key = [
        Math.round(token.bbox.x0 / step),
        Math.round(token.bbox.y0 / step),
        token.text,
      ].join('|');
      if (seen.has(key)) {
        proposals.set(token, 'DUPLICATE_GLYPH');
      } else {
        seen.add(key);
        unique.push(token);
      }
    }
    return unique;
  }

  private classifyRun(
    run: readonly Token[],
    pageTokens: readonly Token[],
    pageHeight: number,
  ): RunDecision {
    const text = joinTokens(run, this.config.wordGapRatio);
    const rule = matchMetadataRule(text);
    if (rule?.action === 'retain') {
      return { kind: 'retain', reason: rule.reason };
    }

    const candidate =
      run.length <= METADATA_FILTER.MAX_CANDIDATE_TOKENS &&
      text.length <= METADATA_FILTER.MAX_CANDIDATE_LENGTH;
    if (!candidate) return { kind: 'default' };

    if (rule?.action === 'remove') {
      return { kind: 'remove', reason: rule.reason };
    }
    if (
      run.length === 1 &&
      this.isMarginNumber(run[0], pageTokens, pageHeight)
    ) {
      return { kind: 'remove', reason: 'MARGIN_PAGE_NUMBER' };
    }
    return { kind: 'default' };
  }

  /**
   * A bare number in the top or bottom margin with no neighbour within
   * `proximityRadius`.
   */
  private isMarginNumber(
    token: Token,
    pageTokens: readonly Token[],
    pageHeight: number,
  ): boolean {
    if (!BARE_NUMBER_PATTERN.test(token.text.trim())) return false;

    const margin = this.config.marginRatio * pageHeight;
    const { y } = centroid(token.bbox);
    if (y >= margin && y <= pageHeight - margin) return false;

    return pageTokens.every(
      (other) =>
        other === token ||
        bboxDistance(other.bbox, token.bbox) > this.config.proximityRadius,
    );
  }
}
