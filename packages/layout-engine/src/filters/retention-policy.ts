import type {
  RemovalReason,
  RetentionReason,
  Token,
} from '@glyphorder/model';

import { SECTION_NUMBER_PATTERN } from './metadata-rules';

export type RetentionDecision =
  | { readonly action: 'remove'; readonly reason: RemovalReason }
  | { readonly action: 'retain'; readonly reason: RetentionReason };

/** Removals that only happen while margin filtering is on */
const MARGIN_DEPENDENT: ReadonlySet<RemovalReason> = new Set<RemovalReason>([
  'REPEATING_ELEMENT',
  'MARGIN_PAGE_NUMBER',
]);

/**
 * Final say on every proposed removal.
 *
 * Protected content (section numbers) always survives, and disabling margin
 * filtering turns margin-dependent removals into retentions.
 */
export class RetentionPolicy {
  private readonly marginFiltering: boolean;

  constructor(options: { marginFiltering: boolean }) {
    this.marginFiltering = options.marginFiltering;
  }

  review(token: Token, proposed: RemovalReason): RetentionDecision {
    if (SECTION_NUMBER_PATTERN.test(token.text)) {
      return { action: 'retain', reason: 'SECTION_NUMBER' };
    }
    if (!this.marginFiltering && MARGIN_DEPENDENT.has(proposed)) {
      return { action: 'retain', reason: 'POLICY_OVERRIDE' };
    }
    return { action: 'remove', reason: proposed };
  }
}
