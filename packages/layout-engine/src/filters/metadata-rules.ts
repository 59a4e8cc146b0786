import type { RemovalReason, RetentionReason } from '@glyphorder/model';

import { MARKER_RULES } from '../footnotes/footnote-patterns';

/**
 * Section numbering such as `1.2` or `3.10.4`. Text matching this is never
 * removed, whatever other rule fires.
 */
export const SECTION_NUMBER_PATTERN = /\d+\.\d+/;

export type MetadataRule =
  | {
      readonly id: string;
      readonly pattern: RegExp;
      readonly action: 'retain';
      readonly reason: RetentionReason;
    }
  | {
      readonly id: string;
      readonly pattern: RegExp;
      readonly action: 'remove';
      readonly reason: RemovalReason;
    };

const PAGE_NUMBER_PATTERNS: readonly { id: string; pattern: RegExp }[] = [
  { id: 'page-label', pattern: /^page\s+\d+(?:\s+of\s+\d+)?$/i },
  { id: 'page-fraction', pattern: /^\d+\s*\/\s*\d+$/ },
  { id: 'dash-number', pattern: /^[-–—]\s*\d+\s*[-–—]$/u },
  { id: 'bracketed-dash-number', pattern: /^[[(]\s*[-–—]\s*\d+\s*[-–—]\s*[\])]$/u },
  { id: 'p-dot', pattern: /^pp?\.\s*\d+$/i },
  { id: 'japanese-page', pattern: /^(?:ページ\s*\d+|\d+\s*ページ)$/u },
  { id: 'korean-page', pattern: /^\d+\s*쪽$/u },
];

/**
 * Ordered rules applied to short line runs. The first match decides;
 * a run matching none is kept unless it is an isolated margin number.
 */
export const METADATA_RULES: readonly MetadataRule[] = [
  {
    id: 'section-number',
    pattern: SECTION_NUMBER_PATTERN,
    action: 'retain',
    reason: 'SECTION_NUMBER',
  },
  ...MARKER_RULES.map(
    (rule): MetadataRule => ({
      id: `footnote-${rule.kind}`,
      pattern: rule.pattern,
      action: 'retain',
      reason: 'FOOTNOTE_MARKER',
    }),
  ),
  ...PAGE_NUMBER_PATTERNS.map(
    ({ id, pattern }): MetadataRule => ({
      id,
      pattern,
      action: 'remove',
      reason: 'PAGE_NUMBER_PATTERN',
    }),
  ),
];

/**
 * Bare page number: one to four digits.
 */
export const BARE_NUMBER_PATTERN = /^\d{1,4}$/;

export function matchMetadataRule(text: string): MetadataRule | undefined {
  const trimmed = text.trim();
  return METADATA_RULES.find((rule) => rule.pattern.test(trimmed));
}
