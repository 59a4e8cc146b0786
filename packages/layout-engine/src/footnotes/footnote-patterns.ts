export type MarkerKind =
  | 'asterisk'
  | 'kome'
  | 'chu'
  | 'dagger'
  | 'bracketed'
  | 'parenthesized'
  | 'circled'
  | 'superscript';

export interface MarkerRule {
  readonly kind: MarkerKind;

  /** Matches a whole token (or a whole short line) */
  readonly pattern: RegExp;
}

const SUPERSCRIPT_DIGITS = '⁰¹²³⁴⁵⁶⁷⁸⁹';

const MARKER_BODY = [
  '\\*\\d+',
  '\\*',
  '※\\d*',
  '注\\d*',
  '[†‡§]',
  '\\[\\d+\\]',
  '\\(\\d+\\)',
  '[①-⑳]',
  `[${SUPERSCRIPT_DIGITS}]+`,
] as const;

/**
 * Standalone footnote marker forms, in priority order.
 */
export const MARKER_RULES: readonly MarkerRule[] = [
  { kind: 'asterisk', pattern: /^\*\d+$/ },
  { kind: 'asterisk', pattern: /^\*$/ },
  { kind: 'kome', pattern: /^※\d*$/u },
  { kind: 'chu', pattern: /^注\d*$/u },
  { kind: 'dagger', pattern: /^[†‡§]$/u },
  { kind: 'bracketed', pattern: /^\[\d+\]$/ },
  { kind: 'parenthesized', pattern: /^\(\d+\)$/ },
  { kind: 'circled', pattern: /^[①-⑳]$/u },
  { kind: 'superscript', pattern: new RegExp(`^[${SUPERSCRIPT_DIGITS}]+$`, 'u') },
];

/**
 * A marker glued to the end of a word: `word*1`, `claim†`, `value²`.
 */
const ATTACHED_MARKER = new RegExp(
  `^(?<word>.*[\\p{L}\\p{N}.,;:)\\]])(?<marker>\\*\\d+|[†‡]|[${SUPERSCRIPT_DIGITS}]+)$`,
  'u',
);

/**
 * Start of a footnote definition line: marker, separator, body.
 */
const DEFINITION_START = new RegExp(
  `^(?<marker>${MARKER_BODY.join('|')})[\\s:：]+(?<body>.*)$`,
  'u',
);

/**
 * Script text that reads as a marker when raised: digits or marker symbols.
 */
const SCRIPT_MARKER = /^(?:\d{1,3}|\*\d*|[†‡§])$/;

export function matchMarkerRule(text: string): MarkerRule | undefined {
  return MARKER_RULES.find((rule) => rule.pattern.test(text));
}

export function isMarkerText(text: string): boolean {
  return matchMarkerRule(text) !== undefined;
}

/**
 * Marker glued to the end of a token, if any.
 */
export function extractAttachedMarker(text: string): string | undefined {
  return ATTACHED_MARKER.exec(text)?.groups?.marker;
}

export function isScriptMarker(text: string): boolean {
  return SCRIPT_MARKER.test(text);
}

/**
 * Parse a footnote definition line into its marker and body.
 */
export function parseDefinitionStart(
  line: string,
): { marker: string; body: string } | undefined {
  const groups = DEFINITION_START.exec(line.trim())?.groups;
  if (!groups) return undefined;
  return { marker: groups.marker, body: groups.body.trim() };
}

/**
 * Canonical marker text: superscript digits become ASCII so a raised `¹`
 * and a definition starting with `1` compare equal.
 */
export function canonicalMarker(text: string): string {
  return Array.from(text.trim())
    .map((char) => {
      const digit = SUPERSCRIPT_DIGITS.indexOf(char);
      return digit === -1 ? char : String(digit);
    })
    .join('');
}
