import type { Token } from '@glyphorder/model';

export interface EncodingRule {
  readonly id: string;
  readonly description: string;
  readonly pattern: RegExp;
}

/**
 * Artifacts left behind by a failed font or CMap decode.
 */
export const ENCODING_RULES: readonly EncodingRule[] = [
  {
    id: 'replacement-char',
    description: 'Unicode replacement character',
    pattern: /\uFFFD/,
  },
  {
    id: 'nul',
    description: 'NUL character',
    pattern: /\u0000/,
  },
  {
    id: 'hex-escape',
    description: 'Literal \\xNN escape',
    pattern: /\\x[0-9a-fA-F]{2}/,
  },
  {
    id: 'unicode-escape',
    description: 'Literal \\uNNNN escape',
    pattern: /\\u[0-9a-fA-F]{4}/,
  },
  {
    id: 'control-char',
    description: 'C0 control character',
    pattern: /[\u0001-\u0008\u000B\u000C\u000E-\u001F\u007F]/,
  },
];

export function matchEncodingRule(text: string): EncodingRule | undefined {
  return ENCODING_RULES.find((rule) => rule.pattern.test(text));
}

export function countCorruptedTokens(tokens: readonly Token[]): number {
  return tokens.filter((token) => matchEncodingRule(token.text) !== undefined)
    .length;
}

