import type { BBox } from '@glyphorder/model';

import { READING_ORDER } from '../config/constants';

/** Han ideographs, kana and half-width kana: scripts written without spaces */
const CJK_CHAR = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff\uff66-\uff9f]/u;

const CLOSING_PUNCTUATION = /^[,.;:!?)\]}%、。，．：；！？）」』】]/u;

const OPENING_PUNCTUATION = /[([{「『【]$/u;

export interface JoinableToken {
  readonly text: string;
  readonly bbox: BBox;
  readonly fontSize: number;
}

export function isCjk(char: string | undefined): boolean {
  return char !== undefined && CJK_CHAR.test(char);
}

/**
 * Whether a space belongs between two horizontally adjacent tokens.
 */
export function needsSpace(
  prev: JoinableToken,
  next: JoinableToken,
  wordGapRatio: number,
): boolean {
  if (
    CLOSING_PUNCTUATION.test(next.text) ||
    OPENING_PUNCTUATION.test(prev.text)
  ) {
    return false;
  }

  const gap = next.bbox.x0 - prev.bbox.x1;
  const font = Math.max(prev.fontSize, next.fontSize);

  if (isCjk(prev.text.at(-1)) && isCjk(next.text.at(0))) {
    return gap > font * READING_ORDER.CJK_GAP_RATIO;
  }
  return gap > font * wordGapRatio;
}

/**
 * Join tokens already in reading order into one line of text.
 */
export function joinTokens(
  tokens: readonly JoinableToken[],
  wordGapRatio: number,
): string {
  let out = '';
  tokens.forEach((token, index) => {
    if (index > 0 && needsSpace(tokens[index - 1], token, wordGapRatio)) {
      out += ' ';
    }
    out += token.text;
  });
  return out;
}

/**
 * Collapse whitespace runs and trim.
 */
export function normalizeWhitespace(text: string): string {
  return text.normalize('NFC').replace(/\s+/g, ' ').trim();
}

/**
 * Structural key for repetition detection: lowercase, digit runs become
 * `#`, punctuation dropped.
 */
export function normalizeForRepetition(raw: string): string {
  return normalizeWhitespace(raw)
    .toLowerCase()
    .replace(/\d+/g, '#')
    .replace(/[^\p{L}\p{N}# ]+/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}
