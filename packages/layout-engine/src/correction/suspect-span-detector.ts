import type {
  PageResult,
  SuspectIssueType,
  SuspectSpan,
  Token,
} from '@glyphorder/model';

import type { ExtractionConfig } from '../config/extraction-config';

import { SPAN_CORRECTION } from '../config/constants';

export interface SuspectRule {
  readonly issueType: Exclude<SuspectIssueType, 'low_ocr_confidence'>;

  /** Global pattern; every match is a suspect span */
  readonly pattern: RegExp;
}

/**
 * Character confusions typical of OCR output.
 */
export const SUSPECT_RULES: readonly SuspectRule[] = [
  { issueType: 'digit_in_word', pattern: /\b[a-zA-Z]+\d+[a-zA-Z]+\b/g },
  { issueType: 'letter_in_number', pattern: /\b\d+[a-zA-Z]+\d+\b/g },
  // mixed runs only: "Il1", "l1"; plain "11" or "Ill" are left alone
  {
    issueType: 'ambiguous_il1',
    pattern: /\b(?=[Il1]*1)(?=[Il1]*[Il])[Il1]{2,}\b/g,
  },
  {
    issueType: 'ambiguous_o0',
    pattern: /\b(?=[O0]*0)(?=[O0]*O)[O0]{2,}\b/g,
  },
];

interface Match {
  issueType: SuspectIssueType;
  start: number;
  end: number;
}

/**
 * Picks the spans of a page's text worth sending to the span corrector:
 * rule matches plus OCR tokens below the confidence floor.
 *
 * Overlapping matches keep the earliest; at most MAX_SPANS_PER_PAGE spans
 * are returned, in text order.
 */
export class SuspectSpanDetector {
  private readonly contextChars: number;

  constructor(config: Pick<ExtractionConfig, 'llmContextChars'>) {
    this.contextChars = config.llmContextChars;
  }

  detect(
    page: Pick<PageResult, 'pageNo' | 'text'>,
    tokens: readonly Token[],
  ): SuspectSpan[] {
    const { text } = page;
    const matches: Match[] = [];

    for (const rule of SUSPECT_RULES) {
      for (const match of text.matchAll(rule.pattern)) {
        const start = match.index ?? 0;
        matches.push({
          issueType: rule.issueType,
          start,
          end: start + match[0].length,
        });
      }
    }
    matches.push(...this.lowConfidenceMatches(text, tokens));

    matches.sort((a, b) => a.start - b.start || b.end - a.end);
    const kept: Match[] = [];
    for (const match of matches) {
      const previous = kept.at(-1);
      if (previous && match.start < previous.end) continue;
      kept.push(match);
    }

    return kept.slice(0, SPAN_CORRECTION.MAX_SPANS_PER_PAGE).map((match) => ({
      pageNo: page.pageNo,
      issueType: match.issueType,
      text: text.slice(match.start, match.end),
      start: match.start,
      end: match.end,
      contextBefore: text.slice(
        Math.max(0, match.start - this.contextChars),
        match.start,
      ),
      contextAfter: text.slice(match.end, match.end + this.contextChars),
    }));
  }

  /**
   * Locate low-confidence tokens in the text, in token order.
   */
  private lowConfidenceMatches(
    text: string,
    tokens: readonly Token[],
  ): Match[] {
    const matches: Match[] = [];
    let cursor = 0;
    for (const token of tokens) {
      if (
        token.confidence === undefined ||
        token.confidence >= SPAN_CORRECTION.MIN_OCR_CONFIDENCE ||
        token.text.length === 0
      ) {
        continue;
      }
      const start = text.indexOf(token.text, cursor);
      if (start === -1) continue;
      matches.push({
        issueType: 'low_ocr_confidence',
        start,
        end: start + token.text.length,
      });
      cursor = start + token.text.length;
    }
    return matches;
  }
}
