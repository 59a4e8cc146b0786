import type { FlagSeverity } from '@glyphorder/model';

import { ScriptAttacher } from '../scripts/script-attacher';

export interface HallucinationRule {
  readonly id: string;
  readonly description: string;

  /** Global pattern; every match is a candidate span */
  readonly pattern: RegExp;
  readonly severity: FlagSeverity;
}

export interface HallucinationFinding {
  readonly rule: HallucinationRule;
  readonly span: string;
  readonly start: number;
  readonly end: number;
}

/**
 * Text the pipeline itself never produces. A match is only a finding when
 * the span cannot be found in the page's source tokens.
 */
export const HALLUCINATION_RULES: readonly HallucinationRule[] = [
  {
    id: 'markdown-heading',
    description: 'Markdown heading line',
    pattern: /^#{1,6}[ \t]+\S[^\n]*$/gm,
    severity: 'high',
  },
  {
    id: 'synthetic-heading',
    description: 'Generic section heading with no source',
    pattern:
      /^[ \t]*(?:table of contents|summary|introduction|conclusion)[ \t]*:?[ \t]*$/gim,
    severity: 'medium',
  },
  {
    id: 'bold-asterisk',
    description: 'Markdown bold emphasis',
    pattern: /\*\*[^*\n]+\*\*/g,
    severity: 'high',
  },
  {
    id: 'bold-underscore',
    description: 'Markdown bold emphasis',
    pattern: /__[^_\n]+__/g,
    severity: 'high',
  },
  {
    id: 'italic-asterisk',
    description: 'Markdown italic emphasis',
    pattern: /(?<![\w*])\*(?=[^\s*\d])[^*\n]+(?<=\S)\*(?![\w*])/g,
    severity: 'medium',
  },
  {
    id: 'italic-underscore',
    description: 'Markdown italic emphasis',
    pattern: /(?<=^|\s)_(?=[^\s_{])[^_\n]+(?<=\S)_(?=$|[\s.,;:!?])/gm,
    severity: 'medium',
  },
  {
    id: 'html-tag',
    description: 'HTML tag',
    pattern: /<\/?[a-z][a-z0-9]*(?:\s[^<>\n]*)?\/?>/gi,
    severity: 'high',
  },
  {
    id: 'generative-phrase',
    description: 'Narration about the document',
    pattern:
      /\b(?:this (?:section|document|page|table) (?:describes|contains|shows|summarizes)|as (?:shown|seen) (?:above|below)|please note|note that|the following (?:is|are)|below is|above is)\b[^\n]*/gi,
    severity: 'medium',
  },
];

function sourceWords(text: string): string[] {
  return ScriptAttacher.plainScripts(text)
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/**
 * Lower-cased words of a page's source tokens, scripts in plain form.
 */
export interface SourceCorpus {
  readonly words: ReadonlySet<string>;
}

export function buildSourceCorpus(texts: readonly string[]): SourceCorpus {
  return { words: new Set(texts.flatMap(sourceWords)) };
}

/**
 * True when `word` is one source word or several glued together, as tokens
 * joined without a space are.
 */
function isComposedOfSourceWords(
  word: string,
  vocabulary: ReadonlySet<string>,
): boolean {
  if (vocabulary.has(word)) return true;
  const reachable: boolean[] = [true];
  for (let end = 1; end <= word.length; end++) {
    reachable[end] = false;
    for (let start = 0; start < end && !reachable[end]; start++) {
      reachable[end] =
        reachable[start] && vocabulary.has(word.slice(start, end));
    }
  }
  return reachable[word.length];
}

/**
 * A span is supported when every word in it, formatting syntax included,
 * occurs among the source tokens. Word order is not compared, since the
 * source arrives in parser order rather than reading order.
 */
export function isSupportedBySource(span: string, corpus: SourceCorpus): boolean {
  const words = sourceWords(span);
  return (
    words.length > 0 &&
    words.every((word) => isComposedOfSourceWords(word, corpus.words))
  );
}

/**
 * Every rule match in `text` that the source does not support, ordered by
 * position.
 */
export function scanForHallucinations(
  text: string,
  corpus: SourceCorpus,
  rules: readonly HallucinationRule[] = HALLUCINATION_RULES,
): HallucinationFinding[] {
  const findings: HallucinationFinding[] = [];
  for (const rule of rules) {
    for (const match of text.matchAll(rule.pattern)) {
      const span = match[0];
      const start = match.index ?? 0;
      if (isSupportedBySource(span, corpus)) continue;
      findings.push({ rule, span, start, end: start + span.length });
    }
  }
  return findings.sort((a, b) => a.start - b.start || b.end - a.end);
}

/**
 * Remove the finding spans from `text`, then tidy the blank lines and
 * trailing spaces left behind.
 */
export function stripFindings(
  text: string,
  findings: readonly HallucinationFinding[],
): string {
  let out = '';
  let cursor = 0;
  for (const finding of findings) {
    if (finding.end <= cursor) continue;
    out += text.slice(cursor, Math.max(cursor, finding.start));
    cursor = finding.end;
  }
  out += text.slice(cursor);

  return out
    .split('\n')
    .map((line) => line.replace(/[ \t]+$/, ''))
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
