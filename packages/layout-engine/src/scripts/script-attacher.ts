import type { Band, BBox, Token } from '@glyphorder/model';

import type { ExtractionConfig } from '../config/extraction-config';

import { READING_ORDER } from '../config/constants';
import { bboxUnion, mean, median } from '../utils/geometry';
import { joinTokens } from '../utils/text';
import scriptCharacters from './script-characters.json';

export type ScriptKind = 'superscript' | 'subscript';

export interface ScriptRun {
  readonly token: Token;
  readonly kind: ScriptKind;

  /** Canonical unicode form, or `^{...}` / `_{...}` when none exists */
  readonly rendered: string;
}

/**
 * A base token with the scripts attached to it.
 */
export interface BandSegment {
  /** Base token, or the script token itself when it found no base */
  readonly base: Token;

  /** Set when `base` is a script that found no base of its own */
  readonly baseKind?: ScriptKind;
  readonly scripts: readonly ScriptRun[];
  readonly text: string;
  readonly bbox: BBox;
}

export interface AttachedBand {
  readonly band: Band;
  readonly segments: readonly BandSegment[];

  /** Band text with scripts rendered in place */
  readonly text: string;
}

export type ScriptAttacherConfig = Pick<
  ExtractionConfig,
  'scriptSizeRatio' | 'scriptOffsetRatio' | 'scriptProximity' | 'wordGapRatio'
>;

const CHARACTER_MAPS: Record<ScriptKind, Readonly<Record<string, string>>> = {
  superscript: scriptCharacters.superscript,
  subscript: scriptCharacters.subscript,
};

const CANONICAL_CHARACTERS: Record<ScriptKind, ReadonlySet<string>> = {
  superscript: new Set(Object.values(scriptCharacters.superscript)),
  subscript: new Set(Object.values(scriptCharacters.subscript)),
};

const PLAIN_CHARACTERS: ReadonlyMap<string, string> = new Map(
  Object.values(CHARACTER_MAPS).flatMap((map) =>
    Object.entries(map).map(([plain, rendered]): [string, string] => [
      rendered,
      plain,
    ]),
  ),
);

const TAGGED_SCRIPT = /[\^_]\{([^{}]*)\}/g;

/**
 * Detects superscripts and subscripts inside a band and binds each to the
 * token it decorates.
 *
 * A token is a script candidate when its font is under `scriptSizeRatio`
 * of the mean font of the other band tokens and its baseline sits more than
 * `scriptOffsetRatio` band font sizes above or below theirs.
 */
export class ScriptAttacher {
  private readonly config: ScriptAttacherConfig;

  constructor(config: ScriptAttacherConfig) {
    this.config = config;
  }

  /**
   * Render script text in canonical unicode when every character has a
   * script form, otherwise as a tagged run.
   */
  static renderScript(text: string, kind: ScriptKind): string {
    const map = CHARACTER_MAPS[kind];
    const canonical = CANONICAL_CHARACTERS[kind];
    const chars = Array.from(text);
    const hasForm = (char: string) =>
      Object.hasOwn(map, char) || canonical.has(char);
    if (chars.every(hasForm)) {
      return chars
        .map((char) => (Object.hasOwn(map, char) ? map[char] : char))
        .join('');
    }
    return kind === 'superscript' ? `^{${text}}` : `_{${text}}`;
  }

  /**
   * Undo `renderScript` across a whole text. Tagged runs and unicode script
   * characters become plain text set apart by spaces, so `value²` reads as
   * `value 2`.
   */
  static plainScripts(text: string): string {
    let out = '';
    let inScript = false;
    for (const char of Array.from(text.replace(TAGGED_SCRIPT, ' $1 '))) {
      const plain = PLAIN_CHARACTERS.get(char);
      if (plain === undefined) {
        out += inScript ? ` ${char}` : char;
        inScript = false;
      } else {
        out += inScript ? plain : ` ${plain}`;
        inScript = true;
      }
    }
    return out;
  }

  attach(band: Band): AttachedBand {
    const kinds = this.classify(band.tokens);
    const maxGap = this.config.scriptProximity * band.fontSize;

    const segments: BandSegment[] = [];
    for (const token of band.tokens) {
      const kind = kinds.get(token);
      const last = segments.at(-1);

      if (!kind) {
        segments.push({
          base: token,
          scripts: [],
          text: token.text,
          bbox: token.bbox,
        });
        continue;
      }

      const rendered = ScriptAttacher.renderScript(token.text, kind);
      if (
        last &&
        last.baseKind === undefined &&
        token.bbox.x0 - last.bbox.x1 <= maxGap
      ) {
        segments[segments.length - 1] = {
          ...last,
          scripts: [...last.scripts, { token, kind, rendered }],
          text: last.text + rendered,
          bbox: bboxUnion(last.bbox, token.bbox),
        };
      } else {
        segments.push({
          base: token,
          baseKind: kind,
          scripts: [],
          text: rendered,
          bbox: token.bbox,
        });
      }
    }

    const text = joinTokens(
      segments.map((segment) => ({
        text: segment.text,
        bbox: segment.bbox,
        fontSize: segment.base.fontSize,
      })),
      this.config.wordGapRatio,
    );
    return { band, segments, text };
  }

  private classify(tokens: readonly Token[]): Map<Token, ScriptKind> {
    const kinds = new Map<Token, ScriptKind>();
    if (tokens.length < 2) return kinds;

    for (const token of tokens) {
      const others = tokens.filter((other) => other !== token);
      const averageFont = mean(others.map((other) => other.fontSize));
      if (token.fontSize >= this.config.scriptSizeRatio * averageFont) {
        continue;
      }

      const maxFont = Math.max(...others.map((other) => other.fontSize));
      const body = others.filter(
        (other) => other.fontSize >= maxFont * READING_ORDER.BODY_FONT_RATIO,
      );
      const offset =
        token.baselineY - median(body.map((other) => other.baselineY));
      const bodyFont = median(body.map((other) => other.fontSize));

      if (Math.abs(offset) > this.config.scriptOffsetRatio * bodyFont) {
        kinds.set(token, offset < 0 ? 'superscript' : 'subscript');
      }
    }
    return kinds;
  }
}
