import type { LoggerMethods } from '@glyphorder/logger';
import type { Token } from '@glyphorder/model';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { createExtractionConfig } from '../config/extraction-config';
import { makeLine, makeToken } from '../testing/make-token';
import { MetadataFilter } from './metadata-filter';

const page = (tokens: Token[]) => ({
  pageNo: 1,
  width: 600,
  height: 800,
  tokens,
});

describe('MetadataFilter', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
  });

  const createFilter = (
    overrides: { marginFiltering?: boolean } = {},
    repeating: ReadonlySet<Token> = new Set(),
  ) =>
    new MetadataFilter(
      mockLogger,
      createExtractionConfig(overrides),
      repeating,
    );

  test('keeps a section heading and removes a lone corner page number', () => {
    const heading = makeLine('1.2 Overview', 50, 60);
    const body = makeLine('The quick brown fox', 50, 100);
    const pageNumber = makeToken('5', 560, 775);

    const result = createFilter().filter(
      page([...heading, ...body, pageNumber]),
    );

    expect(result.kept).toEqual([...heading, ...body]);
    expect(result.removals).toEqual([
      {
        pageNo: 1,
        text: '5',
        bbox: { x0: 560, y0: 775, x1: 565, y1: 785 },
        reason: 'MARGIN_PAGE_NUMBER',
      },
    ]);
    expect(result.retentions).toEqual({
      SECTION_NUMBER: 2,
      FOOTNOTE_MARKER: 0,
      POLICY_OVERRIDE: 0,
      DEFAULT_ALLOW: 4,
    });
    expect(mockLogger.debug).toHaveBeenCalledWith(
      '[MetadataFilter] Page 1: removed 1 token(s), 0 kept by policy override',
    );
  });

  test('removes short runs matching a page-number pattern', () => {
    const label = makeLine('Page 3', 280, 400);
    const dashed = makeLine('- 12 -', 280, 500);

    const result = createFilter().filter(page([...label, ...dashed]));

    expect(result.kept).toEqual([]);
    expect(result.removals.map((r) => [r.text, r.reason])).toEqual([
      ['Page', 'PAGE_NUMBER_PATTERN'],
      ['3', 'PAGE_NUMBER_PATTERN'],
      ['-', 'PAGE_NUMBER_PATTERN'],
      ['12', 'PAGE_NUMBER_PATTERN'],
      ['-', 'PAGE_NUMBER_PATTERN'],
    ]);
  });

  test('keeps a margin number that has a neighbour', () => {
    const caption = makeToken('Figure', 550, 750);
    const number = makeToken('5', 560, 780);

    const result = createFilter().filter(page([caption, number]));

    expect(result.kept).toEqual([caption, number]);
    expect(result.removals).toEqual([]);
  });

  test('keeps a footnote marker in the margin', () => {
    const marker = makeToken('*1', 40, 780);

    const result = createFilter().filter(page([marker]));

    expect(result.kept).toEqual([marker]);
    expect(result.retentions.FOOTNOTE_MARKER).toBe(1);
  });

  test('removes repeating elements unless the line is a section number', () => {
    const header = makeLine('Annual Report', 50, 20);
    const section = makeLine('2.1 Methods', 50, 60);
    const body = makeLine('Text of the page body', 50, 120);

    const result = createFilter({}, new Set([...header, ...section])).filter(
      page([...header, ...section, ...body]),
    );

    expect(result.kept).toEqual([...section, ...body]);
    expect(result.removals.map((r) => [r.text, r.reason])).toEqual([
      ['Annual', 'REPEATING_ELEMENT'],
      ['Report', 'REPEATING_ELEMENT'],
    ]);
  });

  test('margin filtering off turns margin removals into policy overrides', () => {
    const header = makeLine('Annual Report', 50, 20);
    const pageNumber = makeToken('5', 560, 775);

    const result = createFilter(
      { marginFiltering: false },
      new Set(header),
    ).filter(page([...header, pageNumber]));

    expect(result.kept).toEqual([...header, pageNumber]);
    expect(result.removals).toEqual([]);
    expect(result.retentions.POLICY_OVERRIDE).toBe(3);
  });

  test('margin filtering off still removes page-number patterns', () => {
    const label = makeLine('Page 3', 280, 775);

    const result = createFilter({ marginFiltering: false }).filter(
      page(label),
    );

    expect(result.kept).toEqual([]);
  });

  test('removes a duplicated glyph once', () => {
    const first = makeToken('Hello', 50, 100);
    const second = makeToken('Hello', 50.2, 100.3);
    const other = makeToken('world', 80, 100);

    const result = createFilter().filter(page([first, second, other]));

    expect(result.kept).toEqual([first, other]);
    expect(result.removals.map((r) => r.reason)).toEqual(['DUPLICATE_GLYPH']);
  });

  test('never removes a token matching a section number', () => {
    const first = makeToken('3.4', 50, 100);
    const duplicate = makeToken('3.4', 50, 100);
    const versioned = makeToken('1.0', 560, 780);

    const result = createFilter().filter(
      page([first, duplicate, versioned]),
    );

    expect(result.kept).toEqual([first, duplicate, versioned]);
    expect(result.removals).toEqual([]);
  });

  test('filtering its own output removes nothing more', () => {
    const tokens = [
      ...makeLine('1.2 Overview', 50, 60),
      ...makeLine('Body line here', 50, 100),
      makeToken('5', 560, 775),
    ];
    const filter = createFilter();

    const once = filter.filter(page(tokens));
    const twice = filter.filter(page([...once.kept]));

    expect(twice.kept).toEqual(once.kept);
    expect(twice.removals).toEqual([]);
  });
});
