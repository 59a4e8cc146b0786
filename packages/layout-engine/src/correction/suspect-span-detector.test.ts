import { describe, expect, test } from 'vitest';

import { makeToken } from '../testing/make-token';
import { SuspectSpanDetector } from './suspect-span-detector';

describe('SuspectSpanDetector', () => {
  const detector = new SuspectSpanDetector({ llmContextChars: 5 });

  test('finds each OCR confusion with its context', () => {
    const text = 'The w0rd and 3l4 with Il1 and OO0 here';

    const spans = detector.detect({ pageNo: 2, text }, []);

    expect(
      spans.map(({ issueType, text: span, start, end }) => ({
        issueType,
        span,
        start,
        end,
      })),
    ).toEqual([
      { issueType: 'digit_in_word', span: 'w0rd', start: 4, end: 8 },
      { issueType: 'letter_in_number', span: '3l4', start: 13, end: 16 },
      { issueType: 'ambiguous_il1', span: 'Il1', start: 22, end: 25 },
      { issueType: 'ambiguous_o0', span: 'OO0', start: 30, end: 33 },
    ]);
    expect(spans[0]).toMatchObject({
      pageNo: 2,
      contextBefore: 'The ',
      contextAfter: ' and ',
    });
  });

  test('ignores unmixed runs', () => {
    expect(detector.detect({ pageNo: 1, text: 'Ill 11 OO 00' }, [])).toEqual(
      [],
    );
  });

  test('flags OCR tokens below the confidence floor', () => {
    const tokens = [
      makeToken('recieve', 0, 0, { confidence: 0.4 }),
      makeToken('fine', 40, 0, { confidence: 0.9 }),
      makeToken('plain', 70, 0),
    ];

    const spans = detector.detect(
      { pageNo: 1, text: 'We recieve fine plain' },
      tokens,
    );

    expect(spans).toHaveLength(1);
    expect(spans[0]).toMatchObject({
      issueType: 'low_ocr_confidence',
      text: 'recieve',
      start: 3,
      end: 10,
    });
  });

  test('keeps one span where matches overlap', () => {
    const spans = detector.detect({ pageNo: 1, text: 'a w0rd' }, [
      makeToken('w0rd', 0, 0, { confidence: 0.3 }),
    ]);

    expect(spans.map((span) => span.issueType)).toEqual(['digit_in_word']);
  });

  test('caps the spans per page', () => {
    const text = Array.from({ length: 25 }, () => 'a1b').join(' ');

    expect(detector.detect({ pageNo: 1, text }, [])).toHaveLength(20);
  });
});
