import type { LoggerMethods } from '@glyphorder/logger';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { MalformedTokenStreamError } from '../errors/extraction-error';
import { makeLine } from '../testing/make-token';
import { BatchExtractor } from './batch-extractor';

const memo = (documentId: string) => ({
  documentId,
  pages: [
    {
      pageNo: 1,
      width: 600,
      height: 800,
      tokens: makeLine('A short memo body', 50, 400),
    },
  ],
});

describe('BatchExtractor', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
  });

  test('keeps input order and isolates failures', async () => {
    const results = await new BatchExtractor({
      logger: mockLogger,
      concurrency: 2,
    }).extractAll([
      memo('first'),
      { documentId: 'broken', pages: 'none' },
      memo('third'),
    ]);

    expect(
      results.map(({ documentId, status }) => ({ documentId, status })),
    ).toEqual([
      { documentId: 'first', status: 'fulfilled' },
      { documentId: 'broken', status: 'rejected' },
      { documentId: 'third', status: 'fulfilled' },
    ]);

    const [first, broken] = results;
    if (first.status !== 'fulfilled' || broken.status !== 'rejected') {
      throw new Error('unexpected outcome');
    }
    expect(first.result.pages[0].text).toBe('A short memo body');
    expect(broken.error).toBeInstanceOf(MalformedTokenStreamError);
    expect(mockLogger.info).toHaveBeenLastCalledWith(
      '[BatchExtractor] Finished: 2 succeeded, 1 failed',
    );
  });

  test('labels inputs without an id by position', async () => {
    const results = await new BatchExtractor({ logger: mockLogger }).extractAll([
      null,
    ]);

    expect(results[0].documentId).toBe('#1');
    expect(results[0].status).toBe('rejected');
  });

  test('reports skipped documents when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const results = await new BatchExtractor({ logger: mockLogger }).extractAll(
      [memo('first')],
      { abortSignal: controller.signal },
    );

    expect(results).toHaveLength(1);
    expect(results[0].status).toBe('rejected');
  });
});
