import type { LoggerMethods } from '@glyphorder/logger';
import type { OcrBackend, PageInput, Token } from '@glyphorder/model';
import type { Mock } from 'vitest';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { createExtractionConfig } from '../config/extraction-config';
import { EmptyDocumentError } from '../errors/extraction-error';
import { makeToken } from '../testing/make-token';
import { PagePreparer } from './page-preparer';

const words = (count: number, text = 'word'): Token[] =>
  Array.from({ length: count }, (_, i) => makeToken(text, 10, 20 * i + 10));

const pageOf = (tokens: Token[], extra: Partial<PageInput> = {}): PageInput => ({
  pageNo: 1,
  width: 600,
  height: 800,
  tokens,
  ...extra,
});

const config = createExtractionConfig({
  collaboratorRetries: 0,
  collaboratorTimeoutMs: 1000,
});

describe('PagePreparer', () => {
  let mockLogger: LoggerMethods;
  let recognize: Mock<OcrBackend['recognize']>;
  let localOcr: OcrBackend;
  let noOcr: OcrBackend;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    recognize = vi.fn<OcrBackend['recognize']>();
    localOcr = { kind: 'local', name: 'mock-ocr', recognize };
    noOcr = { kind: 'none', name: 'none', recognize };
  });

  test('passes a clean page through untouched', async () => {
    const page = pageOf(words(12));

    const prepared = await new PagePreparer(
      mockLogger,
      config,
      localOcr,
    ).preparePage(page);

    expect(prepared.status).toBe('ok');
    expect(prepared.tokens).toBe(page.tokens);
    expect(prepared.issues).toEqual([]);
    expect(recognize).not.toHaveBeenCalled();
  });

  test('normalizes a right-angle rotation', async () => {
    const prepared = await new PagePreparer(mockLogger, config, noOcr).preparePage(
      pageOf(words(12), { rotation: 90 }),
    );

    expect(prepared.width).toBe(800);
    expect(prepared.height).toBe(600);
    expect(prepared.status).toBe('ok');
    expect(prepared.issues).toEqual([
      {
        code: 'ROTATED_PAGE',
        pageNo: 1,
        message: 'Page rotated 90 degrees; coordinates normalized',
      },
    ]);
  });

  test('degrades a page with an unsupported rotation', async () => {
    const page = pageOf(words(12), { rotation: 45 });

    const prepared = await new PagePreparer(mockLogger, config, noOcr).preparePage(
      page,
    );

    expect(prepared.status).toBe('degraded');
    expect(prepared.tokens).toBe(page.tokens);
    expect(prepared.issues.map((issue) => issue.message)).toEqual([
      'Unsupported rotation 45 degrees; coordinates left unchanged',
    ]);
  });

  test('replaces a sparse page with richer OCR output', async () => {
    const page = pageOf(words(3));
    const ocrTokens = words(12, 'ocr');
    recognize.mockResolvedValue(ocrTokens);

    const prepared = await new PagePreparer(
      mockLogger,
      config,
      localOcr,
    ).preparePage(page);

    expect(recognize).toHaveBeenCalledWith(
      expect.objectContaining({ page, reason: 'sparse' }),
    );
    expect(prepared.tokens).toBe(ocrTokens);
    expect(prepared.status).toBe('ok');
    expect(prepared.issues).toEqual([
      {
        code: 'OCR_APPLIED',
        pageNo: 1,
        message: 'Replaced 3 token(s) with 12 from mock-ocr (sparse)',
      },
    ]);
  });

  test('keeps parser output when OCR finds less', async () => {
    const page = pageOf(words(3));
    recognize.mockResolvedValue(words(2, 'ocr'));

    const prepared = await new PagePreparer(
      mockLogger,
      config,
      localOcr,
    ).preparePage(page);

    expect(prepared.tokens).toBe(page.tokens);
    expect(prepared.issues).toEqual([]);
  });

  test('an OCR failure degrades the page', async () => {
    const page = pageOf(words(3));
    recognize.mockRejectedValue(new Error('engine crashed'));

    const prepared = await new PagePreparer(
      mockLogger,
      config,
      localOcr,
    ).preparePage(page);

    expect(prepared.status).toBe('degraded');
    expect(prepared.tokens).toBe(page.tokens);
    expect(prepared.issues).toEqual([
      {
        code: 'COLLABORATOR_FAILURE',
        pageNo: 1,
        message: '[mock-ocr] engine crashed',
      },
    ]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[PagePreparer] Page 1: OCR failed, keeping parser output: [mock-ocr] engine crashed',
    );
  });

  test('emits a placeholder for an encoding anomaly without OCR', async () => {
    const tokens = [...words(6), ...words(4, '\uFFFD\uFFFD')];

    const prepared = await new PagePreparer(mockLogger, config, noOcr).preparePage(
      pageOf(tokens),
    );

    expect(prepared.status).toBe('placeholder');
    expect(prepared.placeholderText).toBe(
      '[unreadable page 1: encoding anomaly]',
    );
    expect(prepared.issues).toEqual([
      {
        code: 'ENCODING_ANOMALY',
        pageNo: 1,
        message: '4 of 10 token(s) carry encoding artifacts',
      },
    ]);
  });

  test('sends an anomalous page to OCR', async () => {
    const tokens = [...words(6), ...words(4, '\uFFFD\uFFFD')];
    const ocrTokens = words(5, 'ocr');
    recognize.mockResolvedValue(ocrTokens);

    const prepared = await new PagePreparer(
      mockLogger,
      config,
      localOcr,
    ).preparePage(pageOf(tokens));

    expect(recognize).toHaveBeenCalledWith(
      expect.objectContaining({ reason: 'encoding' }),
    );
    expect(prepared.status).toBe('ok');
    expect(prepared.tokens).toBe(ocrTokens);
    expect(prepared.issues.map((issue) => issue.code)).toEqual([
      'ENCODING_ANOMALY',
      'OCR_APPLIED',
    ]);
  });

  test('marks an empty page unextractable', async () => {
    const prepared = await new PagePreparer(mockLogger, config, noOcr).prepare({
      documentId: 'doc-1',
      pages: [pageOf(words(12)), pageOf([], { pageNo: 2 })],
    });

    expect(prepared[1].status).toBe('unextractable');
    expect(prepared[1].issues).toEqual([
      { code: 'EMPTY_TOKEN_STREAM', pageNo: 2, message: 'Page 2 has no tokens' },
    ]);
  });

  test('rejects a document without a single token', async () => {
    const preparer = new PagePreparer(mockLogger, config, noOcr);

    await expect(
      preparer.prepare({ documentId: 'doc-1', pages: [pageOf([])] }),
    ).rejects.toThrow(EmptyDocumentError);
    expect(mockLogger.error).toHaveBeenCalledWith(
      '[PagePreparer] Document doc-1 has no tokens on any page',
    );
  });

  test('propagates cancellation during OCR', async () => {
    const abort = new AbortController();
    abort.abort();

    await expect(
      new PagePreparer(mockLogger, config, localOcr).preparePage(
        pageOf(words(3)),
        abort.signal,
      ),
    ).rejects.toThrow('Operation aborted');
    expect(recognize).not.toHaveBeenCalled();
  });
});
