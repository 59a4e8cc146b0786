import { describe, expect, test } from 'vitest';

import {
  CollaboratorError,
  EmptyDocumentError,
  ExtractionError,
  InvalidConfigError,
  MalformedTokenStreamError,
} from './extraction-error';

describe('ExtractionError', () => {
  test('creates error with message and cause', () => {
    const cause = new Error('original');
    const error = new ExtractionError('wrapped', { cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ExtractionError');
    expect(error.message).toBe('wrapped');
    expect(error.cause).toBe(cause);
  });

  describe('getErrorMessage', () => {
    test('returns message from Error instance', () => {
      expect(ExtractionError.getErrorMessage(new Error('boom'))).toBe('boom');
    });

    test('returns String() for non-Error values', () => {
      expect(ExtractionError.getErrorMessage('text')).toBe('text');
      expect(ExtractionError.getErrorMessage(7)).toBe('7');
      expect(ExtractionError.getErrorMessage(null)).toBe('null');
    });
  });
});

describe('MalformedTokenStreamError', () => {
  test('formats a summary of every issue', () => {
    const error = new MalformedTokenStreamError('Invalid document input', [
      { path: 'pages.0.tokens.1.fontSize', message: 'Expected number' },
      { path: '', message: 'Required' },
    ]);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error.name).toBe('MalformedTokenStreamError');
    expect(error.getSummary()).toBe(
      [
        'Malformed token stream: 2 issue(s)',
        '  pages.0.tokens.1.fontSize: Expected number',
        '  (root): Required',
      ].join('\n'),
    );
  });
});

describe('EmptyDocumentError', () => {
  test('names the document', () => {
    const error = new EmptyDocumentError('report-7');

    expect(error.message).toBe('Document "report-7" contains no tokens');
    expect(error.documentId).toBe('report-7');
  });
});

describe('InvalidConfigError', () => {
  test('joins issues into the message', () => {
    const error = new InvalidConfigError([
      { path: 'columnGap', message: 'Number must be greater than 0' },
    ]);

    expect(error.message).toBe(
      'Invalid extraction config: columnGap: Number must be greater than 0',
    );
  });
});

describe('CollaboratorError', () => {
  test('wrap keeps the collaborator name and cause', () => {
    const cause = new Error('timeout');
    const error = CollaboratorError.wrap('tesseract', cause);

    expect(error.name).toBe('CollaboratorError');
    expect(error.collaborator).toBe('tesseract');
    expect(error.message).toBe('[tesseract] timeout');
    expect(error.cause).toBe(cause);
  });
});
