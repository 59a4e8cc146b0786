import { describe, expect, test, vi } from 'vitest';

import { Logger } from './index';

describe('Logger', () => {
  test('delegates every level to the wrapped methods', () => {
    const methods = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = new Logger(methods);

    logger.debug('d', 1);
    logger.info('i');
    logger.warn('w');
    logger.error('e', { code: 2 });

    expect(methods.debug).toHaveBeenCalledWith('d', 1);
    expect(methods.info).toHaveBeenCalledWith('i');
    expect(methods.warn).toHaveBeenCalledWith('w');
    expect(methods.error).toHaveBeenCalledWith('e', { code: 2 });
  });

  test('silent logger accepts calls without output', () => {
    const logger = Logger.silent();

    expect(() => logger.info('ignored')).not.toThrow();
  });

  describe('scoped', () => {
    test('prefixes string messages with the scope', () => {
      const methods = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const logger = Logger.scoped(methods, 'Pipeline');

      logger.info('started', 3);

      expect(methods.info).toHaveBeenCalledWith('[Pipeline] started', 3);
    });

    test('passes non-string first arguments through', () => {
      const methods = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const logger = Logger.scoped(methods, 'Pipeline');
      const payload = { page: 1 };

      logger.warn(payload);

      expect(methods.warn).toHaveBeenCalledWith(payload);
    });
  });
});
