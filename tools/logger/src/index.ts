type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }

  /**
   * Logger that discards everything. Used when a caller passes no logger.
   */
  static silent(): Logger {
    return new Logger({ debug: noop, info: noop, warn: noop, error: noop });
  }

  /**
   * Logger that prefixes every message with `[scope]`.
   *
   * Only string first arguments are prefixed; structured arguments pass
   * through untouched.
   */
  static scoped(methods: LoggerMethods, scope: string): Logger {
    const wrap =
      (fn: LogFn): LogFn =>
      (first?: unknown, ...rest: unknown[]) => {
        if (typeof first === 'string') {
          fn(`[${scope}] ${first}`, ...rest);
        } else {
          fn(first, ...rest);
        }
      };
    return new Logger({
      debug: wrap(methods.debug),
      info: wrap(methods.info),
      warn: wrap(methods.warn),
      error: wrap(methods.error),
    });
  }
}

export { Logger };
export type { LoggerMethods, LogFn };
