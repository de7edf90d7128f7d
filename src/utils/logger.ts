export type LogMethod = "log" | "warn" | "error";

/**
 * Where log lines end up. Defaults to the console.
 */
export type LogSink = Record<LogMethod, (...args: unknown[]) => void>;

export interface Logger {
  readonly verbose: boolean;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = {
  log: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const sink = options.sink ?? consoleSink;

  function logWith(method: LogMethod, args: unknown[]): void {
    sink[method](...args);
  }

  return {
    verbose,
    debug(...args: unknown[]): void {
      if (!verbose) {
        return;
      }
      logWith("log", args);
    },
    info(...args: unknown[]): void {
      logWith("log", args);
    },
    warn(...args: unknown[]): void {
      logWith("warn", args);
    },
    error(...args: unknown[]): void {
      logWith("error", args);
    },
  };
}

/**
 * Logger that drops everything, for library callers that want no output
 */
export const silentLogger: Logger = createLogger({
  sink: {
    log: () => {},
    warn: () => {},
    error: () => {},
  },
});
