export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export type LoggerOptions = {
  /** Lowest level written; defaults to 'info'. */
  level?: LogLevel;
  /** Line sink; defaults to stderr so stdout stays reserved for JSON output. */
  write?: (line: string) => void;
  now?: () => Date;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
};

function defaultWrite(line: string): void {
  // eslint-disable-next-line no-console
  console.error(line);
}

/**
 * Plain console logger. Lines look like `2024-01-01T00:00:00.000Z - INFO - message`.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? 'info';
  const write = opts.write ?? defaultWrite;
  const now = opts.now ?? (() => new Date());

  const emit = (at: LogLevel, message: string) => {
    if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;
    write(`${now().toISOString()} - ${LEVEL_LABEL[at]} - ${message}`);
  };

  return {
    level,
    debug: (m) => emit('debug', m),
    info: (m) => emit('info', m),
    warn: (m) => emit('warn', m),
    error: (m) => emit('error', m),
  };
}

/** Logger that drops everything; the library default when callers pass none. */
export const silentLogger: Logger = {
  level: 'error',
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
