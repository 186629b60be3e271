export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives fully formatted lines. Defaults to stderr. */
  sink?: (line: string) => void;
}

/**
 * Scoped stderr logger. Lines look like `[registry] warn: message`, so stdout
 * stays clean for command output.
 */
export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[opts.level ?? 'warn'];
  const sink = opts.sink ?? ((line: string) => console.error(line));

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_RANK[level] < threshold) return;
    sink(`[${scope}] ${level}: ${message}`);
  };

  return {
    debug: (m) => emit('debug', m),
    info: (m) => emit('info', m),
    warn: (m) => emit('warn', m),
    error: (m) => emit('error', m),
    child: (sub) => createLogger(`${scope}:${sub}`, opts),
  };
}
