export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Infinity,
};

/** Receives formatted log lines. */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleSink: LogSink = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger('silent', 'silent');

/**
 * Create a logger that prints `[timestamp] [scope:level] message` lines.
 * debug/info go to the sink's out stream, warn/error to its err stream.
 */
export function createLogger(scope: string, level: LogLevel = 'info', sink: LogSink = consoleSink): Logger {
  const threshold = LEVEL_RANK[level];

  const emit = (entryLevel: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_RANK[entryLevel] < threshold) return;
    const line = `[${new Date().toISOString()}] [${scope}:${entryLevel}] ${message}`;
    if (entryLevel === 'warn' || entryLevel === 'error') {
      sink.err(line);
    } else {
      sink.out(line);
    }
  };

  return {
    debug: message => emit('debug', message),
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
  };
}
