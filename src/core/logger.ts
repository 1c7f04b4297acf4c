export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_RANK;
}

const configuredLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(configuredLevel) ? configuredLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

type Sink = (line: string) => void;

const sinks: Record<Exclude<LogLevel, 'silent'>, Sink> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

export function formatLogLine(
  scope: string,
  operation: string,
  status: string,
  details: string,
  durationMs?: number,
  now: Date = new Date()
): string {
  const timing = durationMs === undefined ? '' : ` ${durationMs}ms`;
  const suffix = details ? ` ${details}` : '';
  return `[${now.toISOString()}] [${scope}] [${operation}] [${status}]${timing}${suffix}`;
}

export interface Logger {
  debug(operation: string, status: string, details?: string, durationMs?: number): void;
  info(operation: string, status: string, details?: string, durationMs?: number): void;
  warn(operation: string, status: string, details?: string, durationMs?: number): void;
  error(operation: string, status: string, details?: string, durationMs?: number): void;
}

/**
 * Scoped console logger. Lines look like
 * `[2024-05-01T10:00:00.000Z] [TABLE-SELECTOR] [select] [SUCCESS] 412ms Tables:3`.
 */
export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>) =>
    (operation: string, status: string, details = '', durationMs?: number): void => {
      if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
      sinks[level](formatLogLine(scope, operation, status, details, durationMs));
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error')
  };
}
