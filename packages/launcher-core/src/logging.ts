/**
 * Logging contract for the launcher core.
 *
 * The core never writes to a log file itself; hosts pass in a Logger that
 * routes wherever they like (the desktop app tees to console and a daily file).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /**
   * Create a logger whose messages carry an extra prefix segment
   * (`launcher` + `sidecar` → `[launcher:sidecar]`).
   */
  child(childPrefix: string): Logger;
}

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface ConsoleLoggerOptions {
  prefix?: string;
  /** Minimum level to output (default: 'debug') */
  minLevel?: LogLevel;
  includeTimestamp?: boolean;
}

/** Receives every entry that passes the level filter, with the logger's prefix. */
export type LogEntryWriter = (entry: LogEntry, prefix: string) => void;

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Build a Logger around an entry writer. Level filtering and child prefixes
 * (`launcher` + `sidecar` -> `launcher:sidecar`) live here; where entries go
 * is up to the writer.
 */
export function createLogger(
  options: { prefix?: string; minLevel?: LogLevel },
  writeEntry: LogEntryWriter
): Logger {
  const { prefix = '', minLevel = 'debug' } = options;

  const log = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (!shouldLog(level, minLevel)) {
      return;
    }
    writeEntry({ level, message, timestamp: new Date(), context }, prefix);
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: (childPrefix) =>
      createLogger({ minLevel, prefix: prefix ? `${prefix}:${childPrefix}` : childPrefix }, writeEntry),
  };
}

export function formatLogLine(entry: LogEntry, prefix: string, includeTimestamp = true): string {
  const parts: string[] = [];
  if (includeTimestamp) {
    parts.push(entry.timestamp.toISOString());
  }
  parts.push(`[${entry.level.toUpperCase()}]`);
  if (prefix) {
    parts.push(`[${prefix}]`);
  }
  parts.push(entry.message);
  return parts.join(' ');
}

export function writeConsoleEntry(entry: LogEntry, prefix: string, includeTimestamp = true): void {
  const line = formatLogLine(entry, prefix, includeTimestamp);
  const consoleFn =
    entry.level === 'error' ? console.error : entry.level === 'warn' ? console.warn : console.log;

  if (entry.context && Object.keys(entry.context).length > 0) {
    consoleFn(line, entry.context);
  } else {
    consoleFn(line);
  }
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const includeTimestamp = options.includeTimestamp ?? true;
  return createLogger(options, (entry, prefix) => writeConsoleEntry(entry, prefix, includeTimestamp));
}

export function createNoOpLogger(): Logger {
  return createLogger({}, () => {});
}

export type BufferedLogger = Logger & { getEntries(): LogEntry[]; clear(): void };

/**
 * Logger that keeps entries in memory. Children share the parent's buffer so a
 * test can inspect everything a component and its collaborators logged.
 */
export function createBufferedLogger(
  options: ConsoleLoggerOptions = {},
  entries: LogEntry[] = []
): BufferedLogger {
  const logger = createLogger(options, (entry, prefix) => {
    entries.push({ ...entry, message: prefix ? `[${prefix}] ${entry.message}` : entry.message });
  });

  return {
    ...logger,
    getEntries: () => [...entries],
    clear: () => {
      entries.length = 0;
    },
  };
}
