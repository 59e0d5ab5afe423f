import {
  createLogger,
  writeConsoleEntry,
  type LogLevel,
  type Logger,
} from '@sidecar-launcher/core';
import type { FileLogLevel } from './log-file-writer.js';

/** The part of LogFileWriter the logger needs. */
export interface LogSink {
  write(level: FileLogLevel, source: string, message: string): void;
}

export interface LauncherLoggerOptions {
  writer: LogSink | null;
  prefix?: string;
  minLevel?: LogLevel;
  /** Mirror entries to the console as well as the file. */
  console?: boolean;
}

const FILE_LEVELS: Record<LogLevel, FileLogLevel> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
};

function formatContext(context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return '';
  }
  try {
    return ` ${JSON.stringify(context)}`;
  } catch {
    return ' [unserializable context]';
  }
}

/**
 * Logger handed to the launcher core: every entry goes to the daily log file,
 * and to the console unless disabled.
 */
export function createLauncherLogger(options: LauncherLoggerOptions): Logger {
  const { writer, prefix = 'launcher', minLevel = 'debug' } = options;
  const mirror = options.console !== false;

  return createLogger({ prefix, minLevel }, (entry, entryPrefix) => {
    writer?.write(FILE_LEVELS[entry.level], entryPrefix, `${entry.message}${formatContext(entry.context)}`);
    if (mirror) {
      writeConsoleEntry(entry, entryPrefix);
    }
  });
}
