import fs from 'fs';
import path from 'path';
import { redact } from '@sidecar-launcher/core';

const MAX_FILE_SIZE_BYTES = 50 * 1024 * 1024; // 50MB
const RETENTION_DAYS = 7;
const BUFFER_FLUSH_INTERVAL_MS = 5000;
const BUFFER_MAX_ENTRIES = 100;
const FILE_PREFIX = 'launcher-';

export type FileLogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface FileLogEntry {
  timestamp: string;
  level: FileLogLevel;
  source: string;
  message: string;
}

export interface LogFileWriterOptions {
  maxFileSizeBytes?: number;
  retentionDays?: number;
  flushIntervalMs?: number;
  now?: () => Date;
}

function toDateStamp(date: Date): string {
  return date.toISOString().split('T')[0];
}

function formatEntry(entry: FileLogEntry): string {
  return `[${entry.timestamp}] [${entry.level}] [${entry.source}] ${entry.message}`;
}

/**
 * Buffered writer for the daily `launcher-YYYY-MM-DD.log` file. Messages are
 * redacted before they are buffered.
 */
export class LogFileWriter {
  private currentDate: string = '';
  private currentFilePath: string = '';
  private buffer: FileLogEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private fileSizeExceeded: boolean = false;
  private readonly maxFileSizeBytes: number;
  private readonly retentionDays: number;
  private readonly flushIntervalMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly logDir: string,
    options: LogFileWriterOptions = {}
  ) {
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? MAX_FILE_SIZE_BYTES;
    this.retentionDays = options.retentionDays ?? RETENTION_DAYS;
    this.flushIntervalMs = options.flushIntervalMs ?? BUFFER_FLUSH_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
  }

  initialize(): void {
    fs.mkdirSync(this.logDir, { recursive: true });

    this.cleanupOldLogs();
    this.updateCurrentFile();
    this.flushTimer = setInterval(() => this.flush(), this.flushIntervalMs);
    // Pending flushes must not keep the process alive
    this.flushTimer.unref();
  }

  write(level: FileLogLevel, source: string, message: string): void {
    // A new day starts a new file and lifts the size cap
    this.updateCurrentFile();
    if (this.fileSizeExceeded) {
      return;
    }

    this.buffer.push({
      timestamp: this.now().toISOString(),
      level,
      source,
      message: redact(message),
    });

    if (this.buffer.length >= BUFFER_MAX_ENTRIES) {
      this.flush();
    }
  }

  flush(): void {
    if (this.buffer.length === 0) return;

    this.updateCurrentFile();
    if (this.buffer.length === 0) return;

    if (this.checkFileSize()) {
      this.fileSizeExceeded = true;
      this.buffer = [];
      console.error('[LogFileWriter] Max file size exceeded, stopping writes');
      return;
    }

    try {
      this.appendEntries(this.currentFilePath);
    } catch (error) {
      console.error('[LogFileWriter] Failed to write logs:', error);
      // Keep entries for the next flush, within bounds
      if (this.buffer.length > BUFFER_MAX_ENTRIES * 10) {
        console.error('[LogFileWriter] Buffer overflow - dropping oldest entries');
        this.buffer = this.buffer.slice(-BUFFER_MAX_ENTRIES);
      }
    }
  }

  getCurrentLogPath(): string {
    this.updateCurrentFile();
    return this.currentFilePath;
  }

  getLogDir(): string {
    return this.logDir;
  }

  shutdown(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    this.flush();
  }

  private appendEntries(filePath: string): void {
    fs.appendFileSync(filePath, this.buffer.map(formatEntry).join('\n') + '\n');
    this.buffer = [];
  }

  private updateCurrentFile(): void {
    const today = toDateStamp(this.now());
    if (today === this.currentDate) {
      return;
    }

    // Entries buffered before midnight belong to the previous day's file
    if (this.currentFilePath && this.buffer.length > 0) {
      try {
        this.appendEntries(this.currentFilePath);
      } catch (error) {
        console.error('[LogFileWriter] Failed to write logs on date change:', error);
      }
    }
    this.currentDate = today;
    this.currentFilePath = path.join(this.logDir, `${FILE_PREFIX}${today}.log`);
    this.fileSizeExceeded = false;
  }

  private checkFileSize(): boolean {
    try {
      return fs.statSync(this.currentFilePath).size >= this.maxFileSizeBytes;
    } catch {
      return false;
    }
  }

  private cleanupOldLogs(): void {
    try {
      // Copy: the clock may hand out a shared instance
      const cutoff = new Date(this.now().getTime());
      cutoff.setDate(cutoff.getDate() - this.retentionDays);
      const pattern = new RegExp(`^${FILE_PREFIX}(\\d{4}-\\d{2}-\\d{2})\\.log$`);

      for (const file of fs.readdirSync(this.logDir)) {
        const dateMatch = file.match(pattern);
        if (!dateMatch) continue;

        if (new Date(dateMatch[1]) < cutoff) {
          fs.unlinkSync(path.join(this.logDir, file));
          console.log(`[LogFileWriter] Deleted old log file: ${file}`);
        }
      }
    } catch (error) {
      console.error('[LogFileWriter] Failed to cleanup old logs:', error);
    }
  }
}

let instance: LogFileWriter | null = null;

export function getLogFileWriter(): LogFileWriter | null {
  return instance;
}

export function initializeLogFileWriter(logDir: string, options?: LogFileWriterOptions): LogFileWriter {
  if (!instance) {
    instance = new LogFileWriter(logDir, options);
    instance.initialize();
  }
  return instance;
}

export function shutdownLogFileWriter(): void {
  if (instance) {
    instance.shutdown();
    instance = null;
  }
}
