import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  LogFileWriter,
  getLogFileWriter,
  initializeLogFileWriter,
  shutdownLogFileWriter,
} from '../../../../src/main/logging/log-file-writer.js';

const MARCH_14 = '2026-03-14T10:00:00.000Z';

function readLog(dir: string, date: string): string {
  return fs.readFileSync(path.join(dir, `launcher-${date}.log`), 'utf8');
}

describe('LogFileWriter', () => {
  let tmpRoot: string;
  let logDir: string;
  let writer: LogFileWriter | null;

  beforeEach(() => {
    tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'launcher-logs-'));
    logDir = path.join(tmpRoot, 'logs');
    writer = null;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    writer?.shutdown();
    shutdownLogFileWriter();
    fs.rmSync(tmpRoot, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('creates the log directory and writes formatted lines on flush', () => {
    writer = new LogFileWriter(logDir, { now: () => new Date(MARCH_14) });
    writer.initialize();

    writer.write('INFO', 'launcher', 'Backend ready after 3 attempts');
    writer.write('WARN', 'launcher:readiness', 'Health check error');
    expect(fs.existsSync(path.join(logDir, 'launcher-2026-03-14.log'))).toBe(false);

    writer.flush();

    expect(readLog(logDir, '2026-03-14')).toBe(
      `[${MARCH_14}] [INFO] [launcher] Backend ready after 3 attempts\n` +
        `[${MARCH_14}] [WARN] [launcher:readiness] Health check error\n`
    );
    expect(writer.getCurrentLogPath()).toBe(path.join(logDir, 'launcher-2026-03-14.log'));
  });

  it('redacts secrets before they reach the file', () => {
    writer = new LogFileWriter(logDir, { now: () => new Date(MARCH_14) });
    writer.initialize();

    writer.write('DEBUG', 'launcher:sidecar', '[stdout] SECRET_KEY_BASE=abc123 loaded');
    writer.shutdown();

    expect(readLog(logDir, '2026-03-14')).toBe(
      `[${MARCH_14}] [DEBUG] [launcher:sidecar] [stdout] SECR[REDACTED] loaded\n`
    );
  });

  it('deletes launcher logs past the retention window', () => {
    fs.mkdirSync(logDir, { recursive: true });
    for (const name of ['launcher-2026-03-01.log', 'launcher-2026-03-13.log', 'notes.log']) {
      fs.writeFileSync(path.join(logDir, name), 'old\n');
    }

    writer = new LogFileWriter(logDir, { now: () => new Date(MARCH_14) });
    writer.initialize();

    expect(fs.readdirSync(logDir).sort()).toEqual(['launcher-2026-03-13.log', 'notes.log']);
  });

  it('leaves the clock value untouched while pruning old logs', () => {
    const today = new Date(MARCH_14);
    writer = new LogFileWriter(logDir, { now: () => today });
    writer.initialize();

    writer.write('INFO', 'launcher', 'after cleanup');
    writer.flush();

    expect(today.toISOString()).toBe(MARCH_14);
    expect(readLog(logDir, '2026-03-14')).toBe(`[${MARCH_14}] [INFO] [launcher] after cleanup\n`);
  });

  it('stops writing once the file reaches its size cap', () => {
    writer = new LogFileWriter(logDir, { now: () => new Date(MARCH_14), maxFileSizeBytes: 10 });
    writer.initialize();

    writer.write('INFO', 'launcher', 'first');
    writer.flush();
    writer.write('INFO', 'launcher', 'second');
    writer.flush();
    writer.write('INFO', 'launcher', 'third');
    writer.flush();

    expect(readLog(logDir, '2026-03-14')).toBe(`[${MARCH_14}] [INFO] [launcher] first\n`);
  });

  it('keeps entries buffered before midnight in the previous day file', () => {
    let now = new Date('2026-03-14T23:59:59.000Z');
    writer = new LogFileWriter(logDir, { now: () => now });
    writer.initialize();

    writer.write('INFO', 'launcher', 'late');
    now = new Date('2026-03-15T00:00:01.000Z');
    writer.write('INFO', 'launcher', 'early');
    writer.flush();

    expect(readLog(logDir, '2026-03-14')).toBe('[2026-03-14T23:59:59.000Z] [INFO] [launcher] late\n');
    expect(readLog(logDir, '2026-03-15')).toBe('[2026-03-15T00:00:01.000Z] [INFO] [launcher] early\n');
  });
});

describe('log file writer singleton', () => {
  let tmpRoot: string;

  beforeEach(() => {
    tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'launcher-logs-'));
  });

  afterEach(() => {
    shutdownLogFileWriter();
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  });

  it('initializes once and is cleared by shutdown', () => {
    expect(getLogFileWriter()).toBeNull();

    const first = initializeLogFileWriter(tmpRoot);
    expect(initializeLogFileWriter(path.join(tmpRoot, 'other'))).toBe(first);
    expect(getLogFileWriter()).toBe(first);

    shutdownLogFileWriter();
    expect(getLogFileWriter()).toBeNull();
  });
});
