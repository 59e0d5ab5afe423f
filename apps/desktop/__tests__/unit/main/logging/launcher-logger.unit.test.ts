import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLauncherLogger, type LogSink } from '../../../../src/main/logging/launcher-logger.js';
import type { FileLogLevel } from '../../../../src/main/logging/log-file-writer.js';

interface WrittenLine {
  level: FileLogLevel;
  source: string;
  message: string;
}

function createRecordingWriter(): { writer: LogSink; lines: WrittenLine[] } {
  const lines: WrittenLine[] = [];
  const writer: LogSink = {
    write: (level, source, message) => {
      lines.push({ level, source, message });
    },
  };
  return { writer, lines };
}

describe('createLauncherLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes each entry to the file with its context', () => {
    const { writer, lines } = createRecordingWriter();
    const logger = createLauncherLogger({ writer, console: false });

    logger.info('Backend ready after 3 attempts');
    logger.warn('Health check error', { attempt: 2, detail: 'ECONNREFUSED' });

    expect(lines).toEqual([
      { level: 'INFO', source: 'launcher', message: 'Backend ready after 3 attempts' },
      {
        level: 'WARN',
        source: 'launcher',
        message: 'Health check error {"attempt":2,"detail":"ECONNREFUSED"}',
      },
    ]);
  });

  it('extends the source for child loggers', () => {
    const { writer, lines } = createRecordingWriter();
    const logger = createLauncherLogger({ writer, console: false });

    logger.child('readiness').error('Backend failed to start after 120 attempts');

    expect(lines).toEqual([
      { level: 'ERROR', source: 'launcher:readiness', message: 'Backend failed to start after 120 attempts' },
    ]);
  });

  it('honours the minimum level', () => {
    const { writer, lines } = createRecordingWriter();
    const logger = createLauncherLogger({ writer, console: false, minLevel: 'info' });

    logger.debug('[stdout] noise');
    logger.info('signal');

    expect(lines.map((line) => line.message)).toEqual(['signal']);
  });

  it('mirrors to the console by default and works without a file', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLauncherLogger({ writer: null });

    logger.info('Launcher starting');

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toMatch(/\[INFO\] \[launcher\] Launcher starting$/);
  });
});
