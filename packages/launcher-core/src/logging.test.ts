import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  createBufferedLogger,
  createConsoleLogger,
  createLogger,
  createNoOpLogger,
  formatLogLine,
  shouldLog,
  type LogEntry,
} from './logging.js';

describe('shouldLog', () => {
  it('compares level priorities', () => {
    expect(shouldLog('error', 'warn')).toBe(true);
    expect(shouldLog('warn', 'warn')).toBe(true);
    expect(shouldLog('info', 'warn')).toBe(false);
    expect(shouldLog('debug', 'info')).toBe(false);
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('routes levels to the matching console method', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger({ prefix: 'launcher', includeTimestamp: false });

    logger.info('hello');
    logger.warn('careful', { attempt: 2 });
    logger.error('broken');

    expect(log).toHaveBeenCalledWith('[INFO] [launcher] hello');
    expect(warn).toHaveBeenCalledWith('[WARN] [launcher] careful', { attempt: 2 });
    expect(error).toHaveBeenCalledWith('[ERROR] [launcher] broken');
  });

  it('drops messages below the minimum level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createConsoleLogger({ minLevel: 'info', includeTimestamp: false });

    logger.debug('noise');
    logger.info('signal');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[INFO] signal');
  });

  it('nests child prefixes', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createConsoleLogger({ prefix: 'launcher', includeTimestamp: false });

    logger.child('sidecar').child('stdout').info('line');

    expect(log).toHaveBeenCalledWith('[INFO] [launcher:sidecar:stdout] line');
  });
});

describe('createLogger', () => {
  it('hands filtered entries and the nested prefix to the writer', () => {
    const written: Array<[string, string, string]> = [];
    const logger = createLogger({ prefix: 'launcher', minLevel: 'info' }, (entry, prefix) => {
      written.push([entry.level, prefix, entry.message]);
    });

    logger.debug('hidden');
    logger.child('readiness').info('attempt');
    logger.error('down');

    expect(written).toEqual([
      ['info', 'launcher:readiness', 'attempt'],
      ['error', 'launcher', 'down'],
    ]);
  });

  it('starts a child prefix without a separator when the parent has none', () => {
    const prefixes: string[] = [];
    createLogger({}, (_entry, prefix) => prefixes.push(prefix)).child('sidecar').warn('late');
    expect(prefixes).toEqual(['sidecar']);
  });
});

describe('formatLogLine', () => {
  const entry: LogEntry = {
    level: 'warn',
    message: 'retrying',
    timestamp: new Date('2026-03-14T09:30:00.000Z'),
  };

  it('leads with the ISO timestamp', () => {
    expect(formatLogLine(entry, 'launcher')).toBe('2026-03-14T09:30:00.000Z [WARN] [launcher] retrying');
  });

  it('omits an empty prefix', () => {
    expect(formatLogLine(entry, '', false)).toBe('[WARN] retrying');
  });
});

describe('createBufferedLogger', () => {
  it('applies the minimum level', () => {
    const logger = createBufferedLogger({ minLevel: 'warn' });
    logger.info('skipped');
    logger.error('kept');
    expect(logger.getEntries().map((entry) => entry.message)).toEqual(['kept']);
  });

  it('shares one buffer between parent and children', () => {
    const logger = createBufferedLogger();
    logger.info('parent');
    logger.child('readiness').warn('child', { attempt: 1 });

    expect(logger.getEntries().map((entry) => [entry.level, entry.message, entry.context])).toEqual([
      ['info', 'parent', undefined],
      ['warn', '[readiness] child', { attempt: 1 }],
    ]);

    logger.clear();
    expect(logger.getEntries()).toEqual([]);
  });
});

describe('createNoOpLogger', () => {
  it('accepts calls without output', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createNoOpLogger();
    logger.info('nothing');
    logger.child('x').error('still nothing');
    expect(log).not.toHaveBeenCalled();
    log.mockRestore();
  });
});
