import { EventEmitter } from 'events';
import { beforeEach, describe, expect, it, vi } from 'vitest';

const spawnMock = vi.fn();

vi.mock('child_process', () => ({
  spawn: (...args: unknown[]) => spawnMock(...args),
}));

import { getOpenCommand, openInBrowser } from '../../../../src/main/presentation/browser-opener.js';

class MockChildProcess extends EventEmitter {
  unref = vi.fn();
}

describe('getOpenCommand', () => {
  it('uses open on macOS', () => {
    expect(getOpenCommand('http://localhost:4000', 'darwin')).toEqual({
      command: 'open',
      args: ['http://localhost:4000'],
    });
  });

  it('uses start through cmd on Windows', () => {
    expect(getOpenCommand('http://localhost:4000/?a=1&b=2', 'win32')).toEqual({
      command: 'cmd',
      args: ['/c', 'start', '""', 'http://localhost:4000/?a=1^&b=2'],
    });
  });

  it('uses xdg-open elsewhere', () => {
    expect(getOpenCommand('http://localhost:4000', 'linux')).toEqual({
      command: 'xdg-open',
      args: ['http://localhost:4000'],
    });
  });
});

describe('openInBrowser', () => {
  let child: MockChildProcess;

  beforeEach(() => {
    spawnMock.mockReset();
    child = new MockChildProcess();
    spawnMock.mockImplementation(() => child);
  });

  it('resolves once the opener has started and detaches it', async () => {
    const pending = openInBrowser('http://localhost:4000', 'linux');
    child.emit('spawn');
    await pending;

    expect(spawnMock).toHaveBeenCalledWith('xdg-open', ['http://localhost:4000'], {
      detached: true,
      stdio: 'ignore',
      windowsHide: true,
    });
    expect(child.unref).toHaveBeenCalledTimes(1);
  });

  it('rejects when the opener is missing', async () => {
    const pending = openInBrowser('http://localhost:4000', 'linux');
    child.emit('error', new Error('spawn xdg-open ENOENT'));

    await expect(pending).rejects.toThrow('spawn xdg-open ENOENT');
  });
});
