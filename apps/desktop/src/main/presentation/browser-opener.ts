import { spawn } from 'child_process';

export interface OpenCommand {
  command: string;
  args: string[];
}

export type BrowserOpener = (url: string) => Promise<void>;

export function getOpenCommand(url: string, platform: NodeJS.Platform = process.platform): OpenCommand {
  if (platform === 'darwin') {
    return { command: 'open', args: [url] };
  }
  if (platform === 'win32') {
    // `start` treats the first quoted argument as a window title
    return { command: 'cmd', args: ['/c', 'start', '""', url.replace(/&/g, '^&')] };
  }
  return { command: 'xdg-open', args: [url] };
}

/**
 * Hand a URL to the system browser. Resolves once the opener process has
 * started; the opener is detached and not waited on.
 */
export function openInBrowser(url: string, platform: NodeJS.Platform = process.platform): Promise<void> {
  const { command, args } = getOpenCommand(url, platform);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
      windowsHide: true,
    });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
