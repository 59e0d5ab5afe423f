import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';

export interface DataDirContext {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homedir?: string;
}

/**
 * Directory the desktop app is installed in (the folder holding `binaries/`).
 * Source lives at `<root>/src/main`, so the root is two levels up.
 */
export function getAppRoot(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, '../..');
}

export function getDefaultBinariesDir(appRoot: string = getAppRoot()): string {
  return path.join(appRoot, 'binaries');
}

export function toDirectorySlug(title: string): string {
  const slug = title
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'launcher';
}

/**
 * Per-user data directory, following each platform's convention for
 * application data.
 */
export function getDefaultDataDir(title: string, context: DataDirContext = {}): string {
  const platform = context.platform ?? process.platform;
  const env = context.env ?? process.env;
  const home = context.homedir ?? os.homedir();

  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support', title);
  }

  if (platform === 'win32') {
    const base = env.APPDATA || env.LOCALAPPDATA || path.join(home, 'AppData', 'Roaming');
    return path.join(base, title);
  }

  const base = env.XDG_DATA_HOME || path.join(home, '.local', 'share');
  return path.join(base, toDirectorySlug(title));
}

export function getLogDir(dataDir: string): string {
  return path.join(dataDir, 'logs');
}
