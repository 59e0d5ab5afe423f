import fs from 'fs';
import path from 'path';
import { SidecarNotFoundError } from './errors.js';

const TARGET_TRIPLES: Record<string, Record<string, string>> = {
  darwin: { arm64: 'aarch64-apple-darwin', x64: 'x86_64-apple-darwin' },
  linux: { x64: 'x86_64-unknown-linux-gnu', arm64: 'aarch64-unknown-linux-gnu' },
  win32: { x64: 'x86_64-pc-windows-msvc' },
};

/**
 * Compiler target triple the sidecar binary is suffixed with when it is
 * bundled (`app_backend-x86_64-unknown-linux-gnu`). Null on unsupported hosts.
 */
export function getTargetTriple(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): string | null {
  return TARGET_TRIPLES[platform]?.[arch] ?? null;
}

export interface SidecarLookup {
  binariesDir: string;
  platform?: NodeJS.Platform;
  arch?: string;
  exists?: (candidate: string) => boolean;
}

function isExecutableFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

export function getSidecarCandidates(name: string, lookup: SidecarLookup): string[] {
  const platform = lookup.platform ?? process.platform;
  const triple = getTargetTriple(platform, lookup.arch ?? process.arch);
  const extension = platform === 'win32' ? '.exe' : '';
  const candidates: string[] = [];

  if (triple) {
    candidates.push(path.join(lookup.binariesDir, `${name}-${triple}${extension}`));
  }
  candidates.push(path.join(lookup.binariesDir, `${name}${extension}`));
  return candidates;
}

/**
 * Find the executable for a sidecar. Throws SidecarNotFoundError when the
 * host has no target triple and no unsuffixed binary, or nothing is on disk.
 */
export function resolveSidecarPath(name: string, lookup: SidecarLookup): string {
  if (!name || name.includes('/') || name.includes('\\')) {
    throw new SidecarNotFoundError(name, [], 'sidecar names must be bare file names');
  }

  const exists = lookup.exists ?? isExecutableFile;
  const candidates = getSidecarCandidates(name, lookup);

  for (const candidate of candidates) {
    if (exists(candidate)) {
      return candidate;
    }
  }

  throw new SidecarNotFoundError(name, candidates);
}
