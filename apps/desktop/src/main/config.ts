import { z } from 'zod';
import { DEFAULT_BACKEND_PORT, DEFAULT_FAILURE_HOLD_MS, type ProfileName } from '@sidecar-launcher/core';
import { getAppRoot, getDefaultBinariesDir, getDefaultDataDir, type DataDirContext } from './paths.js';

export const DEFAULT_APP_TITLE = 'Sidecar Launcher';
export const DEFAULT_SIDECAR_NAME = 'app_backend';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const desktopConfigSchema = z.object({
  backendPort: z.coerce
    .number()
    .int('LAUNCHER_BACKEND_PORT must be an integer')
    .min(1, 'LAUNCHER_BACKEND_PORT must be between 1 and 65535')
    .max(65535, 'LAUNCHER_BACKEND_PORT must be between 1 and 65535')
    .default(DEFAULT_BACKEND_PORT),
  profile: z.enum(['splash', 'minimal']).default('splash'),
  sidecarName: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'LAUNCHER_SIDECAR_NAME must be a bare file name')
    .default(DEFAULT_SIDECAR_NAME),
  binariesDir: z.string().min(1).optional(),
  appTitle: z.string().min(1).default(DEFAULT_APP_TITLE),
  dataDir: z.string().min(1).optional(),
  failureHoldMs: z.coerce.number().int().nonnegative().default(DEFAULT_FAILURE_HOLD_MS),
  probeTimeoutMs: z.coerce.number().int().positive().optional(),
  openBrowser: booleanFlag.default('true'),
});

export interface DesktopConfig {
  backendPort: number;
  profile: ProfileName;
  sidecarName: string;
  binariesDir: string;
  appTitle: string;
  dataDir: string;
  failureHoldMs: number;
  probeTimeoutMs: number | undefined;
  openBrowser: boolean;
}

export class ConfigurationError extends Error {
  name = 'ConfigurationError' as const;

  constructor(public readonly issues: string[]) {
    super(`Invalid launcher configuration: ${issues.join('; ')}`);
  }
}

export interface LoadConfigOptions extends DataDirContext {
  appRoot?: string;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Build the launcher configuration from an environment map. Empty variables
 * count as unset.
 */
export function loadDesktopConfig(env: NodeJS.ProcessEnv, options: LoadConfigOptions = {}): DesktopConfig {
  const parsed = desktopConfigSchema.safeParse({
    backendPort: blankToUndefined(env.LAUNCHER_BACKEND_PORT),
    profile: blankToUndefined(env.LAUNCHER_PROFILE),
    sidecarName: blankToUndefined(env.LAUNCHER_SIDECAR_NAME),
    binariesDir: blankToUndefined(env.LAUNCHER_BINARIES_DIR),
    appTitle: blankToUndefined(env.LAUNCHER_APP_TITLE),
    dataDir: blankToUndefined(env.LAUNCHER_DATA_DIR),
    failureHoldMs: blankToUndefined(env.LAUNCHER_FAILURE_HOLD_MS),
    probeTimeoutMs: blankToUndefined(env.LAUNCHER_PROBE_TIMEOUT_MS),
    openBrowser: blankToUndefined(env.LAUNCHER_OPEN_BROWSER)?.toLowerCase(),
  });

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue: z.ZodIssue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  const data = parsed.data;
  return {
    backendPort: data.backendPort,
    profile: data.profile,
    sidecarName: data.sidecarName,
    binariesDir: data.binariesDir ?? getDefaultBinariesDir(options.appRoot ?? getAppRoot()),
    appTitle: data.appTitle,
    dataDir: data.dataDir ?? getDefaultDataDir(data.appTitle, { ...options, env: options.env ?? env }),
    failureHoldMs: data.failureHoldMs,
    probeTimeoutMs: data.probeTimeoutMs,
    openBrowser: data.openBrowser,
  };
}

let cachedConfig: DesktopConfig | null = null;

export function getDesktopConfig(): DesktopConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = loadDesktopConfig(process.env);
  return cachedConfig;
}

export function resetDesktopConfig(): void {
  cachedConfig = null;
}
