import type { ReadinessProfile, StatusBand } from './types.js';

export const DEFAULT_STATUS_BANDS: readonly StatusBand[] = Object.freeze([
  { below: 10, text: 'Starting server...' },
  { below: 30, text: 'Running database migrations...' },
  { text: 'Almost ready...' },
]);

export const FAILURE_STATUS_TEXT = 'Failed to start. Please restart the app.';

// 2 minutes worst case, probing the readiness endpoint
export const SPLASH_PROFILE: ReadinessProfile = Object.freeze({
  maxRetries: 120,
  retryDelayMs: 500,
  healthPath: '/api/health',
  transportErrors: 'report',
  statusBands: DEFAULT_STATUS_BANDS,
});

export const MINIMAL_PROFILE: ReadinessProfile = Object.freeze({
  maxRetries: 60,
  retryDelayMs: 1000,
  healthPath: '/',
  transportErrors: 'not_ready',
  statusBands: DEFAULT_STATUS_BANDS,
});

export const PROFILES = {
  splash: SPLASH_PROFILE,
  minimal: MINIMAL_PROFILE,
} as const;

export type ProfileName = keyof typeof PROFILES;

export function getProfile(name: ProfileName): ReadinessProfile {
  return PROFILES[name];
}

export function getWorstCaseWaitMs(profile: ReadinessProfile): number {
  return profile.maxRetries * profile.retryDelayMs;
}
