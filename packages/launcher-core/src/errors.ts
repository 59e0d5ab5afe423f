/**
 * Fatal errors raised before the readiness wait begins. None of them is
 * retried; the launcher reports the error and aborts startup.
 */
export class LaunchStartupError extends Error {
  name: string = 'LaunchStartupError';

  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
  }
}

/**
 * Thrown when the loading view cannot be created.
 */
export class ViewCreationError extends LaunchStartupError {
  name = 'ViewCreationError' as const;

  constructor(
    public readonly viewId: string,
    cause: unknown
  ) {
    super(`Failed to create view "${viewId}": ${getErrorMessage(cause)}`, cause);
  }
}

/**
 * Thrown when no spawnable executable exists for a sidecar name.
 */
export class SidecarNotFoundError extends LaunchStartupError {
  name = 'SidecarNotFoundError' as const;

  constructor(
    public readonly sidecar: string,
    public readonly searchedPaths: string[],
    detail?: string
  ) {
    super(
      detail
        ? `Sidecar "${sidecar}" is unavailable: ${detail}`
        : `Sidecar "${sidecar}" not found. Looked in: ${searchedPaths.join(', ')}`
    );
  }
}

/**
 * Thrown when the operating system refuses to start the sidecar process.
 */
export class SpawnFailedError extends LaunchStartupError {
  name = 'SpawnFailedError' as const;

  constructor(
    public readonly program: string,
    cause: unknown
  ) {
    super(`Failed to spawn backend sidecar ${program}: ${getErrorMessage(cause)}`, cause);
  }
}

/**
 * Thrown by a presentation host when asked to update a view it no longer shows.
 */
export class ViewClosedError extends Error {
  name = 'ViewClosedError' as const;

  constructor(public readonly viewId: string) {
    super(`View "${viewId}" is not open`);
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) || String(error);
  } catch {
    // Circular structures and bigints
    return String(error);
  }
}
