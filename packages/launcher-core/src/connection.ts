import type { BackendConnection } from './types.js';

export const DEFAULT_BACKEND_HOST = 'localhost';
export const DEFAULT_BACKEND_PORT = 4000;

export function createBackendConnection(
  port: number = DEFAULT_BACKEND_PORT,
  host: string = DEFAULT_BACKEND_HOST,
): BackendConnection {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RangeError(`Invalid backend port: ${port}`);
  }
  return Object.freeze({ scheme: 'http', host, port });
}

export function getBaseUrl(connection: BackendConnection): string {
  return `${connection.scheme}://${connection.host}:${connection.port}`;
}

export function getProbeUrl(connection: BackendConnection, path: string): string {
  const normalized = path.startsWith('/') ? path : `/${path}`;
  return `${getBaseUrl(connection)}${normalized}`;
}

/**
 * Environment handed to the backend process. PORT selects the listening port;
 * MIX_ENV and BURRITO put the packaged backend in production, server-enabled mode.
 */
export function buildBackendEnvironment(connection: BackendConnection): Record<string, string> {
  return {
    PORT: String(connection.port),
    MIX_ENV: 'prod',
    BURRITO: '1',
  };
}
