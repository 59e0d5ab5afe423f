import type { BackendConnection, HealthProbe, ProbeResult, TransportErrorPolicy } from './types.js';
import { getProbeUrl } from './connection.js';
import { getErrorMessage } from './errors.js';

export interface HttpHealthProbeOptions {
  path: string;
  transportErrors?: TransportErrorPolicy;
  /** Abort the request after this many ms. Unset leaves the transport default in charge. */
  timeoutMs?: number;
}

/**
 * Classify an HTTP status code. Anything in the 2xx range means the backend
 * is serving; any other answer means it is alive but still initializing.
 */
export function classifyStatus(statusCode: number, reason?: string): ProbeResult {
  if (statusCode >= 200 && statusCode < 300) {
    return { kind: 'ready', statusCode };
  }
  return reason ? { kind: 'not_ready', statusCode, reason } : { kind: 'not_ready', statusCode };
}

export function classifyTransportError(error: unknown, policy: TransportErrorPolicy): ProbeResult {
  if (policy === 'not_ready') {
    return { kind: 'not_ready' };
  }
  return { kind: 'transport_error', detail: describeTransportError(error) };
}

function describeTransportError(error: unknown): string {
  // fetch wraps socket errors: "fetch failed" with the real reason on `cause`
  if (error instanceof Error && error.cause instanceof Error) {
    const { cause } = error;
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
    return code && !cause.message.includes(code) ? `${code}: ${cause.message}` : cause.message;
  }
  return getErrorMessage(error);
}

/**
 * Pull a `reason` string out of a health response body such as
 * `{"status":"unavailable","reason":"migrations_pending"}`.
 */
export function parseHealthReason(body: string): string | undefined {
  if (!body) return undefined;
  try {
    const data: unknown = JSON.parse(body);
    if (typeof data === 'object' && data !== null && 'reason' in data) {
      const reason = data.reason;
      return typeof reason === 'string' && reason.length > 0 ? reason : undefined;
    }
  } catch {
    // Not JSON - plain-text and HTML bodies carry no reason
  }
  return undefined;
}

export class HttpHealthProbe implements HealthProbe {
  readonly url: string;
  private readonly transportErrors: TransportErrorPolicy;
  private readonly timeoutMs: number | undefined;

  constructor(connection: BackendConnection, options: HttpHealthProbeOptions) {
    this.url = getProbeUrl(connection, options.path);
    this.transportErrors = options.transportErrors ?? 'report';
    this.timeoutMs = options.timeoutMs;
  }

  async check(): Promise<ProbeResult> {
    const controller = new AbortController();
    const timeout =
      this.timeoutMs !== undefined ? setTimeout(() => controller.abort(), this.timeoutMs) : null;

    try {
      const response = await fetch(this.url, { method: 'GET', signal: controller.signal });
      if (response.ok) {
        await response.body?.cancel();
        return classifyStatus(response.status);
      }
      const body = await response.text().catch(() => '');
      return classifyStatus(response.status, parseHealthReason(body));
    } catch (error) {
      return classifyTransportError(error, this.transportErrors);
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }
}
