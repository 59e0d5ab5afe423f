export interface BackendConnection {
  readonly scheme: 'http';
  readonly host: string;
  readonly port: number;
}

export type ProbeResult =
  | { kind: 'ready'; statusCode: number }
  | { kind: 'not_ready'; statusCode?: number; reason?: string }
  | { kind: 'transport_error'; detail: string };

export interface HealthProbe {
  check(): Promise<ProbeResult>;
}

/**
 * How a probe reports a request that never got a response.
 * `report` keeps the failure visible as `transport_error`; `not_ready`
 * folds it into the ordinary not-ready result.
 */
export type TransportErrorPolicy = 'report' | 'not_ready';

/**
 * One row of the status table. Bands are evaluated in order and the first
 * band whose `below` bound exceeds the attempt wins; a band without `below`
 * matches everything.
 */
export interface StatusBand {
  below?: number;
  text: string;
}

export interface ReadinessProfile {
  maxRetries: number;
  retryDelayMs: number;
  healthPath: string;
  transportErrors: TransportErrorPolicy;
  statusBands: readonly StatusBand[];
}

export type LaunchOutcome =
  | { kind: 'backend_ready'; attempts: number }
  | { kind: 'backend_failed'; attempts: number };

export type ReadinessState =
  | { status: 'probing'; attempt: number }
  | { status: 'ready'; attempts: number }
  | { status: 'exhausted'; attempts: number };

export type ReadinessMessage =
  | { type: 'probe'; attempt: number; result: ProbeResult }
  | { type: 'status'; attempt: number; maxRetries: number; text: string }
  | { type: 'outcome'; outcome: LaunchOutcome };

export type ReadinessSubscriber = (message: ReadinessMessage) => void;

export type LaunchState =
  | { status: 'idle' }
  | { status: 'creating_view' }
  | { status: 'spawning'; sidecar: string }
  | { status: 'waiting'; attempt: number; maxRetries: number }
  | { status: 'ready'; url: string; attempts: number }
  | { status: 'failed'; attempts: number }
  | { status: 'aborted'; error: string };

export type StateSubscriber = (state: LaunchState) => void;

export type Sleep = (ms: number) => Promise<void>;
