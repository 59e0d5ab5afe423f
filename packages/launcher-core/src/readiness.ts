import type {
  HealthProbe,
  LaunchOutcome,
  ProbeResult,
  ReadinessMessage,
  ReadinessProfile,
  ReadinessState,
  ReadinessSubscriber,
  Sleep,
} from './types.js';
import { getStatusMessage, validateStatusBands } from './status.js';
import { getErrorMessage } from './errors.js';
import { createNoOpLogger, type Logger } from './logging.js';

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface ReadinessControllerOptions {
  probe: HealthProbe;
  profile: ReadinessProfile;
  logger?: Logger;
  sleep?: Sleep;
}

/**
 * Polls a HealthProbe at a fixed interval until the backend reports ready or
 * the retry budget runs out. Progress is published as messages; subscribers
 * (the orchestrator, in practice) decide what to do with them.
 */
export class ReadinessController {
  private state: ReadinessState = { status: 'probing', attempt: 1 };
  private subscribers = new Set<ReadinessSubscriber>();
  private runPromise: Promise<LaunchOutcome> | null = null;
  private readonly probe: HealthProbe;
  private readonly profile: ReadinessProfile;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(options: ReadinessControllerOptions) {
    if (!Number.isInteger(options.profile.maxRetries) || options.profile.maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer, got ${options.profile.maxRetries}`);
    }
    if (options.profile.retryDelayMs < 0) {
      throw new RangeError(`retryDelayMs must not be negative, got ${options.profile.retryDelayMs}`);
    }
    validateStatusBands(options.profile.statusBands);

    this.probe = options.probe;
    this.profile = options.profile;
    this.logger = options.logger ?? createNoOpLogger();
    this.sleep = options.sleep ?? defaultSleep;
  }

  getState(): ReadinessState {
    return this.state;
  }

  subscribe(callback: ReadinessSubscriber): () => void {
    this.subscribers.add(callback);
    return () => this.subscribers.delete(callback);
  }

  /**
   * Start the wait. The controller runs once; later calls return the same
   * promise. Resolves with the outcome and never rejects on probe failures.
   */
  run(): Promise<LaunchOutcome> {
    if (!this.runPromise) {
      this.runPromise = this.doRun();
    }
    return this.runPromise;
  }

  private publish(message: ReadinessMessage): void {
    for (const subscriber of this.subscribers) {
      try {
        subscriber(message);
      } catch (err) {
        this.logger.warn('Readiness subscriber threw', { error: getErrorMessage(err) });
      }
    }
  }

  private async doRun(): Promise<LaunchOutcome> {
    const { maxRetries, retryDelayMs, statusBands } = this.profile;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      this.state = { status: 'probing', attempt };

      const result = await this.runProbe();
      this.publish({ type: 'probe', attempt, result });

      if (result.kind === 'ready') {
        this.logger.info(`Backend ready after ${attempt} attempts`);
        return this.finish({ kind: 'backend_ready', attempts: attempt });
      }

      if (result.kind === 'transport_error') {
        this.logger.warn('Health check error', { attempt, detail: result.detail });
      } else if (result.reason) {
        this.logger.debug('Backend not ready', { attempt, status: result.statusCode, reason: result.reason });
      }

      this.publish({ type: 'status', attempt, maxRetries, text: getStatusMessage(attempt, statusBands) });

      this.logger.info(`Waiting for backend... attempt ${attempt}/${maxRetries}`);
      await this.sleep(retryDelayMs);
    }

    this.logger.error(`Backend failed to start after ${maxRetries} attempts`);
    return this.finish({ kind: 'backend_failed', attempts: maxRetries });
  }

  private async runProbe(): Promise<ProbeResult> {
    try {
      return await this.probe.check();
    } catch (err) {
      return { kind: 'transport_error', detail: getErrorMessage(err) };
    }
  }

  private finish(outcome: LaunchOutcome): LaunchOutcome {
    this.state =
      outcome.kind === 'backend_ready'
        ? { status: 'ready', attempts: outcome.attempts }
        : { status: 'exhausted', attempts: outcome.attempts };
    this.publish({ type: 'outcome', outcome });
    return outcome;
  }
}
