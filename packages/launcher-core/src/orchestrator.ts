import type {
  BackendConnection,
  HealthProbe,
  LaunchOutcome,
  LaunchState,
  ReadinessMessage,
  ReadinessProfile,
  Sleep,
  StateSubscriber,
} from './types.js';
import type { PresentationLayer, StatusTone, ViewHandle } from './presentation.js';
import {
  MAIN_VIEW_ID,
  SPLASH_VIEW_ID,
  getMainViewOptions,
  getSplashViewOptions,
} from './presentation.js';
import type { ProcessSupervisor, SidecarCommand, SidecarHandle } from './supervisor.js';
import { buildBackendEnvironment, getBaseUrl } from './connection.js';
import { HttpHealthProbe } from './health.js';
import { ReadinessController, defaultSleep } from './readiness.js';
import { FAILURE_STATUS_TEXT } from './profiles.js';
import {
  LaunchStartupError,
  SidecarNotFoundError,
  SpawnFailedError,
  ViewCreationError,
  getErrorMessage,
} from './errors.js';
import { createNoOpLogger, type Logger } from './logging.js';

export const DEFAULT_FAILURE_HOLD_MS = 3000;
export const DEFAULT_VIEW_UPDATE_TIMEOUT_MS = 2000;

export interface LaunchOrchestratorOptions {
  connection: BackendConnection;
  profile: ReadinessProfile;
  presentation: PresentationLayer;
  supervisor: ProcessSupervisor;
  sidecarName: string;
  title: string;
  /** Show a splash view with live status while waiting. */
  splash?: boolean;
  /** Overrides the HTTP probe built from `connection` and `profile`. */
  probe?: HealthProbe;
  probeTimeoutMs?: number;
  failureHoldMs?: number;
  /** How long the final swap waits for queued status updates to land. */
  viewUpdateTimeoutMs?: number;
  logger?: Logger;
  sleep?: Sleep;
  exit?: (code: number) => void;
}

export interface LaunchSession {
  backend: SidecarHandle;
  /** Settles once the main view is up or the failure path has run. */
  outcome: Promise<LaunchOutcome>;
}

/**
 * Composes the launch: loading view, sidecar spawn, background readiness wait,
 * and the final swap to the main view (or the failure exit).
 */
export class LaunchOrchestrator {
  private state: LaunchState = { status: 'idle' };
  private subscribers = new Set<StateSubscriber>();
  private splashView: ViewHandle | null = null;
  private viewUpdates: Promise<void> = Promise.resolve();
  private startPromise: Promise<LaunchSession> | null = null;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly exit: (code: number) => void;

  constructor(private readonly options: LaunchOrchestratorOptions) {
    this.logger = options.logger ?? createNoOpLogger();
    this.sleep = options.sleep ?? defaultSleep;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  getState(): LaunchState {
    return this.state;
  }

  subscribe(callback: StateSubscriber): () => void {
    this.subscribers.add(callback);
    return () => this.subscribers.delete(callback);
  }

  private setState(newState: LaunchState): void {
    this.state = newState;
    for (const subscriber of this.subscribers) {
      try {
        subscriber(newState);
      } catch (err) {
        this.logger.warn('State subscriber threw', { error: getErrorMessage(err) });
      }
    }
  }

  /**
   * Run startup up to the point where the readiness wait is running in the
   * background. Rejects with a LaunchStartupError when the view, the sidecar
   * lookup or the spawn fails; no probe is issued in that case.
   */
  start(): Promise<LaunchSession> {
    if (!this.startPromise) {
      this.startPromise = this.doStart();
    }
    return this.startPromise;
  }

  private async doStart(): Promise<LaunchSession> {
    const { connection, profile, sidecarName } = this.options;

    let backend: SidecarHandle;
    try {
      if (this.options.splash) {
        this.setState({ status: 'creating_view' });
        this.splashView = await this.createSplashView();
      }

      this.setState({ status: 'spawning', sidecar: sidecarName });
      backend = await this.spawnBackend();
    } catch (err) {
      const error =
        err instanceof LaunchStartupError ? err : new LaunchStartupError(getErrorMessage(err), err);
      this.logger.error('Startup aborted', { error: error.message, name: error.name });
      this.setState({ status: 'aborted', error: error.message });
      throw error;
    }

    const probe =
      this.options.probe ??
      new HttpHealthProbe(connection, {
        path: profile.healthPath,
        transportErrors: profile.transportErrors,
        timeoutMs: this.options.probeTimeoutMs,
      });
    const controller = new ReadinessController({
      probe,
      profile,
      logger: this.logger.child('readiness'),
      sleep: this.sleep,
    });
    controller.subscribe((message) => this.handleReadinessMessage(message));

    this.setState({ status: 'waiting', attempt: 1, maxRetries: profile.maxRetries });

    // Not awaited: the wait runs in the background while the splash stays live
    const outcome = controller
      .run()
      .then((result) => this.finish(result))
      .catch((err): LaunchOutcome => {
        const state = controller.getState();
        const attempts = state.status === 'probing' ? state.attempt : state.attempts;
        this.logger.error('Launch failed after readiness wait', { error: getErrorMessage(err) });
        this.setState({ status: 'failed', attempts });
        this.exit(1);
        return { kind: 'backend_failed', attempts };
      });

    return { backend, outcome };
  }

  private async createSplashView(): Promise<ViewHandle> {
    const { presentation, title } = this.options;
    try {
      const view = await presentation.createView(
        SPLASH_VIEW_ID,
        { kind: 'splash' },
        getSplashViewOptions(title)
      );
      await presentation.showView(view);
      return view;
    } catch (err) {
      throw new ViewCreationError(SPLASH_VIEW_ID, err);
    }
  }

  private async spawnBackend(): Promise<SidecarHandle> {
    const { supervisor, sidecarName, connection } = this.options;

    let command: SidecarCommand;
    try {
      command = supervisor.sidecar(sidecarName);
    } catch (err) {
      if (err instanceof LaunchStartupError) {
        throw err;
      }
      throw new SidecarNotFoundError(sidecarName, [], getErrorMessage(err));
    }

    this.logger.info('Spawning backend sidecar', { program: command.program, port: connection.port });
    try {
      return await command.spawn({ env: buildBackendEnvironment(connection) });
    } catch (err) {
      throw err instanceof LaunchStartupError ? err : new SpawnFailedError(command.program, err);
    }
  }

  private handleReadinessMessage(message: ReadinessMessage): void {
    if (message.type === 'probe') {
      this.setState({ status: 'waiting', attempt: message.attempt, maxRetries: this.options.profile.maxRetries });
    } else if (message.type === 'status') {
      void this.queueStatus(message.text, 'info');
    }
  }

  /**
   * Serialize view updates so they land in the order they were produced.
   * Failures are dropped: status text is feedback only.
   */
  private queueStatus(text: string, tone: StatusTone): Promise<void> {
    const view = this.splashView;
    if (!view) {
      return this.viewUpdates;
    }
    this.viewUpdates = this.viewUpdates.then(async () => {
      try {
        await this.options.presentation.updateStatusText(view, text, tone);
      } catch (err) {
        this.logger.debug('Status update dropped', { text, error: getErrorMessage(err) });
      }
    });
    return this.viewUpdates;
  }

  /**
   * Wait for queued status updates, but not forever: a host that never
   * settles an update must not hold up the swap or the exit.
   */
  private async drainViewUpdates(): Promise<void> {
    const limitMs = this.options.viewUpdateTimeoutMs ?? DEFAULT_VIEW_UPDATE_TIMEOUT_MS;
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), limitMs);
    });

    const timedOut = await Promise.race([this.viewUpdates.then(() => false), expired]);
    clearTimeout(timer);
    if (timedOut) {
      this.logger.warn('Status updates still pending, continuing', { waitedMs: limitMs });
    }
  }

  private async finish(outcome: LaunchOutcome): Promise<LaunchOutcome> {
    await this.drainViewUpdates();

    if (outcome.kind === 'backend_ready') {
      await this.showMainView(outcome);
      return outcome;
    }

    this.setState({ status: 'failed', attempts: outcome.attempts });
    if (this.splashView) {
      // Leave the message up long enough to be read
      void this.queueStatus(FAILURE_STATUS_TEXT, 'error');
      await this.drainViewUpdates();
      await this.sleep(this.options.failureHoldMs ?? DEFAULT_FAILURE_HOLD_MS);
    }
    this.exit(1);
    return outcome;
  }

  private async showMainView(outcome: LaunchOutcome): Promise<void> {
    const { presentation, connection, title } = this.options;
    const url = getBaseUrl(connection);

    const main = await presentation.createView(MAIN_VIEW_ID, { kind: 'url', url }, getMainViewOptions(title));
    if (this.splashView) {
      try {
        await presentation.closeView(this.splashView);
      } catch (err) {
        this.logger.debug('Failed to close splash view', { error: getErrorMessage(err) });
      }
      this.splashView = null;
    }
    await presentation.showView(main);

    this.logger.info('Main view shown', { url, attempts: outcome.attempts });
    this.setState({ status: 'ready', url, attempts: outcome.attempts });
  }
}
