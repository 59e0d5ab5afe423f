import {
  ChildProcessSupervisor,
  LaunchOrchestrator,
  createBackendConnection,
  getErrorMessage,
  getProfile,
  getWorstCaseWaitMs,
  type Logger,
  type PresentationLayer,
  type ProcessSupervisor,
  type SidecarHandle,
  type Sleep,
} from '@sidecar-launcher/core';
import type { DesktopConfig } from './config.js';
import { TerminalPresentation } from './presentation/terminal-presentation.js';

const HANDLED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export interface SignalTarget {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface RunLauncherOptions {
  config: DesktopConfig;
  logger: Logger;
  presentation?: PresentationLayer;
  supervisor?: ProcessSupervisor;
  signals?: SignalTarget;
  sleep?: Sleep;
}

/**
 * Launch the backend and keep the launcher alive alongside it. Resolves with
 * the process exit code once the launcher is done: startup failed, readiness
 * was exhausted, the backend stopped after launch, or a shutdown signal
 * arrived. The sidecar has been signalled by the time it resolves.
 */
export async function runLauncher(options: RunLauncherOptions): Promise<number> {
  const { config, logger } = options;
  const signals = options.signals ?? process;
  const profile = getProfile(config.profile);

  let backend: SidecarHandle | null = null;
  let exitCode: number | null = null;
  let resolveDone: (code: number) => void = () => {};
  const done = new Promise<number>((resolve) => {
    resolveDone = resolve;
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info('Shutdown requested', { signal });
    shutdown(0);
  };

  const shutdown = (code: number): void => {
    if (exitCode !== null) return;
    exitCode = code;
    for (const signal of HANDLED_SIGNALS) {
      signals.off(signal, onSignal);
    }
    if (backend?.kill()) {
      logger.info('Stopping backend sidecar', { pid: backend.pid });
    }
    resolveDone(code);
  };

  for (const signal of HANDLED_SIGNALS) {
    signals.on(signal, onSignal);
  }

  const orchestrator = new LaunchOrchestrator({
    connection: createBackendConnection(config.backendPort),
    profile,
    presentation:
      options.presentation ??
      new TerminalPresentation({ openBrowser: config.openBrowser, logger: logger.child('presentation') }),
    supervisor:
      options.supervisor ??
      new ChildProcessSupervisor({ binariesDir: config.binariesDir, logger: logger.child('sidecar') }),
    sidecarName: config.sidecarName,
    title: config.appTitle,
    splash: config.profile === 'splash',
    probeTimeoutMs: config.probeTimeoutMs,
    failureHoldMs: config.failureHoldMs,
    logger,
    sleep: options.sleep,
    exit: (code) => shutdown(code),
  });

  logger.info('Starting backend', {
    profile: config.profile,
    port: config.backendPort,
    maxWaitMs: getWorstCaseWaitMs(profile),
  });

  try {
    const session = await orchestrator.start();
    backend = session.backend;
  } catch (err) {
    logger.error('Launcher could not start', { error: getErrorMessage(err) });
    shutdown(1);
    return done;
  }

  if (exitCode !== null) {
    // A signal arrived while the sidecar was being spawned
    backend.kill();
    return done;
  }

  backend.onExit((code, signal) => {
    if (exitCode !== null) return;
    if (orchestrator.getState().status !== 'ready') {
      logger.warn('Backend sidecar exited before it became ready', { code, signal });
      return;
    }
    logger.warn('Backend sidecar stopped', { code, signal });
    shutdown(code === 0 ? 0 : 1);
  });

  return done;
}
