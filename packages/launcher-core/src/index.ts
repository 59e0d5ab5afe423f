export type {
  BackendConnection,
  HealthProbe,
  LaunchOutcome,
  LaunchState,
  ProbeResult,
  ReadinessMessage,
  ReadinessProfile,
  ReadinessState,
  ReadinessSubscriber,
  Sleep,
  StateSubscriber,
  StatusBand,
  TransportErrorPolicy,
} from './types.js';

export {
  DEFAULT_BACKEND_HOST,
  DEFAULT_BACKEND_PORT,
  buildBackendEnvironment,
  createBackendConnection,
  getBaseUrl,
  getProbeUrl,
} from './connection.js';

export {
  DEFAULT_STATUS_BANDS,
  FAILURE_STATUS_TEXT,
  MINIMAL_PROFILE,
  PROFILES,
  SPLASH_PROFILE,
  getProfile,
  getWorstCaseWaitMs,
} from './profiles.js';
export type { ProfileName } from './profiles.js';

export { getStatusMessage, validateStatusBands } from './status.js';

export { HttpHealthProbe, classifyStatus, classifyTransportError, parseHealthReason } from './health.js';
export type { HttpHealthProbeOptions } from './health.js';

export { ReadinessController, defaultSleep } from './readiness.js';
export type { ReadinessControllerOptions } from './readiness.js';

export { LaunchOrchestrator, DEFAULT_FAILURE_HOLD_MS, DEFAULT_VIEW_UPDATE_TIMEOUT_MS } from './orchestrator.js';
export type { LaunchOrchestratorOptions, LaunchSession } from './orchestrator.js';

export {
  MAIN_VIEW_ID,
  SPLASH_VIEW_ID,
  getMainViewOptions,
  getSplashViewOptions,
} from './presentation.js';
export type {
  PresentationLayer,
  StatusTone,
  ViewHandle,
  ViewOptions,
  ViewSource,
} from './presentation.js';

export { ChildProcessSupervisor, buildSpawnEnv } from './supervisor.js';
export type {
  ChildProcessSupervisorOptions,
  ProcessSupervisor,
  SidecarCommand,
  SidecarExitListener,
  SidecarHandle,
  SidecarSpawnOptions,
} from './supervisor.js';

export { getSidecarCandidates, getTargetTriple, resolveSidecarPath } from './sidecar.js';
export type { SidecarLookup } from './sidecar.js';

export {
  LaunchStartupError,
  SidecarNotFoundError,
  SpawnFailedError,
  ViewClosedError,
  ViewCreationError,
  getErrorMessage,
} from './errors.js';

export {
  LOG_LEVEL_PRIORITY,
  createBufferedLogger,
  createConsoleLogger,
  createLogger,
  createNoOpLogger,
  formatLogLine,
  shouldLog,
  writeConsoleEntry,
} from './logging.js';
export type {
  BufferedLogger,
  ConsoleLoggerOptions,
  LogEntry,
  LogEntryWriter,
  LogLevel,
  Logger,
} from './logging.js';

export { redact } from './redact.js';
