import { spawn, type ChildProcess } from 'child_process';
import readline from 'readline';
import type { Readable } from 'stream';
import { SpawnFailedError } from './errors.js';
import { resolveSidecarPath, type SidecarLookup } from './sidecar.js';
import { createNoOpLogger, type Logger } from './logging.js';

export interface SidecarSpawnOptions {
  env: Record<string, string>;
  args?: string[];
  cwd?: string;
}

export type SidecarExitListener = (code: number | null, signal: NodeJS.Signals | null) => void;

export interface SidecarHandle {
  readonly program: string;
  readonly pid: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
  onExit(listener: SidecarExitListener): () => void;
}

export interface SidecarCommand {
  readonly program: string;
  spawn(options: SidecarSpawnOptions): Promise<SidecarHandle>;
}

/**
 * Process-spawning capability. `sidecar()` throws when the named executable
 * cannot be obtained; `spawn()` rejects when the OS refuses to start it.
 */
export interface ProcessSupervisor {
  sidecar(name: string): SidecarCommand;
}

export interface ChildProcessSupervisorOptions extends SidecarLookup {
  logger?: Logger;
}

export function buildSpawnEnv(env: Record<string, string>): Record<string, string> {
  const spawnEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (typeof value === 'string') {
      spawnEnv[key] = value;
    }
  }
  for (const [key, value] of Object.entries(env)) {
    spawnEnv[key] = value;
  }
  return spawnEnv;
}

class ChildProcessSidecar implements SidecarHandle {
  private exitListeners = new Set<SidecarExitListener>();
  private exited = false;

  constructor(
    readonly program: string,
    private readonly child: ChildProcess,
    private readonly logger: Logger
  ) {
    child.on('exit', (code, signal) => {
      this.exited = true;
      this.logger.info('Backend sidecar exited', { pid: child.pid, code, signal });
      for (const listener of this.exitListeners) {
        try {
          listener(code, signal);
        } catch (err) {
          this.logger.warn('Sidecar exit listener threw', { error: String(err) });
        }
      }
    });
    this.forwardOutput(child.stdout, 'stdout');
    this.forwardOutput(child.stderr, 'stderr');
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    if (this.exited) {
      return false;
    }
    try {
      return this.child.kill(signal);
    } catch (err) {
      this.logger.warn('Failed to signal backend sidecar', { signal, error: String(err) });
      return false;
    }
  }

  onExit(listener: SidecarExitListener): () => void {
    this.exitListeners.add(listener);
    return () => this.exitListeners.delete(listener);
  }

  private forwardOutput(stream: Readable | null, name: 'stdout' | 'stderr'): void {
    if (!stream) return;
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    lines.on('line', (line) => {
      if (line.trim()) {
        this.logger.debug(`[${name}] ${line}`);
      }
    });
  }
}

class ChildProcessCommand implements SidecarCommand {
  constructor(
    readonly program: string,
    private readonly logger: Logger
  ) {}

  spawn(options: SidecarSpawnOptions): Promise<SidecarHandle> {
    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(this.program, options.args ?? [], {
          cwd: options.cwd,
          env: buildSpawnEnv(options.env),
          stdio: ['ignore', 'pipe', 'pipe'],
          windowsHide: true,
        });
      } catch (err) {
        reject(new SpawnFailedError(this.program, err));
        return;
      }

      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        reject(new SpawnFailedError(this.program, error));
      };
      const onSpawn = (): void => {
        child.off('error', onError);
        child.on('error', (error) => {
          this.logger.error('Backend sidecar error', { error: error.message });
        });
        this.logger.info('Backend sidecar spawned', { program: this.program, pid: child.pid });
        resolve(new ChildProcessSidecar(this.program, child, this.logger));
      };

      child.once('error', onError);
      child.once('spawn', onSpawn);
    });
  }
}

export class ChildProcessSupervisor implements ProcessSupervisor {
  private readonly logger: Logger;

  constructor(private readonly options: ChildProcessSupervisorOptions) {
    this.logger = options.logger ?? createNoOpLogger();
  }

  sidecar(name: string): SidecarCommand {
    const program = resolveSidecarPath(name, this.options);
    return new ChildProcessCommand(program, this.logger);
  }
}
