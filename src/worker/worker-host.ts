import { fork } from 'child_process';
import { EventEmitter } from 'events';
import { fileURLToPath } from 'url';
import { errorMessage, logger } from '../logger.js';
import type { AppConfig } from '../types/index.js';
import { settleWithin } from '../utils/timeout.js';
import { parseEvent, type WorkerConfig } from './protocol.js';

const STOP_TIMEOUT_MS = 8_000;
const KILL_GRACE_MS = 2_000;

/** The parts of a forked child the host uses. */
export interface WorkerProcess {
  readonly pid: number | undefined;
  readonly connected: boolean;
  send(command: string): boolean;
  kill(signal: NodeJS.Signals): void;
  onMessage(listener: (message: unknown) => void): void;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (err: Error) => void): void;
}

export interface LaunchOptions {
  execArgv: string[];
  env: NodeJS.ProcessEnv;
}

export type WorkerLauncher = (modulePath: string, args: string[], options: LaunchOptions) => WorkerProcess;

export const forkWorker: WorkerLauncher = (modulePath, args, options) => {
  const child = fork(modulePath, args, {
    execArgv: options.execArgv,
    env: options.env,
    stdio: ['inherit', 'inherit', 'inherit', 'ipc'],
  });
  return {
    get pid() {
      return child.pid;
    },
    get connected() {
      return child.connected;
    },
    send: (command) => child.send(command),
    kill: (signal) => {
      try {
        child.kill(signal);
      } catch (err) {
        logger.debug(`worker (pid=${child.pid}): kill ${signal} failed, process already gone:`, err);
      }
    },
    onMessage: (listener) => child.on('message', listener),
    onExit: (listener) => child.on('exit', listener),
    onError: (listener) => child.on('error', listener),
  };
};

/**
 * Where the worker entry point lives. Running from TypeScript sources the
 * child needs tsx as its loader; from the build it is plain JavaScript.
 */
export function workerEntryPoint(moduleUrl: string = import.meta.url): { path: string; execArgv: string[] } {
  const fromSources = moduleUrl.endsWith('.ts');
  return {
    path: fileURLToPath(new URL(fromSources ? './worker-main.ts' : './worker-main.js', moduleUrl)),
    execArgv: fromSources ? ['--import', 'tsx'] : [],
  };
}

/** The key stays out of argv so it never appears in a process listing. */
export function toWorkerConfig(config: AppConfig): WorkerConfig {
  const { openaiApiKey: _apiKey, ...settings } = config;
  return settings;
}

export interface WorkerHostOptions {
  launch?: WorkerLauncher;
  /** How long `stop()` waits for a clean exit before SIGTERM. */
  stopTimeoutMs?: number;
  /** How long after SIGTERM before SIGKILL. */
  killGraceMs?: number;
}

/**
 * Runs the pipeline in a child process.
 *
 * Emits:
 * - `'event'` (WorkerEvent) for every valid message from the worker
 * - `'exit'` (code, signal) when the child is gone
 */
export class WorkerHost extends EventEmitter {
  private readonly launch: WorkerLauncher;
  private readonly stopTimeoutMs: number;
  private readonly killGraceMs: number;

  private child: WorkerProcess | null = null;
  private exited: Promise<number | null> | null = null;

  constructor(options: WorkerHostOptions = {}) {
    super();
    this.launch = options.launch ?? forkWorker;
    this.stopTimeoutMs = options.stopTimeoutMs ?? STOP_TIMEOUT_MS;
    this.killGraceMs = options.killGraceMs ?? KILL_GRACE_MS;
  }

  get running(): boolean {
    return this.child !== null;
  }

  start(config: AppConfig): void {
    if (this.child) {
      throw new Error('Worker is already running');
    }

    const entry = workerEntryPoint();
    const child = this.launch(entry.path, [JSON.stringify(toWorkerConfig(config))], {
      execArgv: entry.execArgv,
      env: { ...process.env, OPENAI_API_KEY: config.openaiApiKey },
    });
    this.child = child;
    logger.info(`Worker started (pid=${child.pid ?? 'unknown'})`);

    this.exited = new Promise((resolve) => {
      child.onExit((code, signal) => {
        logger.info(`Worker exited (code=${code}, signal=${signal})`);
        if (this.child === child) this.child = null;
        this.emit('exit', code, signal);
        resolve(code);
      });
    });

    child.onMessage((message) => {
      const event = parseEvent(message);
      if (!event) {
        logger.warn('Dropping malformed worker event:', message);
        return;
      }
      this.emit('event', event);
    });

    child.onError((err) => {
      logger.error('Worker process error:', err);
      this.emit('event', { error: `Worker process error: ${err.message}`, fatal: true });
    });
  }

  /** Forward a wire command. Returns false when there is no connected worker. */
  send(command: string): boolean {
    if (!this.child?.connected) {
      logger.warn(`No worker to receive command "${command}"`);
      return false;
    }
    return this.child.send(command);
  }

  /**
   * Ask the worker to stop, escalating to SIGTERM and then SIGKILL.
   * Resolves with the worker's exit code (null when killed or never started).
   */
  async stop(): Promise<number | null> {
    const child = this.child;
    const exited = this.exited;
    if (!child || !exited) return null;

    const onError = (err: unknown) => logger.warn(`Worker exit wait failed: ${errorMessage(err)}`);

    if (child.connected) child.send('stop');
    if (await settleWithin(exited, this.stopTimeoutMs, onError)) return exited;

    logger.warn(`Worker did not stop within ${this.stopTimeoutMs / 1000}s, sending SIGTERM`);
    child.kill('SIGTERM');
    if (await settleWithin(exited, this.killGraceMs, onError)) return exited;

    logger.warn(`Worker still running ${this.killGraceMs / 1000}s after SIGTERM, sending SIGKILL`);
    child.kill('SIGKILL');
    return exited;
  }
}
