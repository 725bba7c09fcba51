import { describe, it, expect, vi } from 'vitest';
import type { AppConfig } from '../../types/index.js';
import type { WorkerEvent } from '../protocol.js';
import {
  WorkerHost,
  toWorkerConfig,
  workerEntryPoint,
  type LaunchOptions,
  type WorkerProcess,
} from '../worker-host.js';

const config: AppConfig = {
  asrServer: 'http://localhost:8000',
  asrTimeoutSeconds: 45,
  sendLanguageHint: true,
  source: 'monitor',
  monitorDevice: '',
  micDevice: '',
  captureSampleRate: 48000,
  direction: 'en→zh',
  openaiApiKey: 'test-secret',
  translationModel: 'gpt-4o-mini',
  translationBaseUrl: '',
  vadModelPath: './models/silero_vad_v6.onnx',
  ffmpegPath: 'ffmpeg',
  heartbeatSeconds: 5,
};

class FakeWorker implements WorkerProcess {
  readonly pid = 4321;
  connected = true;
  readonly sent: string[] = [];
  readonly kills: NodeJS.Signals[] = [];
  private messageListeners: Array<(message: unknown) => void> = [];
  private exitListeners: Array<(code: number | null, signal: NodeJS.Signals | null) => void> = [];

  constructor(private readonly honours: Array<string>) {}

  send(command: string): boolean {
    this.sent.push(command);
    if (command === 'stop' && this.honours.includes('stop')) {
      setImmediate(() => this.exit(0, null));
    }
    return true;
  }

  kill(signal: NodeJS.Signals): void {
    this.kills.push(signal);
    if (this.honours.includes(signal)) {
      setImmediate(() => this.exit(null, signal));
    }
  }

  onMessage(listener: (message: unknown) => void): void {
    this.messageListeners.push(listener);
  }

  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void {
    this.exitListeners.push(listener);
  }

  onError(): void {}

  message(message: unknown): void {
    for (const listener of this.messageListeners) listener(message);
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    this.connected = false;
    for (const listener of this.exitListeners) listener(code, signal);
  }
}

function startHost(worker: FakeWorker, options: { stopTimeoutMs?: number; killGraceMs?: number } = {}) {
  const launches: Array<{ path: string; args: string[]; options: LaunchOptions }> = [];
  const host = new WorkerHost({
    ...options,
    launch: (path, args, launchOptions) => {
      launches.push({ path, args, options: launchOptions });
      return worker;
    },
  });
  host.start(config);
  return { host, launches };
}

describe('workerEntryPoint', () => {
  it('runs the TypeScript entry through tsx when loaded from sources', () => {
    expect(workerEntryPoint('file:///opt/app/src/worker/worker-host.ts')).toEqual({
      path: '/opt/app/src/worker/worker-main.ts',
      execArgv: ['--import', 'tsx'],
    });
  });

  it('runs the compiled entry directly', () => {
    expect(workerEntryPoint('file:///opt/app/dist/src/worker/worker-host.js')).toEqual({
      path: '/opt/app/dist/src/worker/worker-main.js',
      execArgv: [],
    });
  });
});

describe('WorkerHost', () => {
  it('passes the settings in argv and the key in the environment', () => {
    const { launches } = startHost(new FakeWorker(['stop']));

    expect(launches).toHaveLength(1);
    expect(JSON.parse(launches[0].args[0])).toEqual(toWorkerConfig(config));
    expect(launches[0].args[0]).not.toContain('test-secret');
    expect(launches[0].options.env.OPENAI_API_KEY).toBe('test-secret');
  });

  it('refuses a second start', () => {
    const { host } = startHost(new FakeWorker(['stop']));
    expect(() => host.start(config)).toThrow('Worker is already running');
  });

  it('emits valid events and drops malformed ones', () => {
    const worker = new FakeWorker(['stop']);
    const { host } = startHost(worker);
    const events: WorkerEvent[] = [];
    host.on('event', (event: WorkerEvent) => events.push(event));

    worker.message({ original: 'hi', translated: '' });
    worker.message({ direction: 'zh→en' });
    worker.message({ source: 'speaker' });
    worker.message({ original: 'hi' });
    worker.message('toggle');

    expect(events).toEqual([{ original: 'hi', translated: '' }, { direction: 'zh→en' }]);
  });

  it('forwards commands to a connected worker only', () => {
    const worker = new FakeWorker(['stop']);
    const { host } = startHost(worker);

    expect(host.send('toggle')).toBe(true);
    worker.connected = false;
    expect(host.send('switch_source')).toBe(false);
    expect(worker.sent).toEqual(['toggle']);
  });

  it('stops cleanly when the worker honours the stop command', async () => {
    const worker = new FakeWorker(['stop']);
    const { host } = startHost(worker);
    const exits = vi.fn();
    host.on('exit', exits);

    await expect(host.stop()).resolves.toBe(0);

    expect(worker.sent).toEqual(['stop']);
    expect(worker.kills).toEqual([]);
    expect(exits).toHaveBeenCalledWith(0, null);
    expect(host.running).toBe(false);
  });

  it('escalates to SIGTERM and then SIGKILL', async () => {
    const worker = new FakeWorker(['SIGKILL']);
    const { host } = startHost(worker, { stopTimeoutMs: 20, killGraceMs: 20 });

    await expect(host.stop()).resolves.toBeNull();

    expect(worker.kills).toEqual(['SIGTERM', 'SIGKILL']);
  });

  it('resolves null when nothing is running', async () => {
    await expect(new WorkerHost({ launch: () => new FakeWorker([]) }).stop()).resolves.toBeNull();
  });
});
