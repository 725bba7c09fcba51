import { spawn } from 'child_process';
import type { Readable } from 'stream';
import { logger } from '../logger.js';
import type { SourceKind } from '../types/index.js';
import { Channel } from '../utils/channel.js';
import { settleWithin } from '../utils/timeout.js';
import { ChunkAccumulator } from './chunker.js';
import { Float32PcmDecoder } from './pcm.js';
import { PolyphaseResampler } from './resampler.js';
import { RestartBreaker } from './restart-breaker.js';
import {
  AudioSourceError,
  TARGET_SAMPLE_RATE,
  type AudioSource,
  type ChunkCallback,
} from './types.js';

/** How long a freshly spawned ffmpeg gets to deliver its first bytes. */
const START_TIMEOUT_MS = 5000;

/**
 * A live device always produces samples (silence is zeros), so a quiet pipe
 * means ffmpeg or the device has wedged.
 */
const IDLE_WATCHDOG_MS = 10_000;
const WATCHDOG_CHECK_MS = 1000;

const SIGKILL_DELAY_MS = 2000;
const STOP_WAIT_MS = 3000;
const CONSUMER_STOP_WAIT_MS = 1000;
const RECEIVE_POLL_MS = 100;

/** The parts of a spawned ffmpeg the capture source uses. */
export interface CaptureProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly pid: number | undefined;
  readonly exited: boolean;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (err: Error) => void): void;
  kill(signal: NodeJS.Signals): void;
}

export type CaptureLauncher = (command: string, args: string[]) => CaptureProcess;

export const launchFfmpeg: CaptureLauncher = (command, args) => {
  const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
  return {
    stdout: proc.stdout,
    stderr: proc.stderr,
    pid: proc.pid,
    get exited() {
      return proc.exitCode !== null || proc.signalCode !== null;
    },
    onExit: (listener) => {
      proc.on('exit', listener);
    },
    onError: (listener) => {
      proc.on('error', listener);
    },
    kill: (signal) => {
      try {
        proc.kill(signal);
      } catch (err) {
        logger.debug(`ffmpeg (pid=${proc.pid}): kill ${signal} failed, process already gone:`, err);
      }
    },
  };
};

export interface CaptureOptions {
  ffmpegPath: string;
  /** Rate ffmpeg is asked to deliver; the resampler's input rate. */
  sampleRate: number;
  /** Capture failures after a successful start (breaker open). */
  onError?: (err: AudioSourceError) => void;
  launch?: CaptureLauncher;
  platform?: NodeJS.Platform;
}

function isMissingBinary(err: Error): boolean {
  return 'code' in err && err.code === 'ENOENT';
}

/**
 * Continuous ffmpeg capture of one input device.
 *
 * The stdout handler only enqueues raw bytes. A consumer task decodes them,
 * resamples to 16 kHz and hands fixed-size chunks to the callback, so a slow
 * callback never stalls the pipe.
 *
 * Includes:
 * - Idle watchdog that restarts a capture that stops producing data
 * - Restart on unexpected exit, guarded by a circuit breaker
 * - Two-stage kill: SIGTERM, then SIGKILL after 2s
 */
export abstract class FfmpegCaptureSource implements AudioSource {
  abstract readonly kind: SourceKind;

  protected readonly platform: NodeJS.Platform;
  private readonly options: CaptureOptions;
  private readonly launcher: CaptureLauncher;
  private readonly breaker: RestartBreaker;

  private readonly decoder = new Float32PcmDecoder();
  private readonly resampler: PolyphaseResampler;
  private readonly chunker = new ChunkAccumulator();

  private raw = new Channel<Buffer>();
  private proc: CaptureProcess | null = null;
  private consumer: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private onChunk: ChunkCallback | null = null;
  private inputArgs: string[] = [];
  private watchdogTimer: ReturnType<typeof setInterval> | null = null;
  private lastDataAt = 0;
  private stopping = false;
  private starting = false;
  private _running = false;

  constructor(options: CaptureOptions) {
    this.options = options;
    this.platform = options.platform ?? process.platform;
    this.launcher = options.launch ?? launchFfmpeg;
    this.resampler = new PolyphaseResampler(options.sampleRate, TARGET_SAMPLE_RATE);
    this.breaker = new RestartBreaker('audio capture');
  }

  /** ffmpeg arguments that select the input device. */
  protected abstract resolveInputArgs(): Promise<string[]>;

  get running(): boolean {
    return this._running;
  }

  private get label(): string {
    return `${this.kind} capture`;
  }

  async start(onChunk: ChunkCallback): Promise<void> {
    if (this._running || this.starting) {
      throw new AudioSourceError(`${this.label} is already running`, 'ALREADY_RUNNING');
    }
    this.starting = true;

    try {
      this.inputArgs = await this.resolveInputArgs();
      this.stopping = false;
      this.raw = new Channel<Buffer>();
      this.resetStreamState();
      this.breaker.reset();
      this.onChunk = onChunk;

      await this.launch();

      this.controller = new AbortController();
      this.consumer = this.consume(this.raw, this.controller.signal);
      this._running = true;
    } catch (err) {
      this.onChunk = null;
      this.raw.close();
      throw err;
    } finally {
      this.starting = false;
    }
  }

  async stop(): Promise<void> {
    if (!this._running && !this.proc && !this.consumer) return;
    await this.teardown();
    logger.info(`${this.label}: stopped`);
  }

  /**
   * Detach everything synchronously, then wait (bounded) for ffmpeg and the
   * consumer to finish. A `start()` issued while this waits gets fresh state.
   */
  private async teardown(): Promise<void> {
    this.stopping = true;
    this._running = false;
    this.clearWatchdog();
    this.controller?.abort();
    this.raw.close();

    const proc = this.proc;
    const consumer = this.consumer;
    this.proc = null;
    this.consumer = null;
    this.controller = null;
    this.onChunk = null;
    this.resetStreamState();

    if (proc && !proc.exited) {
      const exited = new Promise<void>((resolve) => proc.onExit(() => resolve()));
      this.killProcess(proc);
      const done = await settleWithin(exited, STOP_WAIT_MS, (err) => logger.error(`${this.label}: stop error:`, err));
      if (!done) {
        logger.warn(`${this.label}: ffmpeg (pid=${proc.pid}) did not exit within ${STOP_WAIT_MS / 1000}s`);
      }
    }

    if (consumer) {
      await settleWithin(consumer, CONSUMER_STOP_WAIT_MS, (err) =>
        logger.error(`${this.label}: consumer failed during stop:`, err)
      );
    }
  }

  /** Spawn ffmpeg and resolve once it delivers audio. */
  private launch(): Promise<void> {
    const args = [
      '-hide_banner',
      '-nostdin',
      '-loglevel', 'warning',
      ...this.inputArgs,
      '-ac', '1',
      '-ar', String(this.options.sampleRate),
      '-f', 'f32le',
      'pipe:1',
    ];
    const proc = this.launcher(this.options.ffmpegPath, args);
    this.proc = proc;
    const stderrTail: string[] = [];
    let delivering = false;

    this.clearWatchdog();
    this.watchdogTimer = setInterval(() => {
      if (!delivering || this.proc !== proc || this.stopping) return;
      if (Date.now() - this.lastDataAt <= IDLE_WATCHDOG_MS) return;
      this.clearWatchdog();
      logger.warn(`${this.label}: no audio for ${IDLE_WATCHDOG_MS / 1000}s, restarting ffmpeg`);
      // The exit handler takes it from here
      this.killProcess(proc);
    }, WATCHDOG_CHECK_MS);

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const fail = (err: AudioSourceError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(startTimer);
        if (this.proc === proc) {
          this.proc = null;
          this.clearWatchdog();
        }
        this.killProcess(proc);
        reject(err);
      };

      const startTimer = setTimeout(() => {
        fail(new AudioSourceError(
          `${this.label}: no audio from device within ${START_TIMEOUT_MS / 1000}s`,
          'DEVICE_OPEN_FAILED'
        ));
      }, START_TIMEOUT_MS);

      proc.stdout.on('data', (data: Buffer) => {
        if (!settled) {
          settled = true;
          delivering = true;
          clearTimeout(startTimer);
          logger.info(`${this.label}: ffmpeg started, pid=${proc.pid}`);
          resolve();
        }
        this.lastDataAt = Date.now();
        this.raw.push(data);
      });

      proc.stderr.on('data', (data: Buffer) => {
        const msg = data.toString().trim();
        if (!msg) return;
        stderrTail.push(msg);
        if (stderrTail.length > 5) stderrTail.shift();
        // Only log warnings/errors, not informational output
        if (/error|warning/i.test(msg)) {
          logger.warn(`${this.label}: ${msg}`);
        }
      });

      proc.onError((err) => {
        if (!settled) {
          fail(isMissingBinary(err)
            ? new AudioSourceError(`ffmpeg not found at "${this.options.ffmpegPath}"`, 'FFMPEG_NOT_FOUND', { cause: err })
            : new AudioSourceError(`${this.label}: failed to spawn ffmpeg: ${err.message}`, 'DEVICE_OPEN_FAILED', { cause: err }));
          return;
        }
        logger.error(`${this.label}: process error:`, err);
      });

      proc.onExit((code, signal) => {
        const current = this.proc === proc;
        if (current) {
          this.proc = null;
          this.clearWatchdog();
        }
        if (!delivering) {
          const detail = stderrTail.length > 0 ? `: ${stderrTail.join(' | ')}` : '';
          fail(new AudioSourceError(
            `${this.label}: ffmpeg exited before delivering audio (code ${code}, signal ${signal})${detail}`,
            'DEVICE_OPEN_FAILED'
          ));
          return;
        }
        // A process detached by teardown must not restart a newer capture
        if (this.stopping || !current) return;
        logger.warn(`${this.label}: ffmpeg exited unexpectedly (code ${code}, signal ${signal})`);
        this.restart();
      });
    });
  }

  private restart(): void {
    if (this.stopping) return;
    if (this.breaker.recordFailure()) {
      this.report(new AudioSourceError(`${this.label}: circuit breaker open, capture stopped`, 'CAPTURE_FAILED'));
      this.teardown().catch((err: unknown) => logger.error(`${this.label}: teardown after breaker open failed:`, err));
      return;
    }

    // Partial samples from the dead process must not prefix the new stream
    this.decoder.reset();
    logger.info(`${this.label}: restarting ffmpeg`);
    this.launch().catch((err: unknown) => {
      if (this.stopping) return;
      logger.error(`${this.label}: restart failed:`, err);
      this.restart();
    });
  }

  private async consume(raw: Channel<Buffer>, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const data = await raw.receive(RECEIVE_POLL_MS);
        if (!data || signal.aborted) continue;
        const samples = this.decoder.decode(data);
        const resampled = this.resampler.process(samples);
        for (const chunk of this.chunker.push(resampled)) {
          this.onChunk?.(chunk);
        }
      } catch (err) {
        logger.error(`${this.label}: consumer error:`, err);
      }
    }
  }

  /** Two-stage: SIGTERM, then SIGKILL after 2s. */
  private killProcess(proc: CaptureProcess): void {
    if (proc.exited) return;
    proc.kill('SIGTERM');

    const sigkillTimer = setTimeout(() => {
      if (proc.exited) return;
      proc.kill('SIGKILL');
      logger.warn(`${this.label}: SIGTERM ignored, sent SIGKILL (pid=${proc.pid})`);
    }, SIGKILL_DELAY_MS);
    proc.onExit(() => clearTimeout(sigkillTimer));
  }

  private clearWatchdog(): void {
    if (this.watchdogTimer) {
      clearInterval(this.watchdogTimer);
      this.watchdogTimer = null;
    }
  }

  private resetStreamState(): void {
    this.decoder.reset();
    this.resampler.reset();
    this.chunker.reset();
  }

  private report(err: AudioSourceError): void {
    logger.error(err.message);
    this.options.onError?.(err);
  }
}
