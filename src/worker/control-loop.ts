import { v4 as uuidv4 } from 'uuid';
import type { AudioSource, AudioSourceError, ChunkCallback } from '../audio/types.js';
import type { Direction } from '../languages.js';
import { errorMessage, logger } from '../logger.js';
import { createPipelineHealth, type PipelineHealth } from '../pipeline/health.js';
import { runSegmenterTask } from '../pipeline/segmenter-task.js';
import { runTranscriptionLoop, type Transcriber } from '../pipeline/transcription-loop.js';
import { TranslationDebouncer } from '../translate/translation-debouncer.js';
import { createTranslationState, type TranslationState } from '../translate/translation-state.js';
import type { Translator } from '../translate/translator.js';
import type { SourceKind } from '../types/index.js';
import { Channel } from '../utils/channel.js';
import { settleWithin } from '../utils/timeout.js';
import { SpeechSegmenter } from '../vad/speech-segmenter.js';
import type { SpeechProbabilityModel, SpeechSegment } from '../vad/types.js';
import { parseCommand, type HealthReport, type WorkerCommand, type WorkerEvent } from './protocol.js';

const COMMAND_POLL_MS = 100;
const SEGMENTER_STOP_MS = 3_000;
const TRANSCRIBER_STOP_MS = 5_000;

export interface PipelineDependencies {
  createSource(kind: SourceKind, onError: (err: AudioSourceError) => void): AudioSource;
  vadModel: SpeechProbabilityModel;
  transcriber: Transcriber;
  translator: Translator;
}

export interface ControlLoopSettings {
  source: SourceKind;
  direction: Direction;
  sendLanguageHint: boolean;
  heartbeatMs: number;
  /** Bounds on waiting for each stage at teardown; a stage still running after is abandoned. */
  segmenterStopMs?: number;
  transcriberStopMs?: number;
  sampleLag?: () => number | null;
}

function otherSource(kind: SourceKind): SourceKind {
  return kind === 'monitor' ? 'mic' : 'monitor';
}

/**
 * Owns one pipeline run inside the worker: starts capture and the stage tasks,
 * dispatches host commands, reports health, and tears everything down in order.
 */
export class WorkerControlLoop {
  readonly sessionId = uuidv4();

  private readonly deps: PipelineDependencies;
  private readonly settings: ControlLoopSettings;
  private readonly commands: Channel<string>;
  private readonly emit: (event: WorkerEvent) => void;

  private readonly health: PipelineHealth = createPipelineHealth();
  private readonly controller = new AbortController();
  private readonly chunks = new Channel<Float32Array>();
  private readonly speech = new Channel<SpeechSegment>();
  private readonly state: TranslationState;
  private readonly debouncer: TranslationDebouncer;
  private readonly onChunk: ChunkCallback = (chunk) => this.chunks.push(chunk);

  private source: AudioSource;

  constructor(
    deps: PipelineDependencies,
    settings: ControlLoopSettings,
    commands: Channel<string>,
    emit: (event: WorkerEvent) => void
  ) {
    this.deps = deps;
    this.settings = settings;
    this.commands = commands;
    this.emit = emit;

    this.state = createTranslationState(settings.direction);
    this.debouncer = new TranslationDebouncer(this.state, deps.translator, (update) => {
      this.emit({ original: update.corrected, translated: update.translated });
    });
    this.source = this.createSource(settings.source);
  }

  /** Runs until `stop` arrives or the command channel closes. Resolves with the exit code. */
  async run(): Promise<number> {
    const { signal } = this.controller;

    const segmenterTask = runSegmenterTask({
      chunks: this.chunks,
      segments: this.speech,
      segmenter: new SpeechSegmenter(this.deps.vadModel),
      signal,
      health: this.health,
    });
    const transcriptionTask = runTranscriptionLoop({
      segments: this.speech,
      transcriber: this.deps.transcriber,
      sink: this.debouncer,
      emit: (event) => this.emit(event),
      languageHint: () => (this.settings.sendLanguageHint ? this.state.direction.source : undefined),
      signal,
      health: this.health,
    });

    let heartbeat: ReturnType<typeof setInterval> | null = null;
    let exitCode = 0;

    try {
      try {
        await this.source.start(this.onChunk);
        this.health.capture = 'running';
        logger.info(`[Worker] capturing from ${this.source.kind}, direction ${this.debouncer.direction}`);
      } catch (err) {
        this.health.capture = 'failed';
        logger.error('[Worker] could not start audio capture:', err);
        this.emit({ error: errorMessage(err), fatal: true });
        exitCode = 1;
        return exitCode;
      }

      heartbeat = setInterval(() => this.emit({ health: this.healthReport() }), this.settings.heartbeatMs);

      for (;;) {
        const raw = await this.commands.receive(COMMAND_POLL_MS);
        if (raw === undefined) {
          if (this.commands.closed) {
            logger.warn('[Worker] command channel closed, stopping');
            break;
          }
          continue;
        }

        const command = parseCommand(raw);
        if (!command) {
          logger.warn(`[Worker] ignoring unknown command: ${JSON.stringify(raw)}`);
          continue;
        }
        if (command.type === 'stop') break;
        await this.dispatch(command);
      }
    } finally {
      if (heartbeat) clearInterval(heartbeat);
      await this.teardown(segmenterTask, transcriptionTask);
      logger.info(`[Worker] stopped (exit code ${exitCode})`);
    }

    return exitCode;
  }

  healthReport(): HealthReport {
    return {
      sessionId: this.sessionId,
      segmenter: this.health.segmenter,
      transcriber: this.health.transcriber,
      capture: this.health.capture,
      eventLoopLagMs: this.settings.sampleLag?.() ?? null,
      segments: this.health.segments,
      transcripts: this.health.transcripts,
    };
  }

  private async dispatch(command: Exclude<WorkerCommand, { type: 'stop' }>): Promise<void> {
    switch (command.type) {
      case 'toggle':
        this.emit({ direction: this.debouncer.toggleDirection() });
        return;
      case 'set_direction':
        this.emit({ direction: this.debouncer.setDirection(command.direction) });
        return;
      case 'switch_source':
        await this.switchSource();
        return;
    }
  }

  private async switchSource(): Promise<void> {
    const next = otherSource(this.source.kind);
    await this.stopSource();

    this.source = this.createSource(next);
    try {
      await this.source.start(this.onChunk);
      this.health.capture = 'running';
      logger.info(`[Worker] switched to ${next}`);
      this.emit({ source: next });
    } catch (err) {
      this.health.capture = 'failed';
      logger.error(`[Worker] could not start ${next} capture:`, err);
      this.emit({ error: `Could not start ${next} capture: ${errorMessage(err)}`, fatal: false });
    }
  }

  private createSource(kind: SourceKind): AudioSource {
    return this.deps.createSource(kind, (err) => {
      this.health.capture = 'failed';
      this.emit({ error: err.message, fatal: false });
    });
  }

  private async stopSource(): Promise<void> {
    try {
      await this.source.stop();
    } catch (err) {
      logger.warn(`[Worker] error stopping ${this.source.kind} capture: ${errorMessage(err)}`);
    }
    if (this.health.capture === 'running') this.health.capture = 'stopped';
  }

  private async teardown(segmenterTask: Promise<void>, transcriptionTask: Promise<void>): Promise<void> {
    this.controller.abort();
    await this.stopSource();
    this.debouncer.shutdown();
    this.chunks.close();
    this.speech.close();

    const onError = (err: unknown) => logger.error('[Worker] stage ended with an error:', err);
    if (!(await settleWithin(segmenterTask, this.settings.segmenterStopMs ?? SEGMENTER_STOP_MS, onError))) {
      logger.warn('[Worker] segmenter did not stop in time, abandoning it');
    }
    if (!(await settleWithin(transcriptionTask, this.settings.transcriberStopMs ?? TRANSCRIBER_STOP_MS, onError))) {
      logger.warn('[Worker] transcription loop did not stop in time, abandoning it');
    }
  }
}
