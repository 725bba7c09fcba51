import { TranscriptionTimeoutError } from '../asr/errors.js';
import type { TranscriptResult } from '../asr/transcription-client.js';
import { TARGET_SAMPLE_RATE } from '../audio/types.js';
import { errorMessage, logger } from '../logger.js';
import type { Channel } from '../utils/channel.js';
import type { SpeechSegment } from '../vad/types.js';
import type { PipelineHealth } from './health.js';

const RECEIVE_POLL_MS = 500;

/** 125 ms; shorter segments are clicks and breaths, not words. */
export const MIN_SEGMENT_SAMPLES = TARGET_SAMPLE_RATE / 8;

export interface Transcriber {
  transcribe(samples: Float32Array, languageHint?: string): Promise<TranscriptResult>;
}

export interface TranscriptSink {
  update(text: string): void;
}

export interface SubtitleEvent {
  original: string;
  translated: string;
}

export interface TranscriptionLoopOptions {
  segments: Channel<SpeechSegment>;
  transcriber: Transcriber;
  /** Receives every accepted transcript, normally the translation debouncer. */
  sink: TranscriptSink;
  emit: (event: SubtitleEvent) => void;
  /** Evaluated per request, so it follows direction changes. */
  languageHint: () => string | undefined;
  signal: AbortSignal;
  health: PipelineHealth;
}

/**
 * Sends segments to the ASR server one at a time.
 *
 * A transcript that is empty or identical to the previous one is dropped.
 * Otherwise it is shown untranslated right away and handed to the sink.
 * After a timeout everything still queued is discarded.
 */
export async function runTranscriptionLoop(options: TranscriptionLoopOptions): Promise<void> {
  const { segments, transcriber, sink, emit, languageHint, signal, health } = options;
  let current = '';

  health.transcriber = 'running';
  logger.info('[ASR] transcription loop started');

  while (!signal.aborted) {
    const segment = await segments.receive(RECEIVE_POLL_MS);
    if (!segment) continue;

    if (segment.samples.length < MIN_SEGMENT_SAMPLES) {
      logger.debug(`[ASR] skipping ${segment.samples.length}-sample segment`);
      continue;
    }

    try {
      const { language, text } = await transcriber.transcribe(segment.samples, languageHint());
      logger.info(`[ASR] lang=${JSON.stringify(language)} text=${JSON.stringify(text)} same=${text === current}`);

      if (text && text !== current) {
        current = text;
        health.transcripts++;
        emit({ original: text, translated: '' });
        sink.update(text);
      }
    } catch (err) {
      logger.warn(`[ASR error] ${errorMessage(err)}`);
      if (err instanceof TranscriptionTimeoutError) {
        const dropped = segments.drain();
        if (dropped > 0) {
          logger.warn(`[ASR] Cleared ${dropped} stale segments after timeout`);
        }
      }
    }
  }

  health.transcriber = 'stopped';
}
