import { TARGET_SAMPLE_RATE } from '../audio/types.js';
import { logger } from '../logger.js';
import type { Channel } from '../utils/channel.js';
import type { SpeechSegmenter } from '../vad/speech-segmenter.js';
import type { SpeechSegment } from '../vad/types.js';
import type { PipelineHealth } from './health.js';

const RECEIVE_POLL_MS = 100;

export interface SegmenterTaskOptions {
  chunks: Channel<Float32Array>;
  segments: Channel<SpeechSegment>;
  segmenter: SpeechSegmenter;
  signal: AbortSignal;
  health: PipelineHealth;
}

/**
 * Moves audio chunks through the segmenter until the signal fires.
 * An inference error ends the task; it is logged and shows up as
 * `segmenter: 'failed'` in the health report.
 */
export async function runSegmenterTask({ chunks, segments, segmenter, signal, health }: SegmenterTaskOptions): Promise<void> {
  health.segmenter = 'running';
  try {
    while (!signal.aborted) {
      const chunk = await chunks.receive(RECEIVE_POLL_MS);
      if (!chunk) continue;

      for (const segment of await segmenter.process(chunk)) {
        logger.info(`[VAD] flush ${segment.reason} ${(segment.samples.length / TARGET_SAMPLE_RATE).toFixed(2)}s`);
        health.segments++;
        segments.push(segment);
      }
    }
    health.segmenter = 'stopped';
  } catch (err) {
    health.segmenter = 'failed';
    logger.error('[VAD] fatal error, segmenter stopped:', err);
  }
}
