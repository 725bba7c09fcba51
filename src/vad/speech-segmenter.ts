import {
  VAD_FRAME_SAMPLES,
  initialRecurrentState,
  type FlushReason,
  type RecurrentState,
  type SpeechProbabilityModel,
  type SpeechSegment,
} from './types.js';

export interface SegmenterOptions {
  /** Probability at or above which a frame counts as speech. */
  threshold?: number;
  /** Consecutive silent frames that end an utterance (14 ≈ 0.5 s). */
  silenceFrames?: number;
  /** Frames after which the buffer is flushed regardless (222 ≈ 8 s). */
  maxFrames?: number;
}

const DEFAULTS: Required<SegmenterOptions> = {
  threshold: 0.5,
  silenceFrames: 14,
  maxFrames: 222,
};

/**
 * Turns a stream of audio chunks into speech segments.
 *
 * Chunks are cut into 576-sample frames (the remainder carries over) and each
 * frame is scored against the detector's recurrent state. Speech frames start
 * or extend an utterance; silent frames extend an open utterance and end it
 * after `silenceFrames` in a row. Utterances are also cut at `maxFrames`.
 *
 * The recurrent state survives flushes so the onset of the next utterance is
 * scored with context.
 */
export class SpeechSegmenter {
  private readonly model: SpeechProbabilityModel;
  private readonly options: Required<SegmenterOptions>;

  private state: RecurrentState = initialRecurrentState();
  private leftover = new Float32Array(0);
  private frames: Float32Array[] = [];
  private silenceCount = 0;

  constructor(model: SpeechProbabilityModel, options: SegmenterOptions = {}) {
    this.model = model;
    this.options = { ...DEFAULTS, ...options };
  }

  /** Feed one chunk; returns the segments it completed, oldest first. */
  async process(chunk: Float32Array): Promise<SpeechSegment[]> {
    const audio = new Float32Array(this.leftover.length + chunk.length);
    audio.set(this.leftover);
    audio.set(chunk, this.leftover.length);

    const frameCount = Math.floor(audio.length / VAD_FRAME_SAMPLES);
    this.leftover = audio.slice(frameCount * VAD_FRAME_SAMPLES);

    const segments: SpeechSegment[] = [];
    for (let i = 0; i < frameCount; i++) {
      const frame = audio.slice(i * VAD_FRAME_SAMPLES, (i + 1) * VAD_FRAME_SAMPLES);
      const { probability, state } = await this.model.score(frame, this.state);
      this.state = state;

      if (probability >= this.options.threshold) {
        this.frames.push(frame);
        this.silenceCount = 0;
      } else if (this.frames.length > 0) {
        this.frames.push(frame);
        this.silenceCount++;
        if (this.silenceCount >= this.options.silenceFrames) {
          segments.push(this.flush('silence'));
        }
      }

      if (this.frames.length >= this.options.maxFrames) {
        segments.push(this.flush('max'));
      }
    }

    return segments;
  }

  /** Frames in the open utterance. */
  get bufferedFrames(): number {
    return this.frames.length;
  }

  get recurrentState(): RecurrentState {
    return this.state;
  }

  private flush(reason: FlushReason): SpeechSegment {
    const samples = new Float32Array(this.frames.length * VAD_FRAME_SAMPLES);
    this.frames.forEach((frame, i) => samples.set(frame, i * VAD_FRAME_SAMPLES));
    const segment: SpeechSegment = { samples, reason, frames: this.frames.length };

    this.frames = [];
    this.silenceCount = 0;
    return segment;
  }
}
