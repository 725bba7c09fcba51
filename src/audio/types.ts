import type { SourceKind } from '../types/index.js';

/** Sample rate every stage after capture works in. */
export const TARGET_SAMPLE_RATE = 16000;

/** 0.5 s at 16 kHz. */
export const CHUNK_SAMPLES = 8000;

export type ChunkCallback = (chunk: Float32Array) => void;

/**
 * A continuous capture of one device, delivering 16 kHz mono chunks of
 * exactly CHUNK_SAMPLES samples.
 */
export interface AudioSource {
  readonly kind: SourceKind;
  readonly running: boolean;
  /** Resolves once the device delivers audio; rejects with AudioSourceError otherwise. */
  start(onChunk: ChunkCallback): Promise<void>;
  /** Idempotent; safe without a prior start. */
  stop(): Promise<void>;
}

export type AudioSourceErrorCode =
  | 'ALREADY_RUNNING'
  | 'DEVICE_NOT_FOUND'
  | 'DEVICE_OPEN_FAILED'
  | 'FFMPEG_NOT_FOUND'
  | 'CAPTURE_FAILED';

export class AudioSourceError extends Error {
  readonly code: AudioSourceErrorCode;

  constructor(message: string, code: AudioSourceErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AudioSourceError';
    this.code = code;
  }
}
