/** 36 ms at 16 kHz; the frame size the recurrent detector was trained on. */
export const VAD_FRAME_SAMPLES = 576;

export const VAD_STATE_SIZE = 128;

/** Hidden and cell tensors of the detector, shape [1, 1, 128] each. */
export interface RecurrentState {
  h: Float32Array;
  c: Float32Array;
}

export interface SpeechScore {
  probability: number;
  state: RecurrentState;
}

/** Anything that can score one 576-sample frame given the carried state. */
export interface SpeechProbabilityModel {
  score(frame: Float32Array, state: RecurrentState): Promise<SpeechScore>;
}

export type FlushReason = 'silence' | 'max';

export interface SpeechSegment {
  samples: Float32Array;
  reason: FlushReason;
  /** Number of VAD frames in the segment. */
  frames: number;
}

export function initialRecurrentState(): RecurrentState {
  return {
    h: new Float32Array(VAD_STATE_SIZE),
    c: new Float32Array(VAD_STATE_SIZE),
  };
}
