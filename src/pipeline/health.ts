export type StageStatus = 'running' | 'stopped' | 'failed';

/** Live counters and stage states, read by the health heartbeat. */
export interface PipelineHealth {
  segmenter: StageStatus;
  transcriber: StageStatus;
  capture: StageStatus;
  /** Segments emitted by the segmenter. */
  segments: number;
  /** Transcripts accepted (non-empty and not a repeat). */
  transcripts: number;
}

export function createPipelineHealth(): PipelineHealth {
  return {
    segmenter: 'stopped',
    transcriber: 'stopped',
    capture: 'stopped',
    segments: 0,
    transcripts: 0,
  };
}
