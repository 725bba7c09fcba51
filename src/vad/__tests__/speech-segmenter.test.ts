import { describe, it, expect, beforeEach } from 'vitest';
import { SpeechSegmenter } from '../speech-segmenter.js';
import {
  VAD_FRAME_SAMPLES,
  type RecurrentState,
  type SpeechProbabilityModel,
  type SpeechScore,
  type SpeechSegment,
} from '../types.js';

const CHUNK = 8000;
const SAMPLE_RATE = 16000;

/**
 * Calls a frame speech when its mean magnitude exceeds 0.01, and counts
 * frames in h[0] so tests can see whether state was carried.
 */
class EnergyModel implements SpeechProbabilityModel {
  frames = 0;

  async score(frame: Float32Array, state: RecurrentState): Promise<SpeechScore> {
    this.frames++;
    const energy = frame.reduce((sum, v) => sum + Math.abs(v), 0) / frame.length;
    const h = state.h.slice();
    h[0] += 1;
    return { probability: energy > 0.01 ? 0.9 : 0.1, state: { h, c: state.c } };
  }
}

function signal(speechSeconds: number, silenceSeconds: number): Float32Array {
  const speech = Math.round(speechSeconds * SAMPLE_RATE);
  const out = new Float32Array(speech + Math.round(silenceSeconds * SAMPLE_RATE));
  out.fill(0.5, 0, speech);
  return out;
}

async function runChunks(segmenter: SpeechSegmenter, audio: Float32Array): Promise<SpeechSegment[]> {
  const segments: SpeechSegment[] = [];
  for (let offset = 0; offset < audio.length; offset += CHUNK) {
    segments.push(...(await segmenter.process(audio.subarray(offset, offset + CHUNK))));
  }
  return segments;
}

describe('SpeechSegmenter', () => {
  let model: EnergyModel;
  let segmenter: SpeechSegmenter;

  beforeEach(() => {
    model = new EnergyModel();
    segmenter = new SpeechSegmenter(model);
  });

  it('emits one segment for 2 s of speech followed by 1 s of silence', async () => {
    const segments = await runChunks(segmenter, signal(2, 1));

    // 56 speech frames (the last one partly speech) + 14 trailing silent frames
    expect(segments).toHaveLength(1);
    expect(segments[0].reason).toBe('silence');
    expect(segments[0].frames).toBe(70);
    expect(segments[0].samples.length).toBe(70 * VAD_FRAME_SAMPLES);
    expect(segments[0].samples[0]).toBe(0.5);
    expect(segmenter.bufferedFrames).toBe(0);
  });

  it('cuts 12 s of speech at the 8 s cap and flushes the rest on silence', async () => {
    const segments = await runChunks(segmenter, signal(12, 1));

    expect(segments.map((s) => [s.reason, s.samples.length])).toEqual([
      ['max', 222 * VAD_FRAME_SAMPLES],
      ['silence', 126 * VAD_FRAME_SAMPLES],
    ]);
    expect(segments[0].samples.length / SAMPLE_RATE).toBeCloseTo(8, 0);
    expect(segments[1].samples.length / SAMPLE_RATE).toBeCloseTo(4.5, 1);
  });

  it('never emits a segment longer than the cap', async () => {
    const segments = await runChunks(segmenter, signal(30, 0));
    expect(segments).toHaveLength(3);
    expect(segments.every((s) => s.frames <= 222)).toBe(true);
  });

  it('ignores silence when nothing is buffered', async () => {
    const segments = await runChunks(segmenter, signal(0, 3));
    expect(segments).toEqual([]);
    expect(segmenter.bufferedFrames).toBe(0);
  });

  it('carries the sub-frame remainder into the next chunk', async () => {
    await segmenter.process(new Float32Array(1000));
    expect(model.frames).toBe(1);
    await segmenter.process(new Float32Array(152));
    expect(model.frames).toBe(2);
  });

  it('keeps the recurrent state across flushes', async () => {
    await runChunks(segmenter, signal(2, 1));
    // 48000 samples → 83 whole frames, all scored against the carried state
    expect(model.frames).toBe(83);
    expect(segmenter.recurrentState.h[0]).toBe(83);
  });

  it('resets the silence counter on speech', async () => {
    const audio = new Float32Array(CHUNK * 4);
    // speech, 10 silent frames, speech again, then long silence
    audio.fill(0.5, 0, 10 * VAD_FRAME_SAMPLES);
    audio.fill(0.5, 20 * VAD_FRAME_SAMPLES, 30 * VAD_FRAME_SAMPLES);

    const segments = await runChunks(segmenter, audio);
    expect(segments).toHaveLength(1);
    expect(segments[0].frames).toBe(44);
  });

  it('honours custom thresholds', async () => {
    const strict = new SpeechSegmenter(new EnergyModel(), { threshold: 0.95, silenceFrames: 2, maxFrames: 10 });
    expect(await runChunks(strict, signal(2, 1))).toEqual([]);

    const short = new SpeechSegmenter(new EnergyModel(), { silenceFrames: 2, maxFrames: 10 });
    const segments = await runChunks(short, signal(1, 1));
    // 28 speech frames: two capped segments, then 8 + 2 silent frames
    expect(segments.map((s) => [s.reason, s.frames])).toEqual([
      ['max', 10],
      ['max', 10],
      ['silence', 10],
    ]);
  });

  it('propagates model failures', async () => {
    const failing = new SpeechSegmenter({
      score: async () => {
        throw new Error('inference failed');
      },
    });
    await expect(failing.process(new Float32Array(CHUNK))).rejects.toThrow('inference failed');
  });
});
