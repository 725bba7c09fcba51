import { describe, it, expect, beforeEach } from 'vitest';
import { ChunkAccumulator } from '../chunker.js';
import { Float32PcmDecoder, float32ToBytes } from '../pcm.js';

function ramp(start: number, length: number): Float32Array {
  return Float32Array.from({ length }, (_, i) => start + i);
}

describe('ChunkAccumulator', () => {
  let chunker: ChunkAccumulator;

  beforeEach(() => {
    chunker = new ChunkAccumulator();
  });

  it('holds samples back until a full chunk is available', () => {
    expect(chunker.push(ramp(0, 5000))).toEqual([]);
    expect(chunker.pending).toBe(5000);
  });

  it('emits exactly sized chunks and keeps the remainder', () => {
    chunker.push(ramp(0, 5000));
    const chunks = chunker.push(ramp(5000, 12000));

    expect(chunks).toHaveLength(2);
    expect(chunks.every((c) => c.length === 8000)).toBe(true);
    expect(chunks[0][0]).toBe(0);
    expect(chunks[1][0]).toBe(8000);
    expect(chunks[1][7999]).toBe(15999);
    expect(chunker.pending).toBe(1000);

    const next = chunker.push(ramp(17000, 7000));
    expect(next).toHaveLength(1);
    expect(next[0][0]).toBe(16000);
    expect(chunker.pending).toBe(0);
  });

  it('returns chunks that do not alias its buffer', () => {
    const [chunk] = chunker.push(ramp(0, 8000));
    chunk[0] = 42;
    const [again] = new ChunkAccumulator().push(ramp(0, 8000));
    expect(again[0]).toBe(0);
  });

  it('drops the remainder on reset', () => {
    chunker.push(ramp(0, 300));
    chunker.reset();
    expect(chunker.pending).toBe(0);
  });

  it('supports custom chunk sizes', () => {
    const small = new ChunkAccumulator(4);
    expect(small.push(ramp(0, 10)).map((c) => Array.from(c))).toEqual([
      [0, 1, 2, 3],
      [4, 5, 6, 7],
    ]);
    expect(() => new ChunkAccumulator(0)).toThrow('positive integer');
  });
});

describe('Float32PcmDecoder', () => {
  it('decodes whole samples and carries partial ones over', () => {
    const decoder = new Float32PcmDecoder();
    const bytes = Buffer.alloc(12);
    bytes.writeFloatLE(0.5, 0);
    bytes.writeFloatLE(-0.25, 4);
    bytes.writeFloatLE(1, 8);

    expect(Array.from(decoder.decode(bytes.subarray(0, 6)))).toEqual([0.5]);
    expect(Array.from(decoder.decode(bytes.subarray(6)))).toEqual([-0.25, 1]);
  });

  it('round-trips through float32ToBytes', () => {
    const samples = Float32Array.from([0.125, -0.5]);
    expect(Array.from(new Float32PcmDecoder().decode(float32ToBytes(samples)))).toEqual([0.125, -0.5]);
  });
});
