import { CHUNK_SAMPLES } from './types.js';

/** Slices a sample stream into fixed-size chunks, holding back the remainder. */
export class ChunkAccumulator {
  readonly chunkSize: number;
  private buffer = new Float32Array(0);

  constructor(chunkSize: number = CHUNK_SAMPLES) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new Error(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    this.chunkSize = chunkSize;
  }

  /** Append samples; returns every chunk completed by them, oldest first. */
  push(samples: Float32Array): Float32Array[] {
    const merged = new Float32Array(this.buffer.length + samples.length);
    merged.set(this.buffer);
    merged.set(samples, this.buffer.length);

    const chunks: Float32Array[] = [];
    let offset = 0;
    while (merged.length - offset >= this.chunkSize) {
      // slice() copies, so consumers own their chunk
      chunks.push(merged.slice(offset, offset + this.chunkSize));
      offset += this.chunkSize;
    }

    this.buffer = merged.slice(offset);
    return chunks;
  }

  /** Samples held back for the next chunk. */
  get pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = new Float32Array(0);
  }
}
