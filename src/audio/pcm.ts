const BYTES_PER_SAMPLE = 4;

/**
 * Decodes a byte stream of little-endian float32 samples (ffmpeg `f32le`).
 * Pipe reads are not sample-aligned, so a partial sample is carried over to
 * the next call.
 */
export class Float32PcmDecoder {
  private carry: Buffer = Buffer.alloc(0);

  decode(bytes: Buffer): Float32Array {
    const data = this.carry.length > 0 ? Buffer.concat([this.carry, bytes]) : bytes;
    const sampleCount = Math.floor(data.length / BYTES_PER_SAMPLE);
    const usable = sampleCount * BYTES_PER_SAMPLE;

    const samples = new Float32Array(sampleCount);
    for (let i = 0; i < sampleCount; i++) {
      samples[i] = data.readFloatLE(i * BYTES_PER_SAMPLE);
    }

    this.carry = Buffer.from(data.subarray(usable));
    return samples;
  }

  reset(): void {
    this.carry = Buffer.alloc(0);
  }
}

/** Raw bytes of a sample buffer in the platform's byte order. */
export function float32ToBytes(samples: Float32Array): Buffer {
  return Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength);
}
