/**
 * Streaming rational-ratio resampler.
 *
 * Conceptually: zero-stuff by `up`, low-pass at the lower of the two Nyquist
 * frequencies, keep every `down`-th sample. Only the taps that land on real
 * input samples are evaluated (polyphase form). Input history is kept between
 * calls, so block boundaries of the capture device leave no discontinuity.
 *
 * Over a whole stream of N input samples it produces exactly ceil(N * up / down)
 * output samples. The filter is causal; the output lags the input by
 * `zeroCrossings` input samples.
 */

/** Filter half-length, in zero crossings of the sinc kernel. */
const DEFAULT_ZERO_CROSSINGS = 16;

function gcd(a: number, b: number): number {
  while (b !== 0) {
    [a, b] = [b, a % b];
  }
  return a;
}

function sinc(x: number): number {
  if (x === 0) return 1;
  const px = Math.PI * x;
  return Math.sin(px) / px;
}

function blackman(n: number, length: number): number {
  const ratio = n / (length - 1);
  return 0.42 - 0.5 * Math.cos(2 * Math.PI * ratio) + 0.08 * Math.cos(4 * Math.PI * ratio);
}

/**
 * Blackman-windowed sinc low-pass at the upsampled rate, with every polyphase
 * branch normalised to unit DC gain.
 */
function designLowPass(up: number, down: number, zeroCrossings: number): Float32Array {
  const factor = Math.max(up, down);
  const length = 2 * zeroCrossings * factor + 1;
  const center = (length - 1) / 2;
  const cutoff = 0.5 / factor;

  const taps = new Float64Array(length);
  for (let n = 0; n < length; n++) {
    taps[n] = 2 * cutoff * sinc(2 * cutoff * (n - center)) * blackman(n, length);
  }

  for (let phase = 0; phase < up; phase++) {
    let sum = 0;
    for (let n = phase; n < length; n += up) sum += taps[n];
    if (sum === 0) continue;
    for (let n = phase; n < length; n += up) taps[n] /= sum;
  }

  return Float32Array.from(taps);
}

export class PolyphaseResampler {
  readonly inputRate: number;
  readonly outputRate: number;
  private readonly up: number;
  private readonly down: number;
  private readonly taps: Float32Array;

  private history = new Float32Array(0);
  /** Absolute input index of history[0]. */
  private historyStart = 0;
  private inputCount = 0;
  private nextOutput = 0;

  constructor(inputRate: number, outputRate: number, zeroCrossings = DEFAULT_ZERO_CROSSINGS) {
    if (!Number.isInteger(inputRate) || !Number.isInteger(outputRate) || inputRate <= 0 || outputRate <= 0) {
      throw new Error(`Sample rates must be positive integers (got ${inputRate} → ${outputRate})`);
    }
    this.inputRate = inputRate;
    this.outputRate = outputRate;

    const divisor = gcd(inputRate, outputRate);
    this.up = outputRate / divisor;
    this.down = inputRate / divisor;
    this.taps = this.passthrough ? new Float32Array(0) : designLowPass(this.up, this.down, zeroCrossings);
  }

  get passthrough(): boolean {
    return this.up === 1 && this.down === 1;
  }

  /** Resample the next block of the stream. */
  process(input: Float32Array): Float32Array {
    if (this.passthrough) {
      return input.slice();
    }

    const merged = new Float32Array(this.history.length + input.length);
    merged.set(this.history);
    merged.set(input, this.history.length);
    this.history = merged;
    this.inputCount += input.length;

    const { up, down, taps } = this;
    const tapCount = taps.length;
    const estimate = Math.ceil(((this.inputCount - this.historyStart) * up) / down) + 1;
    const out = new Float32Array(Math.max(0, estimate));
    let produced = 0;

    for (;;) {
      const position = this.nextOutput * down;
      const newest = Math.floor(position / up);
      if (newest >= this.inputCount) break;
      const oldest = Math.max(0, Math.ceil((position - tapCount + 1) / up));

      let acc = 0;
      for (let i = oldest; i <= newest; i++) {
        acc += taps[position - i * up] * this.history[i - this.historyStart];
      }
      out[produced++] = acc;
      this.nextOutput++;
    }

    // Keep only what the next output still needs
    const nextOldest = Math.max(0, Math.ceil((this.nextOutput * down - tapCount + 1) / up));
    if (nextOldest > this.historyStart) {
      this.history = this.history.slice(nextOldest - this.historyStart);
      this.historyStart = nextOldest;
    }

    return out.slice(0, produced);
  }

  reset(): void {
    this.history = new Float32Array(0);
    this.historyStart = 0;
    this.inputCount = 0;
    this.nextOutput = 0;
  }
}
