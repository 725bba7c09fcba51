import { readFile } from 'fs/promises';
import * as ort from 'onnxruntime-web';
import { logger } from '../logger.js';
import {
  VAD_FRAME_SAMPLES,
  VAD_STATE_SIZE,
  type RecurrentState,
  type SpeechProbabilityModel,
  type SpeechScore,
} from './types.js';

/**
 * Silero VAD (v6 ONNX export) on the onnxruntime WASM backend.
 *
 * Inputs: `input` [1, 576], `h` and `c` [1, 1, 128].
 * Outputs: `speech_probs`, `hn`, `cn`.
 */
export class SileroVadModel implements SpeechProbabilityModel {
  private readonly session: ort.InferenceSession;

  private constructor(session: ort.InferenceSession) {
    this.session = session;
  }

  static async load(modelPath: string): Promise<SileroVadModel> {
    const bytes = await readFile(modelPath);

    // One frame at a time; worker threads would only add latency
    ort.env.wasm.numThreads = 1;

    const session = await ort.InferenceSession.create(
      new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength),
      { executionProviders: ['wasm'] }
    );
    logger.info(`Silero VAD loaded from ${modelPath} (inputs: ${session.inputNames.join(', ')})`);
    return new SileroVadModel(session);
  }

  async score(frame: Float32Array, state: RecurrentState): Promise<SpeechScore> {
    if (frame.length !== VAD_FRAME_SAMPLES) {
      throw new Error(`Silero VAD expects ${VAD_FRAME_SAMPLES}-sample frames, got ${frame.length}`);
    }

    const feeds: Record<string, ort.Tensor> = {
      input: new ort.Tensor('float32', frame, [1, VAD_FRAME_SAMPLES]),
      h: new ort.Tensor('float32', state.h, [1, 1, VAD_STATE_SIZE]),
      c: new ort.Tensor('float32', state.c, [1, 1, VAD_STATE_SIZE]),
    };
    const results = await this.session.run(feeds);

    return {
      probability: float32Output(results, 'speech_probs')[0],
      state: {
        h: float32Output(results, 'hn').slice(),
        c: float32Output(results, 'cn').slice(),
      },
    };
  }

  async release(): Promise<void> {
    await this.session.release();
  }
}

function float32Output(results: ort.InferenceSession.OnnxValueMapType, name: string): Float32Array {
  const tensor = results[name];
  if (!tensor || !(tensor.data instanceof Float32Array)) {
    throw new Error(`Silero VAD: missing float32 output "${name}"`);
  }
  return tensor.data;
}
