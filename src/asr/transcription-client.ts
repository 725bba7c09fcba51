import { z } from 'zod';
import { float32ToBytes } from '../audio/pcm.js';
import { errorMessage, logger } from '../logger.js';
import {
  TranscriptionError,
  TranscriptionHttpError,
  TranscriptionResponseError,
  TranscriptionTimeoutError,
} from './errors.js';
import { normalizeScript } from './script-normalizer.js';

const DEFAULT_TIMEOUT_MS = 45_000;
const BODY_EXCERPT_LENGTH = 200;

const TranscriptResponseSchema = z.object({
  language: z.string().nullish(),
  text: z.string().nullish(),
});

export interface TranscriptResult {
  language: string;
  text: string;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface TranscriptionClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}

/**
 * One-shot client for the speech recognition server.
 *
 * Sends a whole 16 kHz float32 segment to `POST /api/transcribe` and returns
 * `{language, text}`, with Chinese text converted to Traditional (Taiwan).
 */
export class TranscriptionClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: TranscriptionClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  endpoint(languageHint?: string): string {
    const url = `${this.baseUrl}/api/transcribe`;
    return languageHint ? `${url}?language=${encodeURIComponent(languageHint)}` : url;
  }

  async transcribe(samples: Float32Array, languageHint?: string): Promise<TranscriptResult> {
    const url = this.endpoint(languageHint);
    const signal = AbortSignal.timeout(this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/octet-stream' },
        body: new Blob([float32ToBytes(samples)]),
        signal,
      });
    } catch (err) {
      throw this.wrapTransportError(err);
    }

    if (!response.ok) {
      let body = '';
      try {
        body = await response.text();
      } catch (err) {
        logger.debug('ASR: could not read error body:', err);
      }
      throw new TranscriptionHttpError(response.status, body.trim().slice(0, BODY_EXCERPT_LENGTH));
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      if (isTimeout(err)) throw new TranscriptionTimeoutError(this.timeoutMs, { cause: err });
      throw new TranscriptionResponseError('ASR server returned a body that is not JSON', { cause: err });
    }

    const parsed = TranscriptResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TranscriptionResponseError(`ASR response has an unexpected shape: ${parsed.error.message}`);
    }

    const language = parsed.data.language ?? '';
    const text = normalizeScript((parsed.data.text ?? '').trim(), language);
    logger.debug(`ASR: ${(samples.length / 16000).toFixed(2)}s → lang=${language} text=${JSON.stringify(text)}`);
    return { language, text };
  }

  private wrapTransportError(err: unknown): TranscriptionError {
    if (isTimeout(err)) {
      return new TranscriptionTimeoutError(this.timeoutMs, { cause: err });
    }
    return new TranscriptionError(`ASR request to ${this.baseUrl} failed: ${errorMessage(err)}`, 'NETWORK_ERROR', { cause: err });
  }
}
