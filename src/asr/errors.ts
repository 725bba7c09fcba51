export type TranscriptionErrorCode = 'HTTP_ERROR' | 'TIMEOUT' | 'BAD_RESPONSE' | 'NETWORK_ERROR';

export class TranscriptionError extends Error {
  readonly code: TranscriptionErrorCode;

  constructor(message: string, code: TranscriptionErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranscriptionError';
    this.code = code;
  }
}

/** Non-2xx answer from the ASR server. */
export class TranscriptionHttpError extends TranscriptionError {
  readonly status: number;
  /** First 200 characters of the response body. */
  readonly bodyExcerpt: string;

  constructor(status: number, bodyExcerpt: string) {
    super(`ASR server responded ${status}${bodyExcerpt ? `: ${bodyExcerpt}` : ''}`, 'HTTP_ERROR');
    this.name = 'TranscriptionHttpError';
    this.status = status;
    this.bodyExcerpt = bodyExcerpt;
  }
}

/**
 * The request outlived its deadline. The transcription loop drops its backlog
 * on this error, since queued segments would only pile onto an overloaded server.
 */
export class TranscriptionTimeoutError extends TranscriptionError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(`ASR request timed out after ${timeoutMs / 1000}s`, 'TIMEOUT', options);
    this.name = 'TranscriptionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class TranscriptionResponseError extends TranscriptionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'BAD_RESPONSE', options);
    this.name = 'TranscriptionResponseError';
  }
}
