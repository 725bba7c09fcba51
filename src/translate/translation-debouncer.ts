import { formatDirection, swapDirection, type Direction } from '../languages.js';
import { errorMessage, logger } from '../logger.js';
import type { TranslationState } from './translation-state.js';
import type { Translator } from './translator.js';

const SENTENCE_ENDINGS = new Set(['.', '?', '!', '。', '？', '！']);
const DEFAULT_DEBOUNCE_MS = 400;

export interface TranslationUpdate {
  corrected: string;
  translated: string;
  /** Direction the request was made in, e.g. `en→zh`. */
  direction: string;
  sequence: number;
}

export type TranslationCallback = (update: TranslationUpdate) => void;

/**
 * Rate-limits translation of a transcript that keeps changing.
 *
 * Text ending in a sentence terminator is sent at once; anything else waits
 * until the transcript has been stable for `debounceMs`. Requests are not
 * cancelled, so completions can arrive out of order: a result whose sequence
 * number is not the newest dispatched one is dropped.
 */
export class TranslationDebouncer {
  private readonly state: TranslationState;
  private readonly translator: Translator;
  private readonly onResult: TranslationCallback;
  private readonly debounceMs: number;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private closed = false;

  constructor(
    state: TranslationState,
    translator: Translator,
    onResult: TranslationCallback,
    debounceMs: number = DEFAULT_DEBOUNCE_MS
  ) {
    this.state = state;
    this.translator = translator;
    this.onResult = onResult;
    this.debounceMs = debounceMs;
  }

  /** Call with the full current transcript whenever it changes. */
  update(text: string): void {
    if (this.closed || text === this.state.pendingText) return;
    this.state.pendingText = text;
    this.cancelTimer();

    if (text.length > 0 && SENTENCE_ENDINGS.has(text[text.length - 1])) {
      this.dispatch(text);
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.dispatch(this.state.pendingText);
    }, this.debounceMs);
  }

  /** Swap source and target; returns the new direction string. */
  toggleDirection(): string {
    this.state.direction = swapDirection(this.state.direction);
    this.state.lastTranslated = '';
    return formatDirection(this.state.direction);
  }

  setDirection(direction: Direction): string {
    this.state.direction = { ...direction };
    this.state.lastTranslated = '';
    return formatDirection(this.state.direction);
  }

  get direction(): string {
    return formatDirection(this.state.direction);
  }

  /** Cancel the pending timer. Requests already sent finish, but their results are discarded. */
  shutdown(): void {
    this.closed = true;
    this.cancelTimer();
  }

  /** Resolves once every request sent so far has settled. */
  async idle(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  private dispatch(text: string): void {
    if (!text || text === this.state.lastTranslated) return;

    this.state.lastTranslated = text;
    const sequence = ++this.state.sequence;
    const direction = { ...this.state.direction };

    const task: Promise<void> = this.run(text, direction, sequence).finally(() => this.inFlight.delete(task));
    this.inFlight.add(task);
  }

  private async run(text: string, direction: Direction, sequence: number): Promise<void> {
    try {
      const { corrected, translated } = await this.translator.translate(text, direction);

      if (sequence !== this.state.sequence) {
        logger.debug(`[Translation] stale (seq=${sequence} vs ${this.state.sequence}), discarded`);
        return;
      }
      if (this.closed) {
        logger.debug(`[Translation] seq=${sequence} finished after shutdown, discarded`);
        return;
      }

      this.onResult({ corrected, translated, direction: formatDirection(direction), sequence });
    } catch (err) {
      logger.warn(`[Translation error] ${errorMessage(err)}`);
    }
  }

  private cancelTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
