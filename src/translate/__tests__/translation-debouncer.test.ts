import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Direction } from '../../languages.js';
import { TranslationDebouncer, type TranslationUpdate } from '../translation-debouncer.js';
import { createTranslationState, type TranslationState } from '../translation-state.js';
import type { TranslationResult, Translator } from '../translator.js';

interface PendingCall {
  text: string;
  direction: Direction;
  resolve: (result: TranslationResult) => void;
  reject: (err: Error) => void;
}

/** Translator whose calls complete only when the test says so. */
class ManualTranslator implements Translator {
  readonly calls: PendingCall[] = [];

  translate(text: string, direction: Direction): Promise<TranslationResult> {
    return new Promise((resolve, reject) => {
      this.calls.push({ text, direction, resolve, reject });
    });
  }

  complete(index: number, translated = `T(${this.calls[index].text})`): void {
    this.calls[index].resolve({ corrected: this.calls[index].text, translated });
  }
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('TranslationDebouncer', () => {
  let state: TranslationState;
  let translator: ManualTranslator;
  let results: TranslationUpdate[];
  let debouncer: TranslationDebouncer;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    state = createTranslationState({ source: 'en', target: 'zh' });
    translator = new ManualTranslator();
    results = [];
    debouncer = new TranslationDebouncer(state, translator, (update) => results.push(update));
  });

  afterEach(() => {
    debouncer.shutdown();
    vi.useRealTimers();
  });

  it('translates immediately when the text ends a sentence', () => {
    debouncer.update('Good morning.');
    expect(translator.calls.map((c) => c.text)).toEqual(['Good morning.']);

    debouncer.update('早安。');
    expect(translator.calls).toHaveLength(2);
  });

  it('waits until the text has been stable for 400 ms', () => {
    debouncer.update('hello');
    vi.advanceTimersByTime(399);
    debouncer.update('hello world');
    vi.advanceTimersByTime(399);
    expect(translator.calls).toHaveLength(0);

    vi.advanceTimersByTime(1);
    expect(translator.calls.map((c) => c.text)).toEqual(['hello world']);
  });

  it('ignores an update identical to the pending text', () => {
    debouncer.update('hello');
    vi.advanceTimersByTime(300);
    debouncer.update('hello');
    vi.advanceTimersByTime(100);
    expect(translator.calls).toHaveLength(1);
  });

  it('delivers only the newest result when completions arrive out of order', async () => {
    debouncer.update('one.');
    debouncer.update('two.');
    translator.complete(1);
    await flush();

    debouncer.update('three.');
    translator.complete(0);
    await flush();
    translator.complete(2);
    await flush();

    expect(results.map((r) => [r.sequence, r.translated])).toEqual([
      [2, 'T(two.)'],
      [3, 'T(three.)'],
    ]);
  });

  it('does not re-send text that was just translated', () => {
    debouncer.update('hello');
    vi.advanceTimersByTime(400);
    debouncer.update('hello there');
    debouncer.update('hello');
    vi.advanceTimersByTime(400);

    expect(translator.calls.map((c) => c.text)).toEqual(['hello']);
  });

  it('re-sends the same text after the direction changes', () => {
    debouncer.update('hello');
    vi.advanceTimersByTime(400);
    debouncer.update('hello there');
    debouncer.toggleDirection();
    debouncer.update('hello');
    vi.advanceTimersByTime(400);

    expect(translator.calls.map((c) => [c.text, c.direction])).toEqual([
      ['hello', { source: 'en', target: 'zh' }],
      ['hello', { source: 'zh', target: 'en' }],
    ]);
  });

  it('toggling twice restores the original direction', () => {
    expect(debouncer.toggleDirection()).toBe('zh→en');
    expect(debouncer.toggleDirection()).toBe('en→zh');
    expect(debouncer.direction).toBe('en→zh');
    expect(state.lastTranslated).toBe('');
  });

  it('setDirection replaces the direction and clears the cache', () => {
    debouncer.update('Hi.');
    expect(state.lastTranslated).toBe('Hi.');

    expect(debouncer.setDirection({ source: 'ja', target: 'en' })).toBe('ja→en');
    expect(state.direction).toEqual({ source: 'ja', target: 'en' });
    expect(state.lastTranslated).toBe('');
  });

  it('reports the direction snapshot taken at dispatch', async () => {
    debouncer.update('Hi.');
    debouncer.toggleDirection();
    translator.complete(0);
    await flush();

    expect(results).toEqual([{ corrected: 'Hi.', translated: 'T(Hi.)', direction: 'en→zh', sequence: 1 }]);
  });

  it('logs and drops translator failures', async () => {
    debouncer.update('Hi.');
    translator.calls[0].reject(new Error('rate limited'));
    await flush();
    expect(results).toEqual([]);

    debouncer.update('Bye.');
    translator.complete(1);
    await flush();
    expect(results.map((r) => r.translated)).toEqual(['T(Bye.)']);
  });

  it('cancels the timer and discards late results on shutdown', async () => {
    debouncer.update('Hi.');
    debouncer.update('pending');
    debouncer.shutdown();
    vi.advanceTimersByTime(1000);
    expect(translator.calls).toHaveLength(1);

    translator.complete(0);
    await debouncer.idle();
    expect(results).toEqual([]);
  });

  it('skips empty text', () => {
    debouncer.update('hello');
    debouncer.update('');
    vi.advanceTimersByTime(400);
    expect(translator.calls).toHaveLength(0);
  });
});
