import { describe, it, expect, vi } from 'vitest';
import { buildSystemPrompt } from '../prompts.js';
import { OpenAiTranslator, TranslationError, parseTranslationReply, type ChatRequest } from '../translator.js';

describe('parseTranslationReply', () => {
  it('reads a JSON reply', () => {
    expect(parseTranslationReply('{"corrected": "Hello.", "translated": "你好。"}', 'hello um')).toEqual({
      corrected: 'Hello.',
      translated: '你好。',
    });
  });

  it('falls back to the input when corrected is missing or empty', () => {
    expect(parseTranslationReply('{"translated": "你好"}', 'hello')).toEqual({ corrected: 'hello', translated: '你好' });
    expect(parseTranslationReply('{"corrected": "", "translated": "你好"}', 'hello')).toEqual({ corrected: 'hello', translated: '你好' });
  });

  it('defaults a missing translation to an empty string', () => {
    expect(parseTranslationReply('{"corrected": "Hello."}', 'hello')).toEqual({ corrected: 'Hello.', translated: '' });
  });

  it('uses the raw reply as the translation when it is not JSON', () => {
    expect(parseTranslationReply('  你好，世界  ', 'hello world')).toEqual({ corrected: 'hello world', translated: '你好，世界' });
  });

  it('uses the raw reply when the JSON is not an object of strings', () => {
    expect(parseTranslationReply('"你好"', 'hello')).toEqual({ corrected: 'hello', translated: '"你好"' });
    expect(parseTranslationReply('{"translated": 3}', 'hello')).toEqual({ corrected: 'hello', translated: '{"translated": 3}' });
  });
});

describe('buildSystemPrompt', () => {
  it('uses the Chinese-language prompt for en→zh', () => {
    const prompt = buildSystemPrompt({ source: 'en', target: 'zh' });
    expect(prompt).toContain('繁體中文（台灣口語）');
    expect(prompt).toContain('{"corrected": "校正後英文", "translated": "繁體中文翻譯"}');
  });

  it('lists Chinese fillers for zh→en', () => {
    const prompt = buildSystemPrompt({ source: 'zh', target: 'en' });
    expect(prompt).toContain('痾、阿、喔、嗯、啊、那個、就是、對對對、然後、所以說');
    expect(prompt).toContain('conversational English');
  });

  it('fills in language names for other pairs', () => {
    const prompt = buildSystemPrompt({ source: 'ja', target: 'de' });
    expect(prompt).toContain('raw 日本語 text');
    expect(prompt).toContain('into Deutsch, keeping it natural');
  });

  it('falls back to the code for unknown languages', () => {
    expect(buildSystemPrompt({ source: 'xx', target: 'en' })).toContain('raw xx text');
  });
});

describe('OpenAiTranslator', () => {
  it('sends the pair prompt and the text, and parses the reply', async () => {
    const complete = vi.fn(async (_request: ChatRequest) => '{"corrected": "Hello.", "translated": "你好。"}');
    const translator = new OpenAiTranslator({ apiKey: 'test-secret', model: 'gpt-4o-mini', complete });

    const result = await translator.translate('hello uh', { source: 'en', target: 'zh' });

    expect(result).toEqual({ corrected: 'Hello.', translated: '你好。' });
    expect(complete).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      system: buildSystemPrompt({ source: 'en', target: 'zh' }),
      user: 'hello uh',
    });
  });

  it('wraps request failures in TranslationError', async () => {
    const translator = new OpenAiTranslator({
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      complete: async () => {
        throw new Error('503 Service Unavailable');
      },
    });

    const err = await translator.translate('hi', { source: 'en', target: 'zh' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TranslationError);
    expect(err).toMatchObject({ code: 'REQUEST_FAILED', message: 'Translation request failed: 503 Service Unavailable' });
  });

  it('rejects a reply without content', async () => {
    const translator = new OpenAiTranslator({ apiKey: 'test-secret', model: 'gpt-4o-mini', complete: async () => null });
    await expect(translator.translate('hi', { source: 'en', target: 'zh' })).rejects.toMatchObject({ code: 'NO_CONTENT' });
  });
});
