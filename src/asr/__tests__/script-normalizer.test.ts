import { describe, it, expect } from 'vitest';
import { isChinese, normalizeScript } from '../script-normalizer.js';

describe('isChinese', () => {
  it('recognises Chinese language names', () => {
    expect(isChinese('Chinese', 'ni hao')).toBe(true);
    expect(isChinese('Mandarin', '')).toBe(true);
    expect(isChinese('cantonese', '')).toBe(true);
  });

  it('recognises Chinese language codes', () => {
    expect(isChinese('zh', '')).toBe(true);
    expect(isChinese('zh-CN', '')).toBe(true);
    expect(isChinese('yue', '')).toBe(true);
  });

  it('falls back to looking for CJK ideographs', () => {
    expect(isChinese('', '这是')).toBe(true);
    expect(isChinese('English', 'hello 世界')).toBe(true);
    expect(isChinese('English', 'hello world')).toBe(false);
    expect(isChinese('Japanese', 'こんにちは')).toBe(false);
  });
});

describe('normalizeScript', () => {
  it('converts Simplified to Traditional for Chinese results', () => {
    expect(normalizeScript('简体中文', 'Chinese')).toBe('簡體中文');
    expect(normalizeScript('汉语', '')).toBe('漢語');
  });

  it('leaves other languages untouched', () => {
    expect(normalizeScript('hello world', 'English')).toBe('hello world');
  });
});
