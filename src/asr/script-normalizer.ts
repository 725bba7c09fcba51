import { Converter, type ConverterFunction } from 'opencc-js';

const CHINESE_LANGUAGE_NAMES = ['chinese', 'mandarin', 'cantonese'];
const CHINESE_LANGUAGE_CODES = new Set(['zh', 'yue']);
const CJK_UNIFIED_IDEOGRAPH = /[\u4e00-\u9fff]/;

let toTaiwanTraditional: ConverterFunction | null = null;

/** Whether an ASR result should be treated as Chinese, by label or by content. */
export function isChinese(language: string, text: string): boolean {
  const label = language.trim().toLowerCase();
  if (CHINESE_LANGUAGE_NAMES.some((name) => label.includes(name))) return true;
  if (CHINESE_LANGUAGE_CODES.has(label.split(/[-_]/)[0])) return true;
  return CJK_UNIFIED_IDEOGRAPH.test(text);
}

/** Simplified → Traditional (Taiwan), including regional phrase substitution. */
export function toTraditional(text: string): string {
  // Dictionaries are large; build the converter on first use
  toTaiwanTraditional ??= Converter({ from: 'cn', to: 'twp' });
  return toTaiwanTraditional(text);
}

export function normalizeScript(text: string, language: string): string {
  return isChinese(language, text) ? toTraditional(text) : text;
}
