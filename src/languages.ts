/**
 * Supported recognition/translation languages and direction strings.
 *
 * A direction is written `<src>→<tgt>`, e.g. `en→zh`.
 */

export interface Language {
  code: string;
  /** Human name, used in translation prompts. */
  name: string;
}

export interface Direction {
  source: string;
  target: string;
}

// Order matters: presentation layers list them as-is
export const LANGUAGES: readonly Language[] = [
  { code: 'zh', name: '中文' },
  { code: 'en', name: 'English' },
  { code: 'yue', name: '廣東話' },
  { code: 'ja', name: '日本語' },
  { code: 'ko', name: '한국어' },
  { code: 'ar', name: 'Arabic' },
  { code: 'de', name: 'Deutsch' },
  { code: 'fr', name: 'Français' },
  { code: 'es', name: 'Español' },
  { code: 'pt', name: 'Português' },
  { code: 'id', name: 'Indonesia' },
  { code: 'it', name: 'Italiano' },
  { code: 'ru', name: 'Русский' },
  { code: 'th', name: 'ไทย' },
  { code: 'vi', name: 'Tiếng Việt' },
  { code: 'tr', name: 'Türkçe' },
  { code: 'hi', name: 'हिन्दी' },
  { code: 'ms', name: 'Malay' },
  { code: 'nl', name: 'Nederlands' },
  { code: 'sv', name: 'Svenska' },
  { code: 'da', name: 'Dansk' },
  { code: 'fi', name: 'Suomi' },
  { code: 'pl', name: 'Polski' },
  { code: 'cs', name: 'Čeština' },
  { code: 'fil', name: 'Filipino' },
  { code: 'fa', name: 'فارسی' },
  { code: 'el', name: 'Ελληνικά' },
  { code: 'hu', name: 'Magyar' },
  { code: 'mk', name: 'Македонски' },
  { code: 'ro', name: 'Română' },
];

export const DEFAULT_DIRECTION: Direction = { source: 'en', target: 'zh' };

const DIRECTION_SEPARATOR = '→';

const languageNames = new Map(LANGUAGES.map((lang) => [lang.code, lang.name]));

/** Human name for a code, or the code itself when unknown. */
export function languageName(code: string): string {
  return languageNames.get(code) ?? code;
}

export function isKnownLanguage(code: string): boolean {
  return languageNames.has(code);
}

/** 'en→zh' → { source: 'en', target: 'zh' }. Returns null when malformed. */
export function parseDirection(direction: string): Direction | null {
  const parts = direction.split(DIRECTION_SEPARATOR);
  if (parts.length !== 2) return null;
  const source = parts[0].trim();
  const target = parts[1].trim();
  if (!source || !target) return null;
  return { source, target };
}

export function formatDirection(direction: Direction): string {
  return `${direction.source}${DIRECTION_SEPARATOR}${direction.target}`;
}

export function swapDirection(direction: Direction): Direction {
  return { source: direction.target, target: direction.source };
}
