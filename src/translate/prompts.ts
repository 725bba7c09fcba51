import { languageName, type Direction } from '../languages.js';

const FILLERS_ZH = '痾、阿、喔、嗯、啊、那個、就是、對對對、然後、所以說';
const FILLERS_EN = 'um, uh, like, you know, so, right, basically';

const EN_TO_ZH = [
  '你是即時字幕翻譯員。輸入是語音辨識（ASR）產生的原始英文文字。',
  '請完成兩件事，並以 JSON 回傳：',
  `1. corrected：修正同音字與辨識錯誤，刪除沒有意義的語氣詞（如 ${FILLERS_EN}），輸出通順的英文`,
  '2. translated：把校正後的文字翻成繁體中文（台灣口語），依中文語序重新組句',
  '回傳格式：{"corrected": "校正後英文", "translated": "繁體中文翻譯"}',
].join('\n');

const ZH_TO_EN = [
  'You are a real-time subtitle translator. The input is raw Chinese text from speech recognition (ASR).',
  'Do two things and answer in JSON:',
  `1. corrected: fix homophones and misrecognised words, drop filler words (${FILLERS_ZH}, ${FILLERS_EN}), output clean Traditional Chinese`,
  '2. translated: translate the corrected text into natural, conversational English',
  'Answer format: {"corrected": "corrected Chinese", "translated": "English translation"}',
].join('\n');

function genericPrompt(sourceName: string, targetName: string): string {
  return [
    `You are a real-time subtitle translator. The input is raw ${sourceName} text from speech recognition (ASR).`,
    'Do two things and answer in JSON:',
    `1. corrected: fix recognition errors, drop filler words, output clean ${sourceName}`,
    `2. translated: translate the corrected text into ${targetName}, keeping it natural`,
    `Answer format: {"corrected": "corrected ${sourceName}", "translated": "${targetName} translation"}`,
  ].join('\n');
}

/** System prompt for one translation direction. */
export function buildSystemPrompt(direction: Direction): string {
  if (direction.source === 'en' && direction.target === 'zh') return EN_TO_ZH;
  if (direction.source === 'zh' && direction.target === 'en') return ZH_TO_EN;
  return genericPrompt(languageName(direction.source), languageName(direction.target));
}
