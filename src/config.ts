import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import type { AppConfig, SourceKind } from './types/index.js';
import { registerSecret } from './logger.js';
import { isKnownLanguage, parseDirection } from './languages.js';

dotenvConfig();

const ConfigFileSchema = z.record(z.unknown());

/** config.json is optional; environment variables and defaults cover a bare checkout. */
function loadConfigFile(): Record<string, unknown> {
  const configPath = path.resolve(process.cwd(), 'config.json');
  if (!fs.existsSync(configPath)) {
    return {};
  }
  const raw = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Failed to parse config.json: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error('config.json must contain a JSON object');
  }
  return result.data;
}

function validatePositiveNumber(value: unknown, name: string, fallback: number): number {
  if (typeof value === 'number' && value > 0) return value;
  if (value !== undefined && value !== null) {
    console.warn(`[WARN] config.json: ${name} should be a positive number, using default ${fallback}`);
  }
  return fallback;
}

function stringSetting(envValue: string | undefined, fileValue: unknown, fallback: string): string {
  if (envValue !== undefined && envValue !== '') return envValue;
  if (typeof fileValue === 'string') return fileValue;
  return fallback;
}

function parseSource(value: string): SourceKind {
  return value === 'mic' ? 'mic' : 'monitor';
}

/**
 * Build an AppConfig from a parsed config.json object and an environment.
 * Environment variables win over the file for every key they cover.
 */
export function parseConfig(
  file: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  return {
    asrServer: stringSetting(env.ASR_SERVER, file.asrServer, 'http://localhost:8000'),
    asrTimeoutSeconds: validatePositiveNumber(file.asrTimeoutSeconds, 'asrTimeoutSeconds', 45),
    sendLanguageHint: file.sendLanguageHint !== false,
    source: parseSource(stringSetting(env.AUDIO_SOURCE, file.source, 'monitor')),
    monitorDevice: stringSetting(env.MONITOR_DEVICE, file.monitorDevice, ''),
    micDevice: stringSetting(env.MIC_DEVICE, file.micDevice, ''),
    captureSampleRate: validatePositiveNumber(file.captureSampleRate, 'captureSampleRate', 48000),
    direction: stringSetting(env.DIRECTION, file.direction, 'en→zh'),
    // Secrets only come from the environment
    openaiApiKey: env.OPENAI_API_KEY ?? '',
    translationModel: stringSetting(env.TRANSLATION_MODEL, file.translationModel, 'gpt-4o-mini'),
    translationBaseUrl: stringSetting(env.OPENAI_BASE_URL, file.translationBaseUrl, ''),
    vadModelPath: stringSetting(env.VAD_MODEL_PATH, file.vadModelPath, './models/silero_vad_v6.onnx'),
    ffmpegPath: stringSetting(env.FFMPEG_PATH, file.ffmpegPath, 'ffmpeg'),
    heartbeatSeconds: validatePositiveNumber(file.heartbeatSeconds, 'heartbeatSeconds', 5),
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/** Problems that make the pipeline unable to start. Empty when the config is usable. */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!isHttpUrl(config.asrServer)) {
    errors.push(`asrServer must be an http(s) URL, got "${config.asrServer}"`);
  }

  if (config.translationBaseUrl && !isHttpUrl(config.translationBaseUrl)) {
    errors.push(`translationBaseUrl must be an http(s) URL, got "${config.translationBaseUrl}"`);
  }

  const direction = parseDirection(config.direction);
  if (!direction) {
    errors.push(`direction must look like "en→zh", got "${config.direction}"`);
  } else {
    // Unknown codes still go to the ASR server and translator as-is
    for (const code of [direction.source, direction.target]) {
      if (!isKnownLanguage(code)) {
        console.warn(`[WARN] direction: unknown language code "${code}"`);
      }
    }
  }

  if (!config.openaiApiKey) {
    errors.push('Missing OPENAI_API_KEY environment variable (required for translation)');
  }

  if (config.captureSampleRate < 8000 || config.captureSampleRate > 192000) {
    errors.push('captureSampleRate must be between 8000 and 192000');
  }

  if (!config.vadModelPath.trim()) {
    errors.push('vadModelPath must not be empty');
  }

  return errors;
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (_config) return _config;

  _config = parseConfig(loadConfigFile());

  // Register secrets for log redaction
  if (_config.openaiApiKey) registerSecret(_config.openaiApiKey);

  return _config;
}
