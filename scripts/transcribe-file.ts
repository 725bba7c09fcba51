#!/usr/bin/env tsx
/**
 * Offline run of the subtitle pipeline over an audio file.
 *
 * Usage:
 *   npm run transcribe-file -- <audio-file> [options]
 *
 * Options:
 *   --direction <src→tgt>   Direction for the language hint and translation (default: from config)
 *   --translate             Also translate each transcript
 *   --no-hint               Do not send a language hint to the ASR server
 *
 * Decodes the file with ffmpeg to 16 kHz mono float32, cuts it into speech
 * segments with the VAD, and prints one transcript per segment.
 */

import { config as dotenvConfig } from 'dotenv';
dotenvConfig();

import * as fs from 'fs';
import { spawn } from 'child_process';
import { getConfig } from '../src/config.js';
import { parseDirection, type Direction } from '../src/languages.js';
import { errorMessage } from '../src/logger.js';
import { Float32PcmDecoder } from '../src/audio/pcm.js';
import { CHUNK_SAMPLES, TARGET_SAMPLE_RATE } from '../src/audio/types.js';
import { TranscriptionClient } from '../src/asr/transcription-client.js';
import { MIN_SEGMENT_SAMPLES } from '../src/pipeline/transcription-loop.js';
import { OpenAiTranslator } from '../src/translate/translator.js';
import { SileroVadModel } from '../src/vad/silero-model.js';
import { SpeechSegmenter } from '../src/vad/speech-segmenter.js';
import type { SpeechSegment } from '../src/vad/types.js';

function usage(): never {
  console.log(`Usage: npm run transcribe-file -- <audio-file> [options]

Options:
  --direction <src→tgt>  Direction for the language hint and translation (default: from config)
  --translate            Also translate each transcript
  --no-hint              Do not send a language hint to the ASR server`);
  process.exit(1);
}

interface Options {
  file: string;
  direction: Direction;
  translate: boolean;
  hint: boolean;
}

function parseArgs(argv: string[], defaultDirection: string): Options {
  let file = '';
  let directionText = defaultDirection;
  let translate = false;
  let hint = true;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--direction') {
      directionText = argv[++i] ?? '';
    } else if (arg === '--translate') {
      translate = true;
    } else if (arg === '--no-hint') {
      hint = false;
    } else if (arg.startsWith('--')) {
      console.error(`Unknown option: ${arg}`);
      usage();
    } else {
      file = arg;
    }
  }

  if (!file) usage();
  const direction = parseDirection(directionText);
  if (!direction) {
    console.error(`Invalid direction "${directionText}", expected e.g. en→zh`);
    usage();
  }
  return { file, direction, translate, hint };
}

/** Decode any ffmpeg-readable file to 16 kHz mono float32 samples. */
async function decodeToPcm(ffmpegPath: string, filePath: string): Promise<Float32Array> {
  return new Promise((resolve, reject) => {
    const proc = spawn(ffmpegPath, [
      '-hide_banner',
      '-nostdin',
      '-i', filePath,
      '-ac', '1',
      '-ar', String(TARGET_SAMPLE_RATE),
      '-f', 'f32le',
      'pipe:1',
    ], { stdio: ['ignore', 'pipe', 'pipe'] });

    const decoder = new Float32PcmDecoder();
    const parts: Float32Array[] = [];
    let stderr = '';
    proc.stdout.on('data', (d: Buffer) => { parts.push(decoder.decode(d)); });
    proc.stderr.on('data', (d: Buffer) => { stderr += d.toString(); });

    proc.on('exit', (code) => {
      if (code !== 0) {
        reject(new Error(`ffmpeg exited with code ${code}: ${stderr.trim().split('\n').slice(-3).join(' | ')}`));
        return;
      }
      const total = parts.reduce((sum, part) => sum + part.length, 0);
      const samples = new Float32Array(total);
      let offset = 0;
      for (const part of parts) {
        samples.set(part, offset);
        offset += part.length;
      }
      resolve(samples);
    });

    proc.on('error', reject);
  });
}

async function segmentAudio(model: SileroVadModel, samples: Float32Array): Promise<SpeechSegment[]> {
  const segmenter = new SpeechSegmenter(model);
  const segments: SpeechSegment[] = [];

  for (let offset = 0; offset < samples.length; offset += CHUNK_SAMPLES) {
    segments.push(...(await segmenter.process(samples.subarray(offset, offset + CHUNK_SAMPLES))));
  }
  // One second of silence closes an utterance still open at the end of the file
  segments.push(...(await segmenter.process(new Float32Array(TARGET_SAMPLE_RATE))));

  return segments;
}

async function main(): Promise<void> {
  const config = getConfig();
  const options = parseArgs(process.argv.slice(2), config.direction);

  if (!fs.existsSync(options.file)) {
    console.error(`File not found: ${options.file}`);
    process.exit(1);
  }
  if (options.translate && !config.openaiApiKey) {
    console.error('--translate needs OPENAI_API_KEY');
    process.exit(1);
  }

  console.log(`Decoding ${options.file}...`);
  const samples = await decodeToPcm(config.ffmpegPath, options.file);
  console.log(`  Duration: ${(samples.length / TARGET_SAMPLE_RATE).toFixed(1)}s`);

  const model = await SileroVadModel.load(config.vadModelPath);
  const segments = await segmentAudio(model, samples);
  await model.release();
  console.log(`  ${segments.length} speech segments`);

  const client = new TranscriptionClient({ baseUrl: config.asrServer, timeoutMs: config.asrTimeoutSeconds * 1000 });
  const translator = options.translate
    ? new OpenAiTranslator({
        apiKey: config.openaiApiKey,
        model: config.translationModel,
        baseUrl: config.translationBaseUrl,
      })
    : null;
  const hint = options.hint ? options.direction.source : undefined;

  let failures = 0;
  for (const [index, segment] of segments.entries()) {
    if (segment.samples.length < MIN_SEGMENT_SAMPLES) continue;

    const label = `#${index + 1} (${(segment.samples.length / TARGET_SAMPLE_RATE).toFixed(1)}s, ${segment.reason})`;
    try {
      const { language, text } = await client.transcribe(segment.samples, hint);
      if (!text) continue;
      console.log(`${label} [${language || '?'}] ${text}`);

      if (translator) {
        const { translated } = await translator.translate(text, options.direction);
        console.log(`${' '.repeat(label.length)} » ${translated}`);
      }
    } catch (err) {
      failures++;
      console.error(`${label} failed: ${errorMessage(err)}`);
    }
  }

  console.log(`Done. ${failures} failed segment(s).`);
  if (failures > 0) process.exitCode = 1;
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
