import OpenAI from 'openai';
import { z } from 'zod';
import type { Direction } from '../languages.js';
import { errorMessage, logger } from '../logger.js';
import { buildSystemPrompt } from './prompts.js';

export interface TranslationResult {
  /** The input with recognition errors and fillers cleaned up. */
  corrected: string;
  translated: string;
}

export interface Translator {
  translate(text: string, direction: Direction): Promise<TranslationResult>;
}

export interface ChatRequest {
  model: string;
  system: string;
  user: string;
}

/** One chat-completion round trip; resolves with the reply text. */
export type CompleteChat = (request: ChatRequest) => Promise<string | null>;

export type TranslationErrorCode = 'REQUEST_FAILED' | 'NO_CONTENT';

export class TranslationError extends Error {
  readonly code: TranslationErrorCode;

  constructor(message: string, code: TranslationErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranslationError';
    this.code = code;
  }
}

const ReplySchema = z.object({
  corrected: z.string().nullish(),
  translated: z.string().nullish(),
});

/**
 * Read a `{corrected, translated}` reply. Anything that is not such an object
 * is taken as the translation itself, with the input as the corrected text.
 */
export function parseTranslationReply(raw: string, input: string): TranslationResult {
  const content = raw.trim();

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return { corrected: input, translated: content };
  }

  const parsed = ReplySchema.safeParse(data);
  if (!parsed.success) {
    return { corrected: input, translated: content };
  }
  return {
    corrected: parsed.data.corrected || input,
    translated: parsed.data.translated ?? '',
  };
}

export function openAiCompletion(client: OpenAI): CompleteChat {
  return async ({ model, system, user }) => {
    const response = await client.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      max_tokens: 400,
      temperature: 0.1,
      response_format: { type: 'json_object' },
    });
    return response.choices[0]?.message.content ?? null;
  };
}

export interface OpenAiTranslatorOptions {
  apiKey: string;
  model: string;
  /** OpenAI-compatible endpoint; empty uses the SDK default. */
  baseUrl?: string;
  complete?: CompleteChat;
}

/** Cleans up and translates ASR text with one chat completion per request. */
export class OpenAiTranslator implements Translator {
  private readonly model: string;
  private readonly complete: CompleteChat;

  constructor(options: OpenAiTranslatorOptions) {
    this.model = options.model;
    this.complete =
      options.complete ??
      openAiCompletion(
        new OpenAI({
          apiKey: options.apiKey,
          baseURL: options.baseUrl || undefined,
          timeout: 30_000,
          maxRetries: 1,
        })
      );
  }

  async translate(text: string, direction: Direction): Promise<TranslationResult> {
    let raw: string | null;
    try {
      raw = await this.complete({ model: this.model, system: buildSystemPrompt(direction), user: text });
    } catch (err) {
      throw new TranslationError(`Translation request failed: ${errorMessage(err)}`, 'REQUEST_FAILED', { cause: err });
    }
    if (raw === null) {
      throw new TranslationError('Translation model returned no content', 'NO_CONTENT');
    }

    const result = parseTranslationReply(raw, text);
    logger.info(`[Translation] corrected=${JSON.stringify(result.corrected)} translated=${JSON.stringify(result.translated)}`);
    return result;
  }
}
