/**
 * Log sanitizer: strips API keys and other secrets from all output.
 *
 * OpenAI-style keys match: sk-[\w-]{20,}
 * Errors thrown by the OpenAI SDK and fetch can echo request headers, so
 * bearer Authorization values are redacted too.
 *
 * Uses util.inspect instead of JSON.stringify so typed arrays and circular
 * references print usefully.
 */

import { inspect } from 'util';

const API_KEY_PATTERN = /sk-[\w-]{20,}/g;
const AUTHORIZATION_HEADER_PATTERN = /(?<=Authorization:\s*(?:Bearer\s+)?)(?!Bearer\b)\S+/gi;

// Dynamic secret redaction (for keys of OpenAI-compatible servers, etc.)
const secretFragments: string[] = [];
let secretPattern: RegExp | null = null;

// Set by the worker process so interleaved host/worker output stays readable
let prefix = '';

/** Register a secret value so it is redacted from all log output. */
export function registerSecret(secret: string): void {
  // Only redact strings long enough to be meaningful (avoid redacting common short words)
  if (secret && secret.length >= 8) {
    secretFragments.push(secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
    secretPattern = new RegExp(secretFragments.join('|'), 'g');
  }
}

/** Tag every line written by this process, e.g. `[worker]`. */
export function setLogPrefix(tag: string): void {
  prefix = tag ? `${tag} ` : '';
}

export function sanitize(message: string): string {
  let result = message
    .replace(API_KEY_PATTERN, '[REDACTED_KEY]')
    .replace(AUTHORIZATION_HEADER_PATTERN, '[REDACTED]');
  if (secretPattern) {
    result = result.replace(secretPattern, '[REDACTED]');
  }
  return result;
}

export function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) {
        const stack = arg.stack ?? arg.message;
        return sanitize(stack);
      }
      if (typeof arg === 'string') {
        return sanitize(arg);
      }
      // Long sample buffers would flood the terminal
      return sanitize(inspect(arg, { depth: 3, breakLength: Infinity, maxArrayLength: 16 }));
    })
    .join(' ');
}

/** Message of an unknown throwable, for one-line log entries and wire events. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function timestamp(): string {
  return new Date().toISOString();
}

export const logger = {
  info(...args: unknown[]): void {
    console.log(`${prefix}[${timestamp()}] [INFO]`, formatArgs(args));
  },
  warn(...args: unknown[]): void {
    console.warn(`${prefix}[${timestamp()}] [WARN]`, formatArgs(args));
  },
  error(...args: unknown[]): void {
    console.error(`${prefix}[${timestamp()}] [ERROR]`, formatArgs(args));
  },
  debug(...args: unknown[]): void {
    if (process.env.DEBUG) {
      console.debug(`${prefix}[${timestamp()}] [DEBUG]`, formatArgs(args));
    }
  },
};
