/**
 * Wire format between the host process and the pipeline worker.
 *
 * Commands travel host → worker as plain strings; events travel worker → host
 * as small JSON objects. Both ends validate what they receive.
 */

import { z } from 'zod';
import { formatDirection, parseDirection, type Direction } from '../languages.js';

// ── Commands ───────────────────────────────────────────────

const SET_DIRECTION_PREFIX = 'set_direction:';

export type WorkerCommand =
  | { type: 'toggle' }
  | { type: 'switch_source' }
  | { type: 'stop' }
  | { type: 'set_direction'; direction: Direction };

/** Wire string → command. Returns null for anything unrecognised or malformed. */
export function parseCommand(raw: string): WorkerCommand | null {
  const command = raw.trim();
  if (command === 'toggle' || command === 'switch_source' || command === 'stop') {
    return { type: command };
  }

  if (command.startsWith(SET_DIRECTION_PREFIX)) {
    const direction = parseDirection(command.slice(SET_DIRECTION_PREFIX.length));
    return direction ? { type: 'set_direction', direction } : null;
  }

  return null;
}

export function formatCommand(command: WorkerCommand): string {
  return command.type === 'set_direction'
    ? `${SET_DIRECTION_PREFIX}${formatDirection(command.direction)}`
    : command.type;
}

// ── Events ─────────────────────────────────────────────────

const StageStatusSchema = z.enum(['running', 'stopped', 'failed']);

export const HealthReportSchema = z.object({
  sessionId: z.string(),
  segmenter: StageStatusSchema,
  transcriber: StageStatusSchema,
  capture: StageStatusSchema,
  eventLoopLagMs: z.number().nullable(),
  segments: z.number().int().nonnegative(),
  transcripts: z.number().int().nonnegative(),
});

export type HealthReport = z.infer<typeof HealthReportSchema>;

export const WorkerEventSchema = z.union([
  z.object({ original: z.string(), translated: z.string() }).strict(),
  z.object({ direction: z.string() }).strict(),
  z.object({ source: z.enum(['monitor', 'mic']) }).strict(),
  z.object({ error: z.string(), fatal: z.boolean() }).strict(),
  z.object({ health: HealthReportSchema }).strict(),
]);

export type WorkerEvent = z.infer<typeof WorkerEventSchema>;

export function parseEvent(message: unknown): WorkerEvent | null {
  const result = WorkerEventSchema.safeParse(message);
  return result.success ? result.data : null;
}

// ── Worker configuration (argv[2]) ─────────────────────────

/**
 * Everything the worker needs except the API key, which travels in the
 * child's environment so it never shows up in a process listing.
 */
export const WorkerConfigSchema = z.object({
  asrServer: z.string().url(),
  asrTimeoutSeconds: z.number().positive(),
  sendLanguageHint: z.boolean(),
  source: z.enum(['monitor', 'mic']),
  monitorDevice: z.string(),
  micDevice: z.string(),
  captureSampleRate: z.number().int().min(8000).max(192000),
  direction: z.string().refine((value) => parseDirection(value) !== null, {
    message: 'direction must look like "en→zh"',
  }),
  translationModel: z.string().min(1),
  translationBaseUrl: z.string(),
  vadModelPath: z.string().min(1),
  ffmpegPath: z.string().min(1),
  heartbeatSeconds: z.number().positive(),
});

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;
