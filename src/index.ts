#!/usr/bin/env node
import { createInterface } from 'readline';
import { HELP_TEXT, formatEvent, parseInputLine } from './cli.js';
import { getConfig, validateConfig } from './config.js';
import { logger } from './logger.js';
import { WorkerHost } from './worker/worker-host.js';
import { formatCommand, type WorkerEvent } from './worker/protocol.js';

const config = getConfig();
const host = new WorkerHost();
const input = createInterface({ input: process.stdin, terminal: false });

// --- Worker events ---

host.on('event', (event: WorkerEvent) => {
  if ('health' in event) {
    const { health } = event;
    const failed = (['segmenter', 'transcriber', 'capture'] as const).filter((stage) => health[stage] === 'failed');
    if (failed.length > 0) {
      logger.warn(`Pipeline degraded: ${failed.join(', ')} failed`);
    }
    logger.debug('Health:', health);
    return;
  }

  const line = formatEvent(event);
  if (line) process.stdout.write(`${line}\n`);
});

host.on('exit', (code: number | null) => {
  if (isShuttingDown) return;
  logger.error(`Worker exited unexpectedly (code=${code})`);
  input.close();
  process.exit(code || 1);
});

// --- Graceful shutdown ---

let isShuttingDown = false;

async function gracefulShutdown(reason: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`${reason} -- stopping pipeline...`);
  input.close();

  let exitCode = 0;
  try {
    exitCode = (await host.stop()) ?? 0;
  } catch (err) {
    logger.error('Error during shutdown:', err);
    exitCode = 1;
  }

  process.exit(exitCode);
}

process.on('SIGTERM', () => void gracefulShutdown('Received SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('Received SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection:', reason);
});

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception:', err);
  void gracefulShutdown('Uncaught exception');
});

// --- Commands from the terminal ---

input.on('line', (line) => {
  if (!line.trim()) return;

  const action = parseInputLine(line);
  if (!action) {
    process.stdout.write(`Unknown command "${line.trim()}"\n${HELP_TEXT}\n`);
    return;
  }

  switch (action.type) {
    case 'help':
      process.stdout.write(`${HELP_TEXT}\n`);
      return;
    case 'stop':
      void gracefulShutdown('Quit requested');
      return;
    default:
      host.send(formatCommand(action));
  }
});

// --- Startup ---

function main(): void {
  const problems = validateConfig(config);
  if (problems.length > 0) {
    for (const problem of problems) logger.error(`Config: ${problem}`);
    process.exit(1);
  }

  logger.info('Realtime subtitles starting...');
  logger.info(`  ASR server: ${config.asrServer}`);
  logger.info(`  Source: ${config.source}, direction: ${config.direction}`);
  logger.info(`  Translation model: ${config.translationModel}`);

  host.start(config);
  process.stdout.write(`${HELP_TEXT}\n`);
}

main();
