/**
 * Pipeline worker process. Forked by WorkerHost with its configuration as
 * JSON in argv[2] and the OpenAI key in OPENAI_API_KEY.
 */

import { parseDirection } from '../languages.js';
import { errorMessage, logger, registerSecret, setLogPrefix } from '../logger.js';
import { getEventLoopLagMs, startMonitoring, stopMonitoring } from '../monitoring.js';
import { Channel } from '../utils/channel.js';
import { WorkerControlLoop } from './control-loop.js';
import { createPipelineDependencies } from './pipeline-factory.js';
import { WorkerConfigSchema, type WorkerConfig, type WorkerEvent } from './protocol.js';

setLogPrefix('[worker]');

const EXIT_FLUSH_MS = 100;

function send(event: WorkerEvent): void {
  if (!process.send) return;
  process.send(event, undefined, {}, (err: Error | null) => {
    if (err) logger.warn(`Could not deliver event to host: ${err.message}`);
  });
}

/** Exit once the IPC channel has had a moment to flush the last events. */
function exitSoon(code: number): void {
  setTimeout(() => process.exit(code), EXIT_FLUSH_MS);
}

function readConfig(raw: string | undefined): WorkerConfig {
  if (!raw) throw new Error('Worker started without a configuration argument');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Worker configuration is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const result = WorkerConfigSchema.safeParse(json);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new Error(`Invalid worker configuration: ${problems.join('; ')}`);
  }
  return result.data;
}

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection:', reason);
});

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception:', err);
  send({ error: `Worker crashed: ${err.message}`, fatal: true });
  exitSoon(1);
});

// The host stops us through the command channel; a Ctrl-C in the shared
// terminal reaches us too and must not cut teardown short
process.on('SIGINT', () => logger.debug('SIGINT ignored, waiting for stop command'));

async function main(): Promise<void> {
  if (!process.send) {
    throw new Error('worker-main must be started by WorkerHost (no IPC channel)');
  }

  const config = readConfig(process.argv[2]);
  const apiKey = process.env.OPENAI_API_KEY ?? '';
  if (!apiKey) throw new Error('Missing OPENAI_API_KEY environment variable (required for translation)');
  registerSecret(apiKey);

  const direction = parseDirection(config.direction);
  if (!direction) throw new Error(`Invalid direction "${config.direction}"`);

  const commands = new Channel<string>();
  process.on('message', (message: unknown) => {
    if (typeof message === 'string') {
      commands.push(message);
    } else {
      logger.warn('Ignoring non-string command from host:', message);
    }
  });
  process.on('disconnect', () => commands.close());

  let deps: Awaited<ReturnType<typeof createPipelineDependencies>>;
  try {
    deps = await createPipelineDependencies(config, apiKey);
  } catch (err) {
    throw new Error(`Could not load the VAD model: ${errorMessage(err)}`, { cause: err });
  }

  startMonitoring();
  const loop = new WorkerControlLoop(
    deps,
    {
      source: config.source,
      direction,
      sendLanguageHint: config.sendLanguageHint,
      heartbeatMs: config.heartbeatSeconds * 1000,
      sampleLag: getEventLoopLagMs,
    },
    commands,
    send
  );
  logger.info(`Worker session ${loop.sessionId} starting (ASR ${config.asrServer}, model ${config.translationModel})`);

  const exitCode = await loop.run();

  stopMonitoring();
  await deps.vadModel.release();
  exitSoon(exitCode);
}

main().catch((err) => {
  logger.error('Fatal worker error:', err);
  send({ error: errorMessage(err), fatal: true });
  exitSoon(1);
});
