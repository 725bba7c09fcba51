import { MicrophoneSource } from '../audio/microphone-source.js';
import { MonitorSource } from '../audio/monitor-source.js';
import type { AudioSource, AudioSourceError } from '../audio/types.js';
import { TranscriptionClient } from '../asr/transcription-client.js';
import { OpenAiTranslator } from '../translate/translator.js';
import type { SourceKind } from '../types/index.js';
import { SileroVadModel } from '../vad/silero-model.js';
import type { PipelineDependencies } from './control-loop.js';
import type { WorkerConfig } from './protocol.js';

export function createAudioSource(
  kind: SourceKind,
  config: Pick<WorkerConfig, 'ffmpegPath' | 'captureSampleRate' | 'monitorDevice' | 'micDevice'>,
  onError: (err: AudioSourceError) => void
): AudioSource {
  const options = { ffmpegPath: config.ffmpegPath, sampleRate: config.captureSampleRate, onError };
  return kind === 'monitor'
    ? new MonitorSource(config.monitorDevice, options)
    : new MicrophoneSource(config.micDevice, options);
}

/** Real collaborators for the control loop. Loading the VAD model is the only slow step. */
export async function createPipelineDependencies(
  config: WorkerConfig,
  apiKey: string
): Promise<PipelineDependencies & { vadModel: SileroVadModel }> {
  const vadModel = await SileroVadModel.load(config.vadModelPath);

  return {
    createSource: (kind, onError) => createAudioSource(kind, config, onError),
    vadModel,
    transcriber: new TranscriptionClient({
      baseUrl: config.asrServer,
      timeoutMs: config.asrTimeoutSeconds * 1000,
    }),
    translator: new OpenAiTranslator({
      apiKey,
      model: config.translationModel,
      baseUrl: config.translationBaseUrl,
    }),
  };
}
