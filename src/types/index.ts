export type SourceKind = 'monitor' | 'mic';

export interface AppConfig {
  asrServer: string;
  asrTimeoutSeconds: number;
  /** Pass the current source language to the ASR server as a hint. */
  sendLanguageHint: boolean;
  source: SourceKind;
  /** Loopback/monitor device; empty means auto-detect the default output. */
  monitorDevice: string;
  /** Microphone device; empty means the platform default input. */
  micDevice: string;
  captureSampleRate: number;
  direction: string;
  openaiApiKey: string;
  translationModel: string;
  translationBaseUrl: string;
  vadModelPath: string;
  ffmpegPath: string;
  heartbeatSeconds: number;
}
