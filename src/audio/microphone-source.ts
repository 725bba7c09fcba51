import { FfmpegCaptureSource, type CaptureOptions } from './capture-source.js';
import { microphoneInputArgs } from './devices.js';

export class MicrophoneSource extends FfmpegCaptureSource {
  readonly kind = 'mic' as const;
  private readonly device: string;

  constructor(device: string, options: CaptureOptions) {
    super(options);
    this.device = device;
  }

  protected async resolveInputArgs(): Promise<string[]> {
    return microphoneInputArgs(this.platform, this.device);
  }
}
