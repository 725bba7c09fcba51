import { logger } from '../logger.js';
import { FfmpegCaptureSource, type CaptureOptions } from './capture-source.js';
import { detectDefaultMonitor, monitorInputArgs } from './devices.js';

/** Loopback capture of what the machine is playing. */
export class MonitorSource extends FfmpegCaptureSource {
  readonly kind = 'monitor' as const;
  private readonly device: string;
  private readonly detect: () => Promise<string>;

  constructor(device: string, options: CaptureOptions, detect: () => Promise<string> = () => detectDefaultMonitor()) {
    super(options);
    this.device = device;
    this.detect = detect;
  }

  protected async resolveInputArgs(): Promise<string[]> {
    let device = this.device;
    if (!device && this.platform === 'linux') {
      device = await this.detect();
      logger.info(`Monitor source: using default output monitor ${device}`);
    }
    return monitorInputArgs(this.platform, device);
  }
}
