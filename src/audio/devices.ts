import { execFile } from 'child_process';
import { promisify } from 'util';
import { AudioSourceError } from './types.js';

const execFileAsync = promisify(execFile);

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

async function runCommand(command: string, args: string[]): Promise<string> {
  const { stdout } = await execFileAsync(command, args, { timeout: 5000 });
  return stdout;
}

/**
 * PulseAudio/PipeWire source that mirrors the default output: `<sink>.monitor`.
 */
export async function detectDefaultMonitor(run: CommandRunner = runCommand): Promise<string> {
  let sink: string;
  try {
    sink = (await run('pactl', ['get-default-sink'])).trim();
  } catch (err) {
    throw new AudioSourceError('Could not query the default output (is pactl installed?)', 'DEVICE_NOT_FOUND', { cause: err });
  }
  if (!sink) {
    throw new AudioSourceError('No default output device reported by pactl', 'DEVICE_NOT_FOUND');
  }
  return `${sink}.monitor`;
}

/** ffmpeg input arguments for a loopback capture. */
export function monitorInputArgs(platform: NodeJS.Platform, device: string): string[] {
  switch (platform) {
    case 'linux':
      return ['-f', 'pulse', '-i', device];
    case 'darwin':
      if (!device) {
        throw new AudioSourceError('macOS loopback capture needs monitorDevice (e.g. a BlackHole device index)', 'DEVICE_NOT_FOUND');
      }
      return ['-f', 'avfoundation', '-i', `:${device}`];
    case 'win32':
      if (!device) {
        throw new AudioSourceError('Windows loopback capture needs monitorDevice (e.g. "Stereo Mix")', 'DEVICE_NOT_FOUND');
      }
      return ['-f', 'dshow', '-i', `audio=${device}`];
    default:
      throw new AudioSourceError(`Audio capture is not supported on ${platform}`, 'DEVICE_NOT_FOUND');
  }
}

/** ffmpeg input arguments for a microphone capture. */
export function microphoneInputArgs(platform: NodeJS.Platform, device: string): string[] {
  switch (platform) {
    case 'linux':
      return ['-f', 'pulse', '-i', device || 'default'];
    case 'darwin':
      return ['-f', 'avfoundation', '-i', `:${device || 'default'}`];
    case 'win32':
      if (!device) {
        throw new AudioSourceError('Windows microphone capture needs micDevice', 'DEVICE_NOT_FOUND');
      }
      return ['-f', 'dshow', '-i', `audio=${device}`];
    default:
      throw new AudioSourceError(`Audio capture is not supported on ${platform}`, 'DEVICE_NOT_FOUND');
  }
}
