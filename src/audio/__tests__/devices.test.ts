import { describe, it, expect, vi } from 'vitest';
import { detectDefaultMonitor, microphoneInputArgs, monitorInputArgs } from '../devices.js';

describe('detectDefaultMonitor', () => {
  it('appends .monitor to the default sink', async () => {
    const run = vi.fn(async () => 'alsa_output.pci-0000_00_1f.3.analog-stereo\n');
    await expect(detectDefaultMonitor(run)).resolves.toBe('alsa_output.pci-0000_00_1f.3.analog-stereo.monitor');
    expect(run).toHaveBeenCalledWith('pactl', ['get-default-sink']);
  });

  it('reports a missing pactl as DEVICE_NOT_FOUND', async () => {
    const run = vi.fn(async (): Promise<string> => {
      throw new Error('spawn pactl ENOENT');
    });
    await expect(detectDefaultMonitor(run)).rejects.toMatchObject({ code: 'DEVICE_NOT_FOUND' });
  });

  it('rejects an empty answer', async () => {
    await expect(detectDefaultMonitor(async () => '  \n')).rejects.toMatchObject({ code: 'DEVICE_NOT_FOUND' });
  });
});

describe('input arguments', () => {
  it('uses pulse on Linux', () => {
    expect(monitorInputArgs('linux', 'sink.monitor')).toEqual(['-f', 'pulse', '-i', 'sink.monitor']);
    expect(microphoneInputArgs('linux', '')).toEqual(['-f', 'pulse', '-i', 'default']);
  });

  it('uses avfoundation on macOS', () => {
    expect(monitorInputArgs('darwin', '2')).toEqual(['-f', 'avfoundation', '-i', ':2']);
    expect(microphoneInputArgs('darwin', '')).toEqual(['-f', 'avfoundation', '-i', ':default']);
    expect(() => monitorInputArgs('darwin', '')).toThrow('monitorDevice');
  });

  it('uses dshow on Windows and requires a device name', () => {
    expect(monitorInputArgs('win32', 'Stereo Mix')).toEqual(['-f', 'dshow', '-i', 'audio=Stereo Mix']);
    expect(microphoneInputArgs('win32', 'Microphone Array')).toEqual(['-f', 'dshow', '-i', 'audio=Microphone Array']);
    expect(() => microphoneInputArgs('win32', '')).toThrow('micDevice');
  });

  it('refuses unsupported platforms', () => {
    expect(() => monitorInputArgs('aix', 'x')).toThrow('not supported on aix');
  });
});
