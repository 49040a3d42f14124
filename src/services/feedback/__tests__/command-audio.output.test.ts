import { beforeEach, describe, expect, it, vi } from 'vitest';

const { execFileMock } = vi.hoisted(() => ({
  execFileMock: vi.fn(),
}));

vi.mock('child_process', () => ({
  execFile: execFileMock,
  spawn: vi.fn(),
}));

import { CommandAudioOutput, parseVolumeLevel } from '@services/feedback/command-audio.output.js';

describe('parseVolumeLevel', () => {
  it('reads the first percentage in the mixer output', () => {
    expect(parseVolumeLevel('Volume: front-left: 41942 /  64% / -11.62 dB,   front-right: 41942 /  64%')).toBe(64);
  });

  it('returns null when there is no percentage', () => {
    expect(parseVolumeLevel('Volume: unknown')).toBeNull();
  });
});

describe('CommandAudioOutput', () => {
  beforeEach(() => {
    execFileMock.mockReset();
    execFileMock.mockImplementation(
      (
        _bin: string,
        _args: string[],
        _options: { timeout?: number },
        callback: (err: Error | null, result: { stdout: string }) => void,
      ) => {
        callback(null, { stdout: 'Volume: 55%' });
      },
    );
  });

  const output = new CommandAudioOutput({
    playerCommand: 'paplay',
    volumeGetCommand: 'pactl get-sink-volume @DEFAULT_SINK@',
    volumeSetCommand: 'pactl set-sink-volume @DEFAULT_SINK@ {level}%',
  });

  it('reads the level through the configured command', async () => {
    expect(await output.readVolume()).toEqual({ level: 55 });
    expect(execFileMock).toHaveBeenCalledWith(
      'pactl',
      ['get-sink-volume', '@DEFAULT_SINK@'],
      { timeout: 3000 },
      expect.any(Function),
    );
  });

  it('bounds every mixer command by the configured timeout', async () => {
    const quick = new CommandAudioOutput({
      playerCommand: 'paplay',
      volumeSetCommand: 'amixer sset Master {level}%',
      commandTimeoutMs: 250,
    });

    await quick.setMaxVolume();

    expect(execFileMock).toHaveBeenCalledWith('amixer', ['sset', 'Master', '100%'], { timeout: 250 }, expect.any(Function));
  });

  it('substitutes the level into the set command', async () => {
    await output.setMaxVolume();
    await output.restoreVolume({ level: 30 });

    expect(execFileMock.mock.calls.map((call) => call[1])).toEqual([
      ['set-sink-volume', '@DEFAULT_SINK@', '100%'],
      ['set-sink-volume', '@DEFAULT_SINK@', '30%'],
    ]);
  });

  it('leaves the volume alone when the prior level is unknown', async () => {
    await output.restoreVolume({ level: null });
    expect(execFileMock).not.toHaveBeenCalled();
  });

  it('reports an unknown level without a get command', async () => {
    const silent = new CommandAudioOutput({ playerCommand: 'paplay' });
    expect(await silent.readVolume()).toEqual({ level: null });
    expect(execFileMock).not.toHaveBeenCalled();
  });
});
