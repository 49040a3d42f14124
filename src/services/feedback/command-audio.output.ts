import { execFile, spawn } from 'child_process';
import { promisify } from 'util';

import type { AudioOutput, VolumeSnapshot } from './feedback.types.js';

const run = promisify(execFile);

export interface CommandAudioOptions {
  /** e.g. `paplay` or `afplay`; receives the clip path as its only argument */
  playerCommand: string;
  /** prints the current level, e.g. `pactl get-sink-volume @DEFAULT_SINK@` */
  volumeGetCommand?: string;
  /** `{level}` is replaced by 0..100, e.g. `pactl set-sink-volume @DEFAULT_SINK@ {level}%` */
  volumeSetCommand?: string;
  /** mixer commands are killed after this long */
  commandTimeoutMs?: number;
}

function split(command: string): [string, string[]] {
  const [bin = '', ...args] = command.trim().split(/\s+/);
  return [bin, args];
}

export function parseVolumeLevel(output: string): number | null {
  const match = /(\d{1,3})%/.exec(output);
  if (!match?.[1]) return null;
  const level = Number(match[1]);
  return Number.isFinite(level) ? level : null;
}

/** Drives the host's audio stack through its command-line player and mixer. */
export class CommandAudioOutput implements AudioOutput {
  constructor(private readonly options: CommandAudioOptions) {}

  private get timeoutMs(): number {
    return this.options.commandTimeoutMs ?? 3000;
  }

  async readVolume(): Promise<VolumeSnapshot> {
    if (!this.options.volumeGetCommand) return { level: null };
    const [bin, args] = split(this.options.volumeGetCommand);
    const { stdout } = await run(bin, args, { timeout: this.timeoutMs });
    return { level: parseVolumeLevel(stdout) };
  }

  async setMaxVolume(): Promise<void> {
    await this.setLevel(100);
  }

  async restoreVolume(snapshot: VolumeSnapshot): Promise<void> {
    if (snapshot.level === null) return;
    await this.setLevel(snapshot.level);
  }

  play(clip: string, signal: AbortSignal): Promise<void> {
    const [bin, args] = split(this.options.playerCommand);
    return new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const child = spawn(bin, [...args, clip], { stdio: 'ignore', signal });
      child.once('error', (err) => {
        if (err.name === 'AbortError') resolve();
        else reject(err);
      });
      child.once('exit', (code, sig) => {
        if (code === 0 || signal.aborted || sig !== null) resolve();
        else reject(new Error(`${bin} exited with code ${code}`));
      });
    });
  }

  private async setLevel(level: number): Promise<void> {
    if (!this.options.volumeSetCommand) return;
    const [bin, args] = split(this.options.volumeSetCommand);
    await run(
      bin,
      args.map((arg) => arg.replace('{level}', String(level))),
      { timeout: this.timeoutMs },
    );
  }
}
