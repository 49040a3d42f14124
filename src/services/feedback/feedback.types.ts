/** Output level before the alert raised it; null when the mixer could not be read. */
export interface VolumeSnapshot {
  level: number | null;
}

export interface AudioOutput {
  readVolume(): Promise<VolumeSnapshot>;
  setMaxVolume(): Promise<void>;
  restoreVolume(snapshot: VolumeSnapshot): Promise<void>;
  /** Plays the clip once; resolves when it ends or `signal` aborts. */
  play(clip: string, signal: AbortSignal): Promise<void>;
}

export interface VibrationOutput {
  available(): boolean;
  vibrate(durationMs: number): Promise<void>;
  cancel(): Promise<void>;
}

export interface AlertingDriverOptions {
  soundFile: string;
  /** off/on/off/on... durations in ms, repeated from the first entry */
  vibrationPattern: readonly number[];
  /** pause between two plays of the clip */
  loopGapMs?: number;
}
