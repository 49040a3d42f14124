import { setTimeout as sleep } from 'timers/promises';

import type { OrderAlert } from '@core/interfaces/index.js';

import { logger } from '@utils/logger.js';

import type {
  AlertingDriverOptions,
  AudioOutput,
  VibrationOutput,
  VolumeSnapshot,
} from './feedback.types.js';

function isAbort(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * Loud ring + vibration for the active alert. At most one feedback session
 * runs at a time; `start` while active is a no-op and `stop` is idempotent.
 */
export class AlertingDriver {
  private active = false;
  private controller: AbortController | null = null;
  private session: Promise<void> = Promise.resolve();

  constructor(
    private readonly audio: AudioOutput,
    private readonly vibration: VibrationOutput,
    private readonly options: AlertingDriverOptions,
  ) {}

  start(alert: OrderAlert): boolean {
    if (this.active) {
      logger.debug('[driver] session already active', { orderId: alert.orderId });
      return false;
    }
    this.active = true;
    const controller = new AbortController();
    this.controller = controller;

    // the previous session must hand the output back before we take it again
    const previous = this.session;
    this.session = previous
      .then(() => this.run(alert, controller.signal))
      .catch((err: unknown) => {
        logger.error('[driver] session failed', { orderId: alert.orderId, err });
      });
    logger.info('[driver] feedback started', { orderId: alert.orderId });
    return true;
  }

  /** Resolves once the output channel is back at its prior configuration. */
  async stop(): Promise<void> {
    if (this.active) {
      this.active = false;
      this.controller?.abort();
      this.controller = null;
      logger.info('[driver] feedback stopped');
    }
    await this.session;
  }

  private async run(alert: OrderAlert, signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    await Promise.all([this.ring(alert, signal), this.vibrate(alert, signal)]);
  }

  private async ring(alert: OrderAlert, signal: AbortSignal): Promise<void> {
    let prior: VolumeSnapshot | null = null;
    try {
      try {
        prior = await this.audio.readVolume();
      } catch (err) {
        logger.warn('[driver] cannot read output volume, ringing at current level', {
          orderId: alert.orderId,
          err,
        });
      }
      if (prior?.level === null) {
        logger.warn('[driver] output level unknown, ringing at current level', { orderId: alert.orderId });
        prior = null;
      }
      if (prior) {
        await this.audio.setMaxVolume();
      }
      while (!signal.aborted) {
        await this.audio.play(this.options.soundFile, signal);
        if (!signal.aborted) {
          await sleep(this.options.loopGapMs ?? 0, undefined, { signal });
        }
      }
    } catch (err) {
      if (!isAbort(err)) {
        logger.warn('[driver] audio unavailable, alert continues silently', {
          orderId: alert.orderId,
          err,
        });
      }
    } finally {
      if (prior) {
        await this.release(prior);
      }
    }
  }

  private async release(prior: VolumeSnapshot): Promise<void> {
    try {
      await this.audio.restoreVolume(prior);
    } catch (err) {
      logger.error('[driver] failed to restore output volume', { err });
    }
  }

  private async vibrate(alert: OrderAlert, signal: AbortSignal): Promise<void> {
    const pattern = this.options.vibrationPattern;
    if (!this.vibration.available() || pattern.every((ms) => ms === 0)) return;

    try {
      while (!signal.aborted) {
        for (let i = 0; i < pattern.length && !signal.aborted; i++) {
          const duration = pattern[i] ?? 0;
          if (i % 2 === 1 && duration > 0) {
            await this.vibration.vibrate(duration);
          }
          await sleep(duration, undefined, { signal });
        }
      }
    } catch (err) {
      if (!isAbort(err)) {
        logger.warn('[driver] vibration unavailable', { orderId: alert.orderId, err });
      }
    } finally {
      try {
        await this.vibration.cancel();
      } catch (err) {
        logger.warn('[driver] failed to cancel vibration', { err });
      }
    }
  }
}
