import type { MessageBus } from '@infra/bus/message-bus.js';

import type { VibrationOutput } from './feedback.types.js';

/**
 * The station has no motor of its own; each pulse is forwarded to the
 * operator client, which vibrates the handheld.
 */
export class BusVibrationOutput implements VibrationOutput {
  constructor(private readonly bus: MessageBus) {}

  available(): boolean {
    return true;
  }

  async vibrate(durationMs: number): Promise<void> {
    await this.bus.publish('feedback.vibrate', { durationMs });
  }

  async cancel(): Promise<void> {
    await this.bus.publish('feedback.vibrate', { durationMs: 0 });
  }
}
