import type { Decision } from '@core/interfaces/index.js';

import type { MessageBus, Unsubscribe } from '@infra/bus/message-bus.js';

import { logger } from '@utils/logger.js';

import type { AlertEffects } from './alert.effects.js';
import type { AlertTransitions } from './alert.transitions.js';

export type CaptureOutcome = 'relayed' | 'stale' | 'dismissed';

/**
 * Turns a decision captured on the surface into state: DECIDED first, then
 * IDLE once the surface is closed. Feedback release is not awaited. A dismiss
 * that lands in between wins.
 */
export class DecisionHandler {
  private unsubscribe: Unsubscribe | null = null;

  constructor(
    private readonly transitions: AlertTransitions,
    private readonly effects: AlertEffects,
  ) {}

  listen(bus: MessageBus): void {
    if (this.unsubscribe) return;
    this.unsubscribe = bus.subscribe('decision.captured', async ({ orderId, decision }) => {
      await this.capture(orderId, decision);
    });
  }

  dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  async capture(orderId: string, decision: Decision): Promise<CaptureOutcome> {
    const decided = this.transitions.apply({ type: 'DECIDE', orderId, decision });
    if (decided.outcome !== 'decided') {
      logger.warn('[decision] order is no longer ringing, decision dropped', { orderId, decision });
      return 'stale';
    }
    await this.effects.run(decided.effects);

    const claimed = this.transitions.apply({ type: 'CLAIM', orderId });
    if (claimed.outcome !== 'claimed') {
      logger.info('[decision] dismissed before relay, decision dropped', { orderId, decision });
      return 'dismissed';
    }
    await this.effects.run(claimed.effects);
    return 'relayed';
  }
}
