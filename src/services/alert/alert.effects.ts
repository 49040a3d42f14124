import type { OrderAlert } from '@core/interfaces/index.js';

import type { MessageBus } from '@infra/bus/message-bus.js';

import type { ActionRelay } from '@services/relay/action.relay.js';

import { logger } from '@utils/logger.js';

import type { Effect } from './state.types.js';

export interface FeedbackControl {
  start(alert: OrderAlert): boolean;
  stop(): Promise<void>;
}

/**
 * Carries out what a committed transition asked for. One failing effect is
 * logged and does not keep the rest from running.
 */
export class AlertEffects {
  constructor(
    private readonly feedback: FeedbackControl,
    private readonly bus: MessageBus,
    private readonly relay: ActionRelay,
  ) {}

  async run(effects: readonly Effect[]): Promise<void> {
    for (const effect of effects) {
      try {
        await this.runOne(effect);
      } catch (err) {
        logger.error('[receiver] effect failed', { effect: effect.type, err });
      }
    }
  }

  private async runOne(effect: Effect): Promise<void> {
    switch (effect.type) {
      case 'START_FEEDBACK':
        this.feedback.start(effect.alert);
        return;
      case 'STOP_FEEDBACK':
        // the release runs external mixer commands; transitions do not wait on it
        this.feedback.stop().catch((err: unknown) => {
          logger.error('[driver] release failed', { err });
        });
        return;
      case 'PRESENT_SURFACE':
        await this.bus.publish('surface.present', { alert: effect.alert });
        return;
      case 'REFRESH_SURFACE':
        await this.bus.publish('surface.refresh', { alert: effect.alert });
        return;
      case 'CLOSE_SURFACE':
        await this.bus.publish('surface.close', { orderId: effect.orderId });
        return;
      case 'RELAY_DECISION': {
        const outcome = await this.relay.relay(effect.orderId, effect.decision, effect.alert);
        logger.info('[decision] relayed', { orderId: effect.orderId, decision: effect.decision, outcome });
        return;
      }
    }
  }
}
