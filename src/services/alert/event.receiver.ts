import type { EventKind } from '@core/interfaces/index.js';

import { logger } from '@utils/logger.js';

import type { AlertEffects } from './alert.effects.js';
import type { AlertTransitions } from './alert.transitions.js';
import { classifyEvent, decode, dismissTarget } from './payload.codec.js';
import type { AlertEvent, TransitionOutcome } from './state.types.js';

export type EventOutcome =
  | 'started'
  | 'replaced'
  | 'refreshed'
  | 'duplicate'
  | 'stale'
  | 'dismissed'
  | 'ignored'
  | 'invalid';

function toEventOutcome(outcome: TransitionOutcome): EventOutcome {
  // decide/claim never come through the receiver
  if (outcome === 'decided' || outcome === 'claimed') return 'ignored';
  return outcome;
}

/** Entry point for delivery-channel events. */
export class EventReceiver {
  constructor(
    private readonly transitions: AlertTransitions,
    private readonly effects: AlertEffects,
  ) {}

  /** Classifies by the payload's own `type` field, then handles it. */
  async receive(raw: unknown, receivedAt: Date = new Date()): Promise<EventOutcome> {
    const kind = classifyEvent(raw);
    if (kind === 'ignored') {
      logger.debug('[receiver] ignoring event of unknown type');
      return 'ignored';
    }
    return this.onEvent(raw, kind, receivedAt);
  }

  async onEvent(raw: unknown, kind: EventKind, receivedAt: Date = new Date()): Promise<EventOutcome> {
    let event: AlertEvent;
    if (kind === 'dismiss') {
      event = { type: 'DISMISS', orderId: dismissTarget(raw) };
    } else {
      const decoded = decode(raw, receivedAt);
      if (!decoded.ok) {
        logger.warn('[receiver] dropping undecodable event', {
          reason: decoded.error.reason,
          message: decoded.error.message,
        });
        return 'invalid';
      }
      event = { type: 'INCOMING', alert: decoded.value };
    }

    const result = this.transitions.apply(event);
    const outcome = toEventOutcome(result.outcome);
    logger.info(`[receiver] ${kind} ${outcome}`, {
      orderId: event.type === 'INCOMING' ? event.alert.orderId : event.orderId,
      version: result.state.version,
    });
    await this.effects.run(result.effects);
    return outcome;
  }
}
