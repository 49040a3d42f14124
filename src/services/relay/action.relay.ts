import type { Decision, DecisionConsumer, OrderAlert, PendingDecision } from '@core/interfaces/index.js';

import { logger } from '@utils/logger.js';

import type { PendingDecisionStore } from './pending-decision.store.js';

export type RelayOutcome = 'delivered' | 'queued' | 'duplicate';

/**
 * Hands a committed decision to whatever consumer is attached, or parks it in
 * the pending store until one attaches or drains it.
 */
export class ActionRelay {
  private consumer: DecisionConsumer | null = null;
  private readonly delivered = new Map<string, Decision>();
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly store: PendingDecisionStore,
    private readonly ledgerSize = 100,
  ) {}

  async relay(orderId: string, decision: Decision, alert?: OrderAlert): Promise<RelayOutcome> {
    if (this.delivered.get(orderId) === decision) {
      logger.debug('[relay] decision already delivered', { orderId, decision });
      return 'duplicate';
    }

    const pending: PendingDecision = { orderId, decision, capturedAt: new Date().toISOString(), alert };
    const consumer = this.readyConsumer();
    if (consumer) {
      this.remember(orderId, decision);
      // a decision parked while the consumer was not ready goes first
      const parked = await this.takeParked();
      if (parked && parked.orderId !== orderId) this.dispatch(consumer, parked, false);
      this.dispatch(consumer, pending, false);
      return 'delivered';
    }

    const stored = await this.store.offer(pending);
    logger.info('[relay] no consumer ready, decision kept pending', { orderId, decision, stored });
    return stored === 'stored' ? 'queued' : 'duplicate';
  }

  /** Consume-once: a second call returns null until another decision is parked. */
  async drainPending(): Promise<PendingDecision | null> {
    return this.store.take();
  }

  async attach(consumer: DecisionConsumer): Promise<PendingDecision | null> {
    this.consumer = consumer;
    if (!consumer.isReady()) return null;

    const pending = await this.drainPending();
    if (pending) this.dispatch(consumer, pending, true);
    return pending;
  }

  detach(): void {
    this.consumer = null;
  }

  /** Resolves once every delivery started so far has finished or been parked. */
  async settled(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private async takeParked(): Promise<PendingDecision | null> {
    try {
      return await this.store.take();
    } catch (err) {
      logger.error('[relay] could not read the pending slot', { err });
      return null;
    }
  }

  private readyConsumer(): DecisionConsumer | null {
    return this.consumer?.isReady() ? this.consumer : null;
  }

  private dispatch(consumer: DecisionConsumer, pending: PendingDecision, navigate: boolean): void {
    this.remember(pending.orderId, pending.decision);
    const task = this.deliver(consumer, pending, navigate)
      .catch((err) => {
        logger.error('[relay] could not park failed decision', { orderId: pending.orderId, err });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async deliver(consumer: DecisionConsumer, pending: PendingDecision, navigate: boolean): Promise<void> {
    const { orderId, decision } = pending;
    try {
      await consumer.applyDecision(orderId, decision);
      logger.info('[relay] decision delivered', { orderId, decision });
    } catch (err) {
      logger.warn('[relay] consumer rejected decision, keeping it pending', { orderId, decision, err });
      this.delivered.delete(orderId);
      await this.store.offer(pending);
      return;
    }

    if (!navigate) return;
    try {
      await consumer.openDetail(orderId);
    } catch (err) {
      logger.warn('[relay] could not open order detail', { orderId, err });
    }
  }

  private remember(orderId: string, decision: Decision): void {
    this.delivered.delete(orderId);
    this.delivered.set(orderId, decision);
    while (this.delivered.size > this.ledgerSize) {
      const oldest = this.delivered.keys().next();
      if (oldest.done) break;
      this.delivered.delete(oldest.value);
    }
  }
}
