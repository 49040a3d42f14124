import type { PendingDecision } from '@core/interfaces/index.js';

export type OfferResult = 'stored' | 'duplicate';

/**
 * Single slot for a decision no consumer has taken yet. A different order
 * replaces the slot; the same order again is a no-op.
 */
export interface PendingDecisionStore {
  offer(pending: PendingDecision): Promise<OfferResult>;
  /** Reads and clears in one step. */
  take(): Promise<PendingDecision | null>;
  peek(): Promise<PendingDecision | null>;
}

export class InMemoryPendingDecisionStore implements PendingDecisionStore {
  private slot: PendingDecision | null = null;

  async offer(pending: PendingDecision): Promise<OfferResult> {
    if (this.slot?.orderId === pending.orderId) return 'duplicate';
    this.slot = { ...pending };
    return 'stored';
  }

  async take(): Promise<PendingDecision | null> {
    const pending = this.slot;
    this.slot = null;
    return pending;
  }

  async peek(): Promise<PendingDecision | null> {
    return this.slot ? { ...this.slot } : null;
  }
}
