export type Decision = 'accepted' | 'rejected';

export interface OrderLineItem {
  readonly productName: string;
  readonly variantName: string;
  readonly quantity: string;
  readonly unitPrice: string;
  readonly lineTotal: string;
  readonly originalUnitPrice: string;
}

/**
 * One order as shown to the operator. Never mutated: a newer payload for the
 * same order replaces the whole record.
 */
export interface OrderAlert {
  readonly orderId: string;
  readonly customerName: string;
  readonly tableNo: string;
  readonly phone: string;
  readonly total: string;
  readonly itemsCount: string;
  readonly items: readonly OrderLineItem[];
  readonly issuedAt: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type EventKind = 'incoming' | 'dismiss';

export interface PendingDecision {
  orderId: string;
  decision: Decision;
  capturedAt: string;
  alert?: OrderAlert;
}

/** The business layer that turns a decision into an order status change. */
export interface DecisionConsumer {
  isReady(): boolean;
  applyDecision(orderId: string, decision: Decision): Promise<void>;
  openDetail(orderId: string): Promise<void>;
}
