import type { Decision, OrderAlert } from '@core/interfaces/index.js';

export type AlertStatus = 'IDLE' | 'RINGING' | 'DECIDED';

export type AlertState =
  | { status: 'IDLE' }
  | { status: 'RINGING'; alert: OrderAlert }
  | { status: 'DECIDED'; alert: OrderAlert; decision: Decision; decidedAt: string };

export interface ResolvedOrder {
  orderId: string;
  resolvedAt: string;
  outcome: Decision | 'dismissed';
}

export interface AlertSnapshot {
  version: number;
  state: AlertState;
  /** Orders closed recently; late redeliveries of these are stale. */
  resolved: readonly ResolvedOrder[];
  updatedAt: string;
}

export type AlertEvent =
  | { type: 'INCOMING'; alert: OrderAlert }
  | { type: 'DISMISS'; orderId?: string }
  | { type: 'DECIDE'; orderId: string; decision: Decision }
  | { type: 'CLAIM'; orderId: string };

export type Effect =
  | { type: 'START_FEEDBACK'; alert: OrderAlert }
  | { type: 'STOP_FEEDBACK' }
  | { type: 'PRESENT_SURFACE'; alert: OrderAlert }
  | { type: 'REFRESH_SURFACE'; alert: OrderAlert }
  | { type: 'CLOSE_SURFACE'; orderId: string }
  | { type: 'RELAY_DECISION'; orderId: string; decision: Decision; alert: OrderAlert };

export type TransitionOutcome =
  | 'started'
  | 'replaced'
  | 'refreshed'
  | 'duplicate'
  | 'stale'
  | 'dismissed'
  | 'ignored'
  | 'decided'
  | 'claimed';

export interface ReduceResult {
  state: AlertSnapshot;
  effects: Effect[];
  outcome: TransitionOutcome;
  /** false when the snapshot is returned untouched and nothing needs committing */
  changed: boolean;
}
