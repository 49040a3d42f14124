import { DateTime } from 'luxon';

import type { Decision, OrderAlert } from '@core/interfaces/index.js';

import { sameContent } from './payload.codec.js';
import type {
  AlertEvent,
  AlertSnapshot,
  AlertState,
  Effect,
  ReduceResult,
  ResolvedOrder,
  TransitionOutcome,
} from './state.types.js';

export function newIdleSnapshot(now: DateTime = DateTime.utc()): AlertSnapshot {
  return {
    version: 0,
    state: { status: 'IDLE' },
    resolved: [],
    updatedAt: now.toISO() ?? new Date().toISOString(),
  };
}

export function activeOrderId(state: AlertState): string | null {
  return state.status === 'IDLE' ? null : state.alert.orderId;
}

function unchanged(current: AlertSnapshot, outcome: TransitionOutcome): ReduceResult {
  return { state: current, effects: [], outcome, changed: false };
}

/**
 * Transition table for the single process-wide alert. Pure: the caller commits
 * the returned snapshot with a compare-and-swap and then runs the effects.
 */
export class AlertStateMachine {
  constructor(
    private readonly dedupWindowSec = 600,
    private readonly historySize = 50,
  ) {}

  reduce(current: AlertSnapshot, event: AlertEvent, now: DateTime = DateTime.utc()): ReduceResult {
    switch (event.type) {
      case 'INCOMING':
        return this.incoming(current, event.alert, now);
      case 'DISMISS':
        return this.dismiss(current, event.orderId, now);
      case 'DECIDE':
        return this.decide(current, event.orderId, event.decision, now);
      case 'CLAIM':
        return this.claim(current, event.orderId, now);
    }
  }

  isRecentlyResolved(snapshot: AlertSnapshot, orderId: string, now: DateTime = DateTime.utc()): boolean {
    return this.prune(snapshot.resolved, now).some((entry) => entry.orderId === orderId);
  }

  private incoming(current: AlertSnapshot, alert: OrderAlert, now: DateTime): ReduceResult {
    const { state } = current;

    if (state.status === 'DECIDED') return unchanged(current, 'stale');
    if (this.isRecentlyResolved(current, alert.orderId, now)) return unchanged(current, 'stale');

    if (state.status === 'IDLE') {
      return this.commit(current, { status: 'RINGING', alert }, now, 'started', [
        { type: 'START_FEEDBACK', alert },
        { type: 'PRESENT_SURFACE', alert },
      ]);
    }

    if (state.alert.orderId !== alert.orderId) {
      // feedback keeps running; only the content changes
      return this.commit(current, { status: 'RINGING', alert }, now, 'replaced', [
        { type: 'PRESENT_SURFACE', alert },
      ]);
    }

    if (sameContent(state.alert, alert)) return unchanged(current, 'duplicate');

    const refreshed: OrderAlert = Object.freeze({ ...alert, issuedAt: state.alert.issuedAt });
    return this.commit(current, { status: 'RINGING', alert: refreshed }, now, 'refreshed', [
      { type: 'REFRESH_SURFACE', alert: refreshed },
    ]);
  }

  private dismiss(current: AlertSnapshot, orderId: string | undefined, now: DateTime): ReduceResult {
    const { state } = current;
    if (state.status === 'IDLE') return unchanged(current, 'ignored');
    if (orderId !== undefined && state.alert.orderId !== orderId) return unchanged(current, 'ignored');

    const dismissedId = state.alert.orderId;
    return this.commit(
      current,
      { status: 'IDLE' },
      now,
      'dismissed',
      [{ type: 'STOP_FEEDBACK' }, { type: 'CLOSE_SURFACE', orderId: dismissedId }],
      { orderId: dismissedId, outcome: 'dismissed' },
    );
  }

  private decide(
    current: AlertSnapshot,
    orderId: string,
    decision: Decision,
    now: DateTime,
  ): ReduceResult {
    const { state } = current;
    if (state.status !== 'RINGING' || state.alert.orderId !== orderId) {
      return unchanged(current, 'stale');
    }
    return this.commit(
      current,
      { status: 'DECIDED', alert: state.alert, decision, decidedAt: iso(now) },
      now,
      'decided',
      [{ type: 'STOP_FEEDBACK' }, { type: 'CLOSE_SURFACE', orderId }],
    );
  }

  private claim(current: AlertSnapshot, orderId: string, now: DateTime): ReduceResult {
    const { state } = current;
    if (state.status !== 'DECIDED' || state.alert.orderId !== orderId) {
      return unchanged(current, 'stale');
    }
    return this.commit(
      current,
      { status: 'IDLE' },
      now,
      'claimed',
      [{ type: 'RELAY_DECISION', orderId, decision: state.decision, alert: state.alert }],
      { orderId, outcome: state.decision },
    );
  }

  private commit(
    current: AlertSnapshot,
    state: AlertState,
    now: DateTime,
    outcome: TransitionOutcome,
    effects: Effect[],
    resolvedEntry?: Omit<ResolvedOrder, 'resolvedAt'>,
  ): ReduceResult {
    const history = this.prune(current.resolved, now);
    const resolved = resolvedEntry
      ? [...history.filter((r) => r.orderId !== resolvedEntry.orderId), { ...resolvedEntry, resolvedAt: iso(now) }]
      : history;
    return {
      state: {
        version: current.version + 1,
        state,
        resolved: resolved.slice(-this.historySize),
        updatedAt: iso(now),
      },
      effects,
      outcome,
      changed: true,
    };
  }

  private prune(resolved: readonly ResolvedOrder[], now: DateTime): ResolvedOrder[] {
    return resolved.filter((entry) => {
      const at = DateTime.fromISO(entry.resolvedAt);
      if (!at.isValid) return false;
      return now.diff(at, 'seconds').seconds <= this.dedupWindowSec;
    });
  }
}

function iso(now: DateTime): string {
  return now.toISO() ?? new Date().toISOString();
}
