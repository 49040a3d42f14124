import { ConflictError } from '@core/errors/conflict.error.js';

import type { AlertStateMachine } from './state-machine.js';
import type { AlertStateStore } from './state.store.js';
import type { AlertEvent, ReduceResult } from './state.types.js';

/** Read, reduce and compare-and-swap against the one in-process store. */
export class AlertTransitions {
  constructor(
    private readonly store: AlertStateStore,
    private readonly machine: AlertStateMachine,
  ) {}

  apply(event: AlertEvent): ReduceResult {
    const current = this.store.getState();
    const result = this.machine.reduce(current, event);
    if (!result.changed) return result;

    // read and write happen in the same synchronous turn, so the version cannot move in between
    const { ok } = this.store.setStateCAS(result.state, { expectedVersion: current.version });
    if (!ok) {
      throw new ConflictError('Alert state changed during a synchronous transition', { event: event.type });
    }
    return result;
  }
}
