import { newIdleSnapshot } from './state-machine.js';
import type { AlertSnapshot } from './state.types.js';

export interface SetStateCASOptions {
  expectedVersion: number;
}

export interface SetStateCASResult {
  ok: boolean;
  current: AlertSnapshot;
}

function freeze(snapshot: AlertSnapshot): AlertSnapshot {
  return Object.freeze({
    ...snapshot,
    state: Object.freeze({ ...snapshot.state }),
    resolved: Object.freeze(snapshot.resolved.map((entry) => Object.freeze({ ...entry }))),
  });
}

/**
 * Process-wide holder of the current alert. Owned by the orchestrator and
 * passed to every component that needs it; all writes are versioned.
 */
export class AlertStateStore {
  private snapshot: AlertSnapshot;

  constructor(initial: AlertSnapshot = newIdleSnapshot()) {
    this.snapshot = freeze(initial);
  }

  getState(): AlertSnapshot {
    return this.snapshot;
  }

  /** Unconditional write; the version still advances by one. */
  setState(next: AlertSnapshot): AlertSnapshot {
    this.snapshot = freeze({ ...next, version: this.snapshot.version + 1 });
    return this.snapshot;
  }

  setStateCAS(next: AlertSnapshot, options: SetStateCASOptions): SetStateCASResult {
    const current = this.snapshot;
    if (current.version !== options.expectedVersion) {
      return { ok: false, current };
    }

    const expectedNext = options.expectedVersion + 1;
    if (next.version !== expectedNext) {
      throw new Error(
        `Invalid alert state version: expected next version ${expectedNext}, received ${next.version}`,
      );
    }

    this.snapshot = freeze(next);
    return { ok: true, current: this.snapshot };
  }

  reset(): AlertSnapshot {
    return this.setState(newIdleSnapshot());
  }
}
