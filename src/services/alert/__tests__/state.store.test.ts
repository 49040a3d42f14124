import { describe, expect, it } from 'vitest';

import { newIdleSnapshot } from '@services/alert/state-machine.js';
import { AlertStateStore } from '@services/alert/state.store.js';

describe('AlertStateStore', () => {
  it('commits a compare-and-swap on the expected version', () => {
    const store = new AlertStateStore();
    const next = { ...store.getState(), version: 1, updatedAt: 'later' };

    const result = store.setStateCAS(next, { expectedVersion: 0 });

    expect(result.ok).toBe(true);
    expect(store.getState().version).toBe(1);
    expect(store.getState().updatedAt).toBe('later');
  });

  it('refuses a write based on an outdated version', () => {
    const store = new AlertStateStore();
    store.setState(newIdleSnapshot());

    const result = store.setStateCAS({ ...newIdleSnapshot(), version: 1 }, { expectedVersion: 0 });

    expect(result.ok).toBe(false);
    expect(result.current.version).toBe(1);
  });

  it('throws when the proposed version does not follow the expected one', () => {
    const store = new AlertStateStore();
    expect(() => store.setStateCAS({ ...newIdleSnapshot(), version: 5 }, { expectedVersion: 0 })).toThrow(
      'Invalid alert state version: expected next version 1, received 5',
    );
  });

  it('hands out frozen snapshots', () => {
    const store = new AlertStateStore();
    expect(Object.isFrozen(store.getState())).toBe(true);
    expect(Object.isFrozen(store.getState().state)).toBe(true);
  });

  it('reset returns to IDLE and still advances the version', () => {
    const store = new AlertStateStore();
    store.setState(newIdleSnapshot());
    const snapshot = store.reset();
    expect(snapshot.state).toEqual({ status: 'IDLE' });
    expect(snapshot.version).toBe(2);
  });
});
