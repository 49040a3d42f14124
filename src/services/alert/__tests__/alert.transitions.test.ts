import { describe, expect, it, vi } from 'vitest';

import { ConflictError } from '@core/errors/conflict.error.js';
import type { OrderAlert } from '@core/interfaces/index.js';

import { AlertTransitions } from '@services/alert/alert.transitions.js';
import { AlertStateMachine } from '@services/alert/state-machine.js';
import { AlertStateStore } from '@services/alert/state.store.js';

const alert: OrderAlert = {
  orderId: '100',
  customerName: 'Asha',
  tableNo: '',
  phone: '',
  total: '250',
  itemsCount: '1',
  items: [],
  issuedAt: '2024-05-01T10:00:00.000Z',
};

function setup() {
  const store = new AlertStateStore();
  const transitions = new AlertTransitions(store, new AlertStateMachine());
  return { store, transitions };
}

describe('AlertTransitions', () => {
  it('commits a changed snapshot with the next version', () => {
    const { store, transitions } = setup();

    const result = transitions.apply({ type: 'INCOMING', alert });

    expect(result.outcome).toBe('started');
    expect(store.getState().version).toBe(1);
    expect(store.getState().state).toMatchObject({ status: 'RINGING', alert: { orderId: '100' } });
  });

  it('leaves the store alone when nothing changes', () => {
    const { store, transitions } = setup();
    const cas = vi.spyOn(store, 'setStateCAS');

    expect(transitions.apply({ type: 'DISMISS', orderId: '100' }).outcome).toBe('ignored');
    expect(cas).not.toHaveBeenCalled();
  });

  it('raises a conflict instead of retrying when the compare misses', () => {
    const { store, transitions } = setup();
    vi.spyOn(store, 'setStateCAS').mockReturnValue({ ok: false, current: store.getState() });

    expect(() => transitions.apply({ type: 'INCOMING', alert })).toThrow(ConflictError);
    expect(store.getState().version).toBe(0);
  });
});
