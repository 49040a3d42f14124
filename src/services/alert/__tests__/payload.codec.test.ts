import { describe, expect, it } from 'vitest';

import {
  classifyEvent,
  decode,
  decodeItems,
  dismissTarget,
  sameContent,
} from '@services/alert/payload.codec.js';

const receivedAt = new Date('2024-05-01T10:00:00.000Z');

describe('decode', () => {
  it('fills defaults for every missing optional field', () => {
    const result = decode({ order_id: '100' }, receivedAt);

    expect(result).toEqual({
      ok: true,
      value: {
        orderId: '100',
        customerName: 'Customer',
        tableNo: '',
        phone: '',
        total: '0',
        itemsCount: '0',
        items: [],
        issuedAt: '2024-05-01T10:00:00.000Z',
      },
    });
  });

  it('stringifies numeric fields and trims text', () => {
    const result = decode({ order_id: 101, name: '  Asha ', total: 250, table_no: 4 }, receivedAt);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.orderId).toBe('101');
    expect(result.value.customerName).toBe('Asha');
    expect(result.value.total).toBe('250');
    expect(result.value.tableNo).toBe('4');
  });

  it('uses the placeholder name when the name is blank', () => {
    const result = decode({ order_id: '7', name: '   ' }, receivedAt);
    expect(result.ok && result.value.customerName).toBe('Customer');
  });

  it.each([{}, { order_id: '' }, { order_id: '   ' }, { order_id: { id: 1 } }, null, 'order'])(
    'fails with MISSING_IDENTITY for %j',
    (raw) => {
      const result = decode(raw, receivedAt);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.reason).toBe('MISSING_IDENTITY');
      expect(result.error.status).toBe(422);
    },
  );

  it('returns a frozen record', () => {
    const result = decode({ order_id: '100' }, receivedAt);
    expect(result.ok && Object.isFrozen(result.value)).toBe(true);
  });
});

describe('decodeItems', () => {
  it('reads the JSON string form used by the delivery channel', () => {
    const items = decodeItems('[{"n":"Masala Tea","v":"Large","q":"2","p":"30","t":"60","op":"35"}]');

    expect(items).toEqual([
      {
        productName: 'Masala Tea',
        variantName: 'Large',
        quantity: '2',
        unitPrice: '30',
        lineTotal: '60',
        originalUnitPrice: '35',
      },
    ]);
  });

  it('defaults missing item fields and reuses the unit price as original price', () => {
    const [item] = decodeItems([{ q: 1, p: 120 }]);

    expect(item).toEqual({
      productName: 'Unknown Product',
      variantName: '',
      quantity: '1',
      unitPrice: '120',
      lineTotal: '0',
      originalUnitPrice: '120',
    });
  });

  it('skips malformed items and keeps the rest', () => {
    const items = decodeItems([{ n: 'Dosa', q: '1', p: '80', t: '80' }, 'oops', { n: { nested: true } }, null]);

    expect(items).toHaveLength(1);
    expect(items[0]?.productName).toBe('Dosa');
  });

  it.each(['not json', '', '{"n":"x"}', 42, undefined])('treats %j as no items', (raw) => {
    expect(decodeItems(raw)).toEqual([]);
  });
});

describe('classifyEvent', () => {
  it.each([
    [{ type: 'incoming' }, 'incoming'],
    [{ type: 'incoming_order' }, 'incoming'],
    [{ type: 'dismiss' }, 'dismiss'],
    [{ type: 'dismiss_incoming' }, 'dismiss'],
    [{ type: 'order_rejected' }, 'ignored'],
    [{ order_id: '1' }, 'ignored'],
    ['incoming', 'ignored'],
  ])('classifies %j as %s', (raw, expected) => {
    expect(classifyEvent(raw)).toBe(expected);
  });
});

describe('dismissTarget', () => {
  it('returns the order id when present', () => {
    expect(dismissTarget({ type: 'dismiss', order_id: 55 })).toBe('55');
  });

  it('returns undefined for an unscoped dismiss', () => {
    expect(dismissTarget({ type: 'dismiss' })).toBeUndefined();
  });
});

describe('sameContent', () => {
  it('ignores the receipt time', () => {
    const a = decode({ order_id: '1', name: 'Asha' }, new Date('2024-05-01T10:00:00Z'));
    const b = decode({ order_id: '1', name: 'Asha' }, new Date('2024-05-01T10:05:00Z'));
    expect(a.ok && b.ok && sameContent(a.value, b.value)).toBe(true);
  });

  it('notices a changed field', () => {
    const a = decode({ order_id: '1', total: '100' }, receivedAt);
    const b = decode({ order_id: '1', total: '120' }, receivedAt);
    expect(a.ok && b.ok && sameContent(a.value, b.value)).toBe(false);
  });
});
