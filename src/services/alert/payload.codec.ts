import { z } from 'zod';

import { DecodeError } from '@core/errors/decode.error.js';
import type { EventKind, OrderAlert, OrderLineItem, Result } from '@core/interfaces/index.js';

import { logger } from '@utils/logger.js';

export const CUSTOMER_PLACEHOLDER = 'Customer';
export const PRODUCT_PLACEHOLDER = 'Unknown Product';

const INCOMING_TYPES = new Set(['incoming', 'incoming_order']);
const DISMISS_TYPES = new Set(['dismiss', 'dismiss_incoming']);

const Scalar = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .nullish();

const LineItemSchema = z.object({
  n: Scalar,
  v: Scalar,
  q: Scalar,
  p: Scalar,
  t: Scalar,
  op: Scalar,
});

function orDefault(value: string | null | undefined, fallback: string): string {
  return value ? value : fallback;
}

function scalarField(raw: Record<string, unknown>, key: string, fallback: string): string {
  const parsed = Scalar.safeParse(raw[key]);
  return parsed.success ? orDefault(parsed.data, fallback) : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeItem(candidate: unknown, index: number): OrderLineItem | null {
  const parsed = LineItemSchema.safeParse(candidate);
  if (!parsed.success) {
    logger.debug('[codec] skipping malformed line item', { index });
    return null;
  }
  const { n, v, q, p, t, op } = parsed.data;
  const unitPrice = orDefault(p, '0');
  return {
    productName: orDefault(n, PRODUCT_PLACEHOLDER),
    variantName: orDefault(v, ''),
    quantity: orDefault(q, '0'),
    unitPrice,
    lineTotal: orDefault(t, '0'),
    originalUnitPrice: orDefault(op, unitPrice),
  };
}

/**
 * The delivery channel carries `items` as a JSON string; in-process callers
 * may pass the array itself. Anything unreadable is an empty list.
 */
export function decodeItems(raw: unknown): OrderLineItem[] {
  let list: unknown = raw;
  if (typeof raw === 'string') {
    if (!raw.trim()) return [];
    try {
      list = JSON.parse(raw);
    } catch {
      logger.debug('[codec] items is not valid JSON, treating as empty');
      return [];
    }
  }
  if (!Array.isArray(list)) return [];

  const items: OrderLineItem[] = [];
  list.forEach((candidate, index) => {
    const item = decodeItem(candidate, index);
    if (item) items.push(item);
  });
  return items;
}

export function decode(raw: unknown, receivedAt: Date = new Date()): Result<OrderAlert, DecodeError> {
  if (!isRecord(raw)) {
    return { ok: false, error: new DecodeError('MISSING_IDENTITY', 'Event payload is not an object') };
  }
  const orderId = scalarField(raw, 'order_id', '');
  if (!orderId) {
    return { ok: false, error: new DecodeError('MISSING_IDENTITY') };
  }

  const alert: OrderAlert = Object.freeze({
    orderId,
    customerName: scalarField(raw, 'name', CUSTOMER_PLACEHOLDER),
    tableNo: scalarField(raw, 'table_no', ''),
    phone: scalarField(raw, 'phone', ''),
    total: scalarField(raw, 'total', '0'),
    itemsCount: scalarField(raw, 'items_count', '0'),
    items: Object.freeze(decodeItems(raw.items).map((item) => Object.freeze(item))),
    issuedAt: receivedAt.toISOString(),
  });
  return { ok: true, value: alert };
}

export function classifyEvent(raw: unknown): EventKind | 'ignored' {
  if (!isRecord(raw) || typeof raw.type !== 'string') return 'ignored';
  const type = raw.type.trim();
  if (INCOMING_TYPES.has(type)) return 'incoming';
  if (DISMISS_TYPES.has(type)) return 'dismiss';
  return 'ignored';
}

/** Order id a dismiss event is scoped to; undefined dismisses whatever is active. */
export function dismissTarget(raw: unknown): string | undefined {
  if (!isRecord(raw)) return undefined;
  const orderId = scalarField(raw, 'order_id', '');
  return orderId || undefined;
}

/** Same order, same displayed content. `issuedAt` is receipt metadata and ignored. */
export function sameContent(a: OrderAlert, b: OrderAlert): boolean {
  const { issuedAt: _a, ...left } = a;
  const { issuedAt: _b, ...right } = b;
  return JSON.stringify(left) === JSON.stringify(right);
}
