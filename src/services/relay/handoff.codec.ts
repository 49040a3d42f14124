import type { Decision, PendingDecision } from '@core/interfaces/index.js';

import { decode } from '@services/alert/payload.codec.js';

import type { HandoffBag } from '../../types/index.js';

const ACTIONS: Record<Decision, string> = { accepted: 'accept', rejected: 'reject' };

function decisionOf(action: unknown): Decision | null {
  if (action === 'accept') return 'accepted';
  if (action === 'reject') return 'rejected';
  return null;
}

export function encodeHandoff(pending: PendingDecision): HandoffBag {
  const bag: HandoffBag = {
    type: pending.decision === 'accepted' ? 'incoming_order' : 'order_rejected',
    order_id: pending.orderId,
    action: ACTIONS[pending.decision],
    navigate_to: 'order_detail',
    captured_at: pending.capturedAt,
  };
  const { alert } = pending;
  if (alert) {
    Object.assign(bag, {
      name: alert.customerName,
      table_no: alert.tableNo,
      phone: alert.phone,
      total: alert.total,
      items_count: alert.itemsCount,
      items: JSON.stringify(
        alert.items.map((item) => ({
          n: item.productName,
          v: item.variantName,
          q: item.quantity,
          p: item.unitPrice,
          t: item.lineTotal,
          op: item.originalUnitPrice,
        })),
      ),
      issued_at: alert.issuedAt,
    });
  }
  return bag;
}

export function decodeHandoff(raw: unknown): PendingDecision | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;
  const bag: Record<string, unknown> = { ...raw };
  const decision = decisionOf(bag.action);
  const orderId = typeof bag.order_id === 'string' ? bag.order_id : '';
  if (!decision || !orderId) return null;

  const capturedAt = typeof bag.captured_at === 'string' ? bag.captured_at : new Date().toISOString();
  const pending: PendingDecision = { orderId, decision, capturedAt };

  if (typeof bag.issued_at === 'string') {
    const issuedAt = new Date(bag.issued_at);
    const decoded = decode(bag, Number.isNaN(issuedAt.getTime()) ? new Date() : issuedAt);
    if (decoded.ok) pending.alert = decoded.value;
  }
  return pending;
}
