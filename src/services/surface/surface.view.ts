import type { OrderAlert, OrderLineItem } from '@core/interfaces/index.js';

import type { GestureState } from './slide-gesture.js';

const BLANK = '—';
export const SLIDE_HINT = '← Slide to Reject  |  Slide to Accept →';

export interface DetailRow {
  label: string;
  value: string;
}

export interface ItemRow {
  label: string;
  price: string;
  /** struck-through price shown only when discounted */
  originalPrice: string | null;
  line: string;
}

export interface SurfaceView {
  surfaceId: string;
  orderId: string;
  title: string;
  summary: string;
  customer: DetailRow[];
  order: {
    heading: string;
    items: ItemRow[];
    itemsSummary: string | null;
    subtotal: string | null;
    total: string;
  };
  slide: GestureState & {
    hint: string;
    maxSlide: number;
    threshold: number;
  };
}

export interface ViewFormat {
  currency: string;
}

function amount(value: string): number {
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
}

export function hasDiscount(item: OrderLineItem): boolean {
  const original = amount(item.originalUnitPrice);
  return original > amount(item.unitPrice) && original > 0;
}

function orBlank(value: string): string {
  return value.trim() ? value : BLANK;
}

function itemRow(item: OrderLineItem, currency: string): ItemRow {
  return {
    label: item.variantName ? `${item.productName} (${item.variantName})` : item.productName,
    price: `${currency}${item.unitPrice}`,
    originalPrice: hasDiscount(item) ? `${currency}${item.originalUnitPrice}` : null,
    line: `${item.quantity} × ${currency}${item.unitPrice} = ${currency}${item.lineTotal}`,
  };
}

export function itemsSummary(itemsCount: string): string {
  const count = Number.parseInt(itemsCount, 10);
  return Number.isFinite(count) && count > 0 ? `${count} item(s)` : 'No items';
}

export function summaryLine(alert: OrderAlert, currency: string): string {
  const parts = [alert.customerName];
  if (alert.tableNo) parts.push(`Table ${alert.tableNo}`);
  parts.push(`${currency}${alert.total}`);
  return parts.join(' · ');
}

export function buildSurfaceView(
  surfaceId: string,
  alert: OrderAlert,
  slide: SurfaceView['slide'],
  format: ViewFormat,
): SurfaceView {
  const { currency } = format;
  const hasItems = alert.items.length > 0;
  const subtotal = alert.items.reduce((sum, item) => sum + amount(item.lineTotal), 0);

  return {
    surfaceId,
    orderId: alert.orderId,
    title: 'Incoming order',
    summary: summaryLine(alert, currency),
    customer: [
      { label: 'Name', value: orBlank(alert.customerName) },
      { label: 'Phone', value: orBlank(alert.phone) },
      { label: 'Table', value: orBlank(alert.tableNo) },
    ],
    order: {
      heading: alert.orderId ? `ORDER #${alert.orderId}` : 'ORDER',
      items: alert.items.map((item) => itemRow(item, currency)),
      itemsSummary: hasItems ? null : itemsSummary(alert.itemsCount),
      subtotal: hasItems ? `${currency}${Math.round(subtotal)}` : null,
      total: `${currency}${alert.total}`,
    },
    slide,
  };
}
