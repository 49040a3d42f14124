import type { AxiosInstance } from 'axios';

import type { Decision, DecisionConsumer } from '@core/interfaces/index.js';

import type { MessageBus } from '@infra/bus/message-bus.js';

import { logger } from '@utils/logger.js';

export type BackendHttp = Pick<AxiosInstance, 'post'>;

/** Records the operator's decision as the order's status on the backend. */
export class OrderStatusConsumer implements DecisionConsumer {
  constructor(
    private readonly http: BackendHttp,
    private readonly bus: MessageBus,
  ) {}

  isReady(): boolean {
    return true;
  }

  async applyDecision(orderId: string, decision: Decision): Promise<void> {
    const body = new URLSearchParams({ status: decision });
    await this.http.post(`/api/orders/${encodeURIComponent(orderId)}/edit/`, body.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });
    logger.info('[relay] order status updated', { orderId, status: decision });
  }

  async openDetail(orderId: string): Promise<void> {
    await this.bus.publish('consumer.open-detail', { orderId });
  }
}
