import { describe, expect, it, vi } from 'vitest';

import { InProcessMessageBus } from '@infra/bus/message-bus.js';

import { OrderStatusConsumer } from '@services/consumer/order-status.consumer.js';

function setup() {
  const post = vi.fn().mockResolvedValue({ status: 200, data: {} });
  const bus = new InProcessMessageBus();
  const consumer = new OrderStatusConsumer({ post }, bus);
  return { post, bus, consumer };
}

describe('OrderStatusConsumer', () => {
  it('posts the decision as a form-encoded status', async () => {
    const { post, consumer } = setup();

    await consumer.applyDecision('100', 'accepted');

    expect(post).toHaveBeenCalledWith('/api/orders/100/edit/', 'status=accepted', {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });
  });

  it('escapes the order id in the path', async () => {
    const { post, consumer } = setup();
    await consumer.applyDecision('A/7', 'rejected');
    expect(post.mock.calls[0]?.[0]).toBe('/api/orders/A%2F7/edit/');
  });

  it('lets a backend failure reach the caller', async () => {
    const { post, consumer } = setup();
    post.mockRejectedValueOnce(new Error('Request failed with status code 502'));
    await expect(consumer.applyDecision('100', 'accepted')).rejects.toThrow('status code 502');
  });

  it('asks the operator client to open the order', async () => {
    const { bus, consumer } = setup();
    const opened = vi.fn();
    bus.subscribe('consumer.open-detail', opened);

    await consumer.openDetail('100');

    expect(opened).toHaveBeenCalledWith({ orderId: '100' });
  });
});
