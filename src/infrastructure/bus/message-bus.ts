import type { Decision, OrderAlert } from '@core/interfaces/index.js';

import { logger } from '@utils/logger.js';

export interface BusTopics {
  'surface.present': { alert: OrderAlert };
  'surface.refresh': { alert: OrderAlert };
  'surface.close': { orderId: string };
  'decision.captured': { orderId: string; decision: Decision; surfaceId: string };
  'feedback.vibrate': { durationMs: number };
  'consumer.open-detail': { orderId: string };
}

export type Topic = keyof BusTopics;

export const TOPICS: readonly Topic[] = [
  'surface.present',
  'surface.refresh',
  'surface.close',
  'decision.captured',
  'feedback.vibrate',
  'consumer.open-detail',
];

export function isTopic(value: string): value is Topic {
  return TOPICS.some((topic) => topic === value);
}

export type Handler<T extends Topic> = (payload: BusTopics[T]) => void | Promise<void>;
export type Unsubscribe = () => void;

/** Signals between the receiving side and the presenting side of the alert. */
export interface MessageBus {
  publish<T extends Topic>(topic: T, payload: BusTopics[T]): Promise<void>;
  subscribe<T extends Topic>(topic: T, handler: Handler<T>): Unsubscribe;
  close(): Promise<void>;
}

type Registry = { [K in Topic]?: Set<Handler<K>> };

export class InProcessMessageBus implements MessageBus {
  private handlers: Registry = {};

  async publish<T extends Topic>(topic: T, payload: BusTopics[T]): Promise<void> {
    const set: Set<Handler<T>> | undefined = this.handlers[topic];
    if (!set) return;
    for (const handler of [...set]) {
      try {
        await handler(payload);
      } catch (err) {
        logger.error('[bus] handler failed', { topic, err });
      }
    }
  }

  subscribe<T extends Topic>(topic: T, handler: Handler<T>): Unsubscribe {
    let set: Set<Handler<T>> | undefined = this.handlers[topic];
    if (!set) {
      set = new Set<Handler<T>>();
      this.handlers[topic] = set;
    }
    const registered = set;
    registered.add(handler);
    return () => {
      registered.delete(handler);
    };
  }

  async close(): Promise<void> {
    this.handlers = {};
  }
}
