import type { RedisClient } from '@infra/redis/redis.client.js';

import { logger } from '@utils/logger.js';

import {
  InProcessMessageBus,
  isTopic,
  type BusTopics,
  type Handler,
  type MessageBus,
  type Topic,
  type Unsubscribe,
} from './message-bus.js';

/**
 * Pub/sub transport between processes. Publishes go to Redis; a duplicated
 * connection listens on `<prefix>:*` and fans messages out to local handlers.
 */
export class RedisMessageBus implements MessageBus {
  private readonly local = new InProcessMessageBus();

  private constructor(
    private readonly publisher: RedisClient,
    private readonly subscriber: RedisClient,
    private readonly prefix: string,
  ) {}

  static async connect(client: RedisClient, prefix: string): Promise<RedisMessageBus> {
    const subscriber: RedisClient = client.duplicate();
    subscriber.on('error', (err: Error) => {
      logger.error('[bus] subscriber error', { message: err.message });
    });
    await subscriber.connect();

    const bus = new RedisMessageBus(client, subscriber, prefix);
    await subscriber.pSubscribe(`${prefix}:*`, (message, channel) => {
      bus.dispatch(channel, message).catch((err: unknown) => {
        logger.error('[bus] dispatch failed', { channel, err });
      });
    });
    return bus;
  }

  async publish<T extends Topic>(topic: T, payload: BusTopics[T]): Promise<void> {
    await this.publisher.publish(`${this.prefix}:${topic}`, JSON.stringify(payload));
  }

  subscribe<T extends Topic>(topic: T, handler: Handler<T>): Unsubscribe {
    return this.local.subscribe(topic, handler);
  }

  async close(): Promise<void> {
    await this.local.close();
    if (this.subscriber.isOpen) {
      await this.subscriber.pUnsubscribe(`${this.prefix}:*`);
      await this.subscriber.quit();
    }
  }

  private async dispatch(channel: string, message: string): Promise<void> {
    const topic = channel.slice(this.prefix.length + 1);
    if (!isTopic(topic)) {
      logger.debug('[bus] ignoring unknown channel', { channel });
      return;
    }
    let payload: BusTopics[Topic];
    try {
      payload = JSON.parse(message) as BusTopics[Topic];
    } catch {
      logger.warn('[bus] dropping unparseable message', { channel });
      return;
    }
    await this.local.publish(topic, payload);
  }
}
