import { Queue, Worker, type ConnectionOptions } from 'bullmq';

import type { EventReceiver } from '@services/alert/event.receiver.js';

import { logger } from '@utils/logger.js';

import { config } from '@config/env.config';

import type { AlertEventJob, RawEvent } from '../../types/index.js';

import type { EventSink } from './event.sink.js';
import { createJobProcessor } from './job.handlers.js';

export const QUEUE_NAME = 'order-alerts';

let queue: Queue<AlertEventJob> | undefined;
let worker: Worker<AlertEventJob> | undefined;

export function createConnection(redisUrl: string = config.REDIS_URL): ConnectionOptions {
  const url = new URL(redisUrl);
  const db = Number(url.pathname.replace('/', ''));
  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : 6379,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: Number.isInteger(db) && db > 0 ? db : undefined,
    tls: url.protocol === 'rediss:' ? {} : undefined,
    // required by bullmq workers
    maxRetriesPerRequest: null,
  };
}

export function startQueue(receiver: EventReceiver): void {
  if (queue && worker) return;
  const connection = createConnection();
  queue = new Queue<AlertEventJob>(QUEUE_NAME, { connection });
  worker = new Worker<AlertEventJob>(QUEUE_NAME, createJobProcessor(receiver), {
    connection,
    concurrency: config.QUEUE_CONCURRENCY,
  });
  worker.on('failed', (job, err) => {
    logger.error('[queue] job failed', { jobId: job?.id, attempts: job?.attemptsMade, err });
  });
  worker.on('error', (err) => {
    logger.error('[queue] worker error', { err });
  });
  logger.info('[queue] started', { name: QUEUE_NAME, concurrency: config.QUEUE_CONCURRENCY });
}

export async function stopQueue(): Promise<void> {
  await worker?.close();
  await queue?.close();
  worker = undefined;
  queue = undefined;
}

export async function enqueue(event: RawEvent): Promise<void> {
  if (!queue) throw new Error('Queue not started');
  await queue.add(
    'event',
    { event, receivedAt: new Date().toISOString() },
    {
      removeOnComplete: true,
      removeOnFail: 50,
      attempts: config.QUEUE_MAX_ATTEMPTS,
      backoff: { type: 'fixed', delay: 2000 },
    },
  );
}

export class QueueEventSink implements EventSink {
  submit(event: RawEvent): Promise<void> {
    return enqueue(event);
  }
}
