import express from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from '@config/env.config';

import { createApiRouter } from './api/routes/index.js';
import { InProcessMessageBus, type MessageBus } from './infrastructure/bus/message-bus.js';
import { RedisMessageBus } from './infrastructure/bus/redis-message-bus.js';
import { getBackendAxios, isBackendConfigured } from './infrastructure/backend/backend.client.js';
import {
  connectRedis,
  pingRedis,
  redis,
  registerShutdownSignals,
} from './infrastructure/redis/redis.client.js';
import { errorMiddleware } from './middleware/index.js';
import { AlertRuntime } from './services/alert/index.js';
import { OrderStatusConsumer } from './services/consumer/order-status.consumer.js';
import { BusVibrationOutput } from './services/feedback/bus-vibration.output.js';
import { CommandAudioOutput } from './services/feedback/command-audio.output.js';
import { DirectEventSink, type EventSink } from './services/queue/event.sink.js';
import { QueueEventSink, startQueue, stopQueue } from './services/queue/queue.manager.js';
import {
  InMemoryPendingDecisionStore,
  type PendingDecisionStore,
} from './services/relay/pending-decision.store.js';
import { RedisPendingDecisionStore } from './services/relay/redis-pending-decision.store.js';
import { logger } from './utils/logger.js';

async function createBus(): Promise<MessageBus> {
  if (config.BUS_TRANSPORT === 'redis') {
    return RedisMessageBus.connect(redis, config.BUS_CHANNEL_PREFIX);
  }
  return new InProcessMessageBus();
}

function createPendingStore(): PendingDecisionStore {
  return config.PENDING_STORE === 'redis'
    ? new RedisPendingDecisionStore(redis)
    : new InMemoryPendingDecisionStore();
}

function createRuntime(bus: MessageBus): AlertRuntime {
  return new AlertRuntime({
    bus,
    pendingStore: createPendingStore(),
    audio: new CommandAudioOutput({
      playerCommand: config.ALERT_PLAYER_CMD,
      volumeGetCommand: config.ALERT_VOLUME_GET_CMD,
      volumeSetCommand: config.ALERT_VOLUME_SET_CMD,
      commandTimeoutMs: config.ALERT_MIXER_TIMEOUT_MS,
    }),
    vibration: new BusVibrationOutput(bus),
    driver: {
      soundFile: config.ALERT_SOUND_FILE,
      vibrationPattern: config.ALERT_VIBRATION_PATTERN,
      loopGapMs: 250,
    },
    surface: {
      geometry: {
        trackWidth: config.ALERT_TRACK_WIDTH,
        thumbSize: config.ALERT_THUMB_SIZE,
        padding: config.ALERT_TRACK_PADDING,
        thresholdRatio: config.ALERT_SLIDE_THRESHOLD_RATIO,
      },
      format: { currency: config.ALERT_CURRENCY_SYMBOL },
    },
    dedupWindowSec: config.ALERT_DEDUP_WINDOW_SEC,
    resolvedHistory: config.ALERT_RESOLVED_HISTORY,
  });
}

async function bootstrap() {
  // the pending store, the bus and the queue all need Redis
  await connectRedis();

  const bus = await createBus();
  const runtime = createRuntime(bus);
  runtime.start();

  let sink: EventSink;
  if (config.QUEUE_ENABLED) {
    startQueue(runtime.receiver);
    sink = new QueueEventSink();
  } else {
    sink = new DirectEventSink(runtime.receiver);
  }

  if (isBackendConfigured()) {
    const drained = await runtime.attachConsumer(new OrderStatusConsumer(getBackendAxios(), bus));
    if (drained) logger.info('[relay] delivered decision left from a previous run', { orderId: drained.orderId });
  }

  const app = express();
  app.use(helmet());
  app.use(cors());
  app.use(
    '/',
    createApiRouter({
      runtime,
      sink,
      webhookSecret: config.EVENTS_WEBHOOK_SECRET,
      healthProbe: pingRedis,
    }),
  );
  app.use(errorMiddleware);

  const server = app.listen(config.PORT, () => {
    logger.info('[http] order alerts listening', { port: config.PORT });
  });

  registerShutdownSignals(
    () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
    stopQueue,
    () => runtime.shutdown(),
    () => bus.close(),
  );
}

bootstrap().catch((err) => {
  logger.error('[http] fatal bootstrap error', { err });
  process.exit(1);
});
