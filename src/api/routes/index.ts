import { Router } from 'express';

import type { AlertRuntime } from '@services/alert/alert.runtime.js';
import type { EventSink } from '@services/queue/event.sink.js';

import type { HealthProbe } from '../controllers/health.controller.js';

import { createAlertsRoutes } from './alerts.routes.js';
import { createDecisionsRoutes } from './decisions.routes.js';
import { createEventsRoutes } from './events.routes.js';
import { createHealthRoutes } from './health.routes.js';

export interface ApiDependencies {
  runtime: AlertRuntime;
  sink: EventSink;
  webhookSecret?: string;
  healthProbe?: HealthProbe;
}

export function createV1Router({ runtime, sink, webhookSecret }: ApiDependencies): Router {
  const v1Router = Router();
  v1Router.use('/events', createEventsRoutes({ sink, secret: webhookSecret }));
  v1Router.use('/alerts', createAlertsRoutes(runtime));
  v1Router.use('/decisions', createDecisionsRoutes(runtime.relay));
  return v1Router;
}

export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();
  router.use(createHealthRoutes(deps.healthProbe));
  router.use('/v1', createV1Router(deps));
  return router;
}
