import { json, Router } from 'express';

import type { AlertRuntime } from '@services/alert/alert.runtime.js';

import { AlertsController } from '../controllers/alerts.controller.js';

export function createAlertsRoutes(runtime: AlertRuntime): Router {
  const controller = new AlertsController(runtime);
  const router = Router();
  router.use(json());
  router.get('/current', controller.current);
  router.post('/current/gesture', controller.gesture);
  router.post('/current/silence', controller.silence);
  return router;
}
