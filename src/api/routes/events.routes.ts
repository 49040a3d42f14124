import { Router } from 'express';

import { rawBody } from '@middleware/raw-body.js';

import { createEventsHandler, type EventsControllerOptions } from '../controllers/events.controller.js';

export function createEventsRoutes(options: EventsControllerOptions): Router {
  const router = Router();
  router.post('/', rawBody, createEventsHandler(options));
  return router;
}
