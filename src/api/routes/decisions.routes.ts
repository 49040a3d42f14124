import { Router } from 'express';

import type { ActionRelay } from '@services/relay/action.relay.js';

import { DecisionsController } from '../controllers/decisions.controller.js';

export function createDecisionsRoutes(relay: ActionRelay): Router {
  const controller = new DecisionsController(relay);
  const router = Router();
  router.post('/drain', controller.drain);
  return router;
}
