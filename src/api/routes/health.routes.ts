import { Router } from 'express';

import { createHealthHandler, type HealthProbe } from '../controllers/health.controller.js';

export function createHealthRoutes(probe?: HealthProbe): Router {
  const router = Router();
  router.get('/health', createHealthHandler(probe));
  return router;
}
