import type { Request, Response } from 'express';

export type HealthProbe = () => Promise<string>;

export function createHealthHandler(probe?: HealthProbe) {
  return async (_req: Request, res: Response): Promise<void> => {
    if (!probe) {
      res.status(200).json({ status: 'ok' });
      return;
    }
    try {
      const redis = await probe();
      res.status(200).json({ status: 'ok', redis });
    } catch {
      res.status(503).json({ status: 'degraded', redis: 'unreachable' });
    }
  };
}
