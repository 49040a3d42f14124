import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';

import { ValidationError } from '@core/errors/validation.error.js';

import type { AlertRuntime } from '@services/alert/alert.runtime.js';

const GestureSchema = z.discriminatedUnion('type', [
  z.object({ surfaceId: z.string().min(1), type: z.literal('drag'), offset: z.number().finite() }),
  z.object({ surfaceId: z.string().min(1), type: z.literal('release') }),
]);

export class AlertsController {
  constructor(private readonly runtime: AlertRuntime) {}

  current = (_req: Request, res: Response): void => {
    res.json(this.runtime.current());
  };

  gesture = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const parsed = GestureSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(
          'Invalid gesture',
          parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        );
      }
      const input = parsed.data;
      const surface = this.runtime.surfaces.surfaceFor(input.surfaceId);
      const result = input.type === 'drag' ? surface.drag(input.offset) : surface.release();
      res.json({ surfaceId: surface.id, result });
    } catch (err) {
      next(err);
    }
  };

  silence = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await this.runtime.silence();
      res.sendStatus(204);
    } catch (err) {
      next(err);
    }
  };
}
