import type { NextFunction, Request, Response } from 'express';

import type { ActionRelay } from '@services/relay/action.relay.js';
import { encodeHandoff } from '@services/relay/handoff.codec.js';

/** Pull side of the relay for a consumer that lives in another process. */
export class DecisionsController {
  constructor(private readonly relay: ActionRelay) {}

  drain = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const pending = await this.relay.drainPending();
      if (!pending) {
        res.sendStatus(204);
        return;
      }
      res.json(encodeHandoff(pending));
    } catch (err) {
      next(err);
    }
  };
}
