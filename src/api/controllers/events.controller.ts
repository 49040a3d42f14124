import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type { EventSink } from '@services/queue/event.sink.js';

import { logger } from '@utils/logger.js';

import { parseEvents, SIGNATURE_HEADER, verifySignature } from './events.validator.js';

export interface EventsControllerOptions {
  sink: EventSink;
  /** When set, every delivery must carry a matching HMAC signature. */
  secret?: string;
}

export function createEventsHandler({ sink, secret }: EventsControllerOptions): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = req.rawBody ?? Buffer.alloc(0);
      if (secret && !verifySignature(body, req.headers[SIGNATURE_HEADER], secret)) {
        logger.warn('[http] rejected event delivery with bad signature');
        res.sendStatus(401);
        return;
      }
      const events = parseEvents(body);
      for (const event of events) {
        await sink.submit(event);
      }
      res.status(202).json({ accepted: events.length });
    } catch (err) {
      next(err);
    }
  };
}
