import type { RequestHandler } from 'express';
import { raw } from 'express';

const parseRaw = raw({ type: '*/*', limit: '256kb' });

/** Keeps the exact bytes of the body for signature checks; parsing is left to the handler. */
export const rawBody: RequestHandler = (req, res, next) => {
  parseRaw(req, res, (err?: unknown) => {
    if (err) return next(err);
    req.rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    next();
  });
};
