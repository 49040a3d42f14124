import crypto from 'crypto';

import { z } from 'zod';

import { ValidationError } from '@core/errors/validation.error.js';

import type { RawEvent } from '../../types/index.js';

export const SIGNATURE_HEADER = 'x-signature-256';

export function signBody(body: Buffer | string, secret: string): string {
  return 'sha256=' + crypto.createHmac('sha256', secret).update(body).digest('hex');
}

export function verifySignature(body: Buffer, signature: unknown, secret: string): boolean {
  if (typeof signature !== 'string') return false;
  const expected = Buffer.from(signBody(body, secret));
  const received = Buffer.from(signature);
  if (expected.length !== received.length) return false;
  return crypto.timingSafeEqual(received, expected);
}

const EventSchema = z.record(z.unknown());
const EventsBodySchema = z.union([EventSchema, z.array(EventSchema).min(1)]);

export function parseEvents(body: Buffer | undefined): RawEvent[] {
  const text = body?.toString('utf8').trim() ?? '';
  if (!text) throw new ValidationError('Request body is empty');

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ValidationError('Request body is not valid JSON');
  }

  const parsed = EventsBodySchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(
      'Expected an event object or a non-empty array of event objects',
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return Array.isArray(parsed.data) ? parsed.data : [parsed.data];
}
