import { BaseError } from './base-error.js';

export type DecodeFailure = 'MISSING_IDENTITY';

/**
 * Raised (as a value, not thrown) when a delivery-channel payload cannot be
 * turned into an alert. Only the order identity is mandatory.
 */
export class DecodeError extends BaseError {
  constructor(
    public readonly reason: DecodeFailure,
    message = 'Event payload has no order_id',
  ) {
    super('DECODE_ERROR', 422, message);
  }
}
