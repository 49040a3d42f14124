import type { EventReceiver } from '@services/alert/event.receiver.js';

import type { RawEvent } from '../../types/index.js';

/** Where accepted webhook events go before the receiver sees them. */
export interface EventSink {
  submit(event: RawEvent): Promise<void>;
}

/** Hands events straight to the receiver, in arrival order. */
export class DirectEventSink implements EventSink {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly receiver: EventReceiver) {}

  submit(event: RawEvent): Promise<void> {
    const receivedAt = new Date();
    const next = this.tail.then(() => this.receiver.receive(event, receivedAt));
    this.tail = next.catch(() => undefined);
    return next.then(() => undefined);
  }
}
