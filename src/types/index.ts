export type RawEvent = Record<string, unknown>;

/** Cross-process handoff bag: flat string fields, same names as the inbound payload. */
export type HandoffBag = Record<string, string>;

export interface AlertEventJob {
  event: RawEvent;
  receivedAt: string;
}
