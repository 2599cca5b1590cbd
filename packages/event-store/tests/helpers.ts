/**
 * Shared event builders for event-store tests.
 */

import type { DomainEvent, EventMetadata } from "@presign/types";

export const TS = "2025-01-01T00:00:00.000Z";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = { type },
  source: EventMetadata["source"] = "authorization",
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: TS,
      actor: "test",
      correlationId: `corr-${counter}`,
      source,
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}
