/**
 * Event Types
 *
 * Every observable effect of the system (a nonce consumed, value moved,
 * supply minted) is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Events are replayable: same events → same state
 * - Payloads are JSON: integers travel as decimal strings
 */

/**
 * Which subsystem emitted an event.
 */
export type EventSource = "authorization" | "ledger";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who submitted the operation that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups all events emitted by one operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`
 * (e.g. "authorization.used", "ledger.transfer").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
