/**
 * @presign/event-store — Event catalog.
 *
 * A registry of known event types:
 * - Typed event definitions (type string → payload validator)
 * - Source attribution (which subsystem emits the event)
 * - Discovery (listing all known event types)
 *
 * A store configured with a catalog rejects unknown types and payloads
 * that fail validation, before anything is written.
 */

import type { EventMetadata } from "@presign/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "authorization.used") */
  readonly type: string;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventMetadata["source"];

  /** Returns true if the payload is valid for this event type */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * @throws CatalogError if the type is already registered
   */
  register(schema: EventSchema): void {
    if (this._schemas.has(schema.type)) {
      throw new CatalogError(`Event type "${schema.type}" is already registered`);
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /**
   * All registered event types, sorted.
   */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventMetadata["source"]): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate a payload against its registered schema.
   * Unregistered types are invalid.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
