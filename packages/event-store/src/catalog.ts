/**
 * @intent-registry/event-store — Event Catalog.
 *
 * Maps each event type to a versioned zod schema for its payload.
 * The store itself accepts any event; the catalog is what readers and
 * health checks hold stored payloads against.
 */

import type { ZodTypeAny } from "zod";
import type { EventSource } from "@intent-registry/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "registry.intent.submitted") */
  readonly type: string;

  /** Positive integer, bumped whenever the payload shape changes */
  readonly version: number;

  readonly description: string;

  readonly source: EventSource;

  readonly payload: ZodTypeAny;
}

export type PayloadCheck =
  | { readonly ok: true }
  | { readonly ok: false; readonly issues: readonly string[] };

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Re-registering a type at the version it already has is a no-op.
   *
   * @throws CatalogError on a bad version or a version conflict
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }

    const existing = this._schemas.get(schema.type);
    if (existing === undefined) {
      this._schemas.set(schema.type, schema);
    } else if (existing.version !== schema.version) {
      throw new CatalogError(
        `Event type "${schema.type}" is already registered at version ${existing.version}`,
      );
    }
  }

  get(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  /** Registered types, sorted. */
  types(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  bySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Check a payload against its type's schema. Unknown types fail with
   * a single issue.
   */
  check(eventType: string, payload: unknown): PayloadCheck {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      return { ok: false, issues: [`Unknown event type "${eventType}"`] };
    }

    const result = schema.payload.safeParse(payload);
    if (result.success) {
      return { ok: true };
    }
    return {
      ok: false,
      issues: result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    };
  }

  validate(eventType: string, payload: unknown): boolean {
    return this.check(eventType, payload).ok;
  }

  get size(): number {
    return this._schemas.size;
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
