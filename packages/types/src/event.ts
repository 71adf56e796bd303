/**
 * Event Types
 *
 * Every state change in the registry is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which subsystem)
 * - Payloads are JSON-safe: bigints travel as decimal strings
 * - No UPDATE, no DELETE: only new events
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events across systems */
  readonly correlationId: string;

  /** Which registry subsystem emitted this event */
  readonly source: EventSource;
}

export type EventSource = "intents" | "executions" | "treasury" | "config";

/**
 * A domain event. Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "registry.intent.submitted") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
