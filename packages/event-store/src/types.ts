/**
 * @intent-registry/event-store — Core types.
 *
 * The log is one global sequence of stored events. Each event also
 * belongs to a stream ("intent-<id>", "treasury", "config"); a stream is
 * a view over the global sequence in append order.
 *
 * Positions and versions are 1-based and gapless. Nothing is ever
 * updated or removed.
 */

import type { DomainEvent } from "@intent-registry/types";

// =============================================================================
// Stored Event
// =============================================================================

export interface StoredEvent {
  readonly event: DomainEvent;

  readonly streamId: string;

  /** Position within the stream */
  readonly version: number;

  /** Position in the global log */
  readonly globalPosition: number;

  /** ISO 8601, set by the store */
  readonly appendedAt: string;

  /** Hex SHA-256 linking this event to `previousHash` */
  readonly hash: string;

  /** Hash of the event at `globalPosition - 1`, or GENESIS_HASH */
  readonly previousHash: string;
}

/** The hashed content of a stored event. */
export type UnhashedStoredEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append
// =============================================================================

export interface AppendOptions {
  /**
   * Stream version the writer last observed, 0 for a stream it expects
   * to be new. Omit to append unconditionally.
   */
  readonly expectedVersion?: number | undefined;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;

  /** Global position of the last appended event */
  readonly globalPosition: number;
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Filters shared by stream and global reads.
 *
 * `after` is exclusive: a stream version for `read`, a global position
 * for `readAll`. `type` is applied before `limit`.
 */
export interface EventQuery {
  readonly after?: number | undefined;
  readonly type?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// Integrity
// =============================================================================

export interface ChainBreak {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Last position whose link and hash check out; 0 when none do */
  readonly lastVerifiedPosition: number;

  /** At most one entry: verification stops at the first break */
  readonly errors: readonly ChainBreak[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /**
   * Append events to one stream. All of them land, contiguously, or none
   * do.
   *
   * @throws EventStoreError on an empty batch, a bad stream id or a
   *   version mismatch
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream. Empty for a stream that was never written. */
  read(streamId: string, query?: EventQuery): readonly StoredEvent[];

  /** Events of every stream in global order. */
  readAll(query?: EventQuery): readonly StoredEvent[];

  /** Number of events in the stream. */
  streamVersion(streamId: string): number;

  /** Number of events in the log. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_QUERY";

export class EventStoreError extends Error {
  public readonly code: EventStoreErrorCode;
  public readonly streamId: string | undefined;

  constructor(code: EventStoreErrorCode, message: string, streamId?: string) {
    super(message);
    this.name = "EventStoreError";
    this.code = code;
    this.streamId = streamId;
  }
}
