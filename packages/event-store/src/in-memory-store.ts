/**
 * @intent-registry/event-store — In-memory EventStore.
 *
 * One array holds the global log; each stream keeps the global
 * positions of its events. State is lost on process exit.
 */

import type { DomainEvent } from "@intent-registry/types";
import type {
  AppendOptions,
  AppendResult,
  EventQuery,
  EventStore,
  EventStoreIntegrityResult,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt`. Default: the wall clock */
  readonly now?: (() => Date) | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _log: StoredEvent[] = [];
  private readonly _streams = new Map<string, number[]>();
  private readonly _now: () => Date;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._now = options.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options: AppendOptions = {},
  ): AppendResult {
    checkStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        `Nothing to append to stream "${streamId}"`,
        streamId,
      );
    }

    const positions = this._streams.get(streamId) ?? [];
    const version = positions.length;
    if (options.expectedVersion !== undefined && options.expectedVersion !== version) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${version}, expected ${options.expectedVersion}`,
        streamId,
      );
    }

    // Hash the whole batch before touching the log
    const appendedAt = this._now().toISOString();
    const staged: StoredEvent[] = [];
    let previousHash = this._log.at(-1)?.hash ?? GENESIS_HASH;

    events.forEach((event, i) => {
      const unhashed: UnhashedStoredEvent = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: version + i + 1,
        globalPosition: this._log.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(unhashed, previousHash);
      staged.push({ ...unhashed, hash, previousHash });
      previousHash = hash;
    });

    this._log.push(...staged);
    positions.push(...staged.map((s) => s.globalPosition));
    this._streams.set(streamId, positions);

    return {
      streamId,
      fromVersion: version + 1,
      toVersion: positions.length,
      globalPosition: this._log.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, query: EventQuery = {}): readonly StoredEvent[] {
    checkStreamId(streamId);

    const positions = this._streams.get(streamId) ?? [];
    const events = positions
      .slice(checkCount("after", query.after))
      .flatMap((position) => this._log[position - 1] ?? []);

    return applyQuery(events, query);
  }

  readAll(query: EventQuery = {}): readonly StoredEvent[] {
    return applyQuery(this._log.slice(checkCount("after", query.after)), query);
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }
}

function checkStreamId(streamId: string): void {
  if (streamId.trim() === "") {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream id must not be blank");
  }
}

function checkCount(name: string, value: number | undefined): number {
  if (value === undefined) {
    return 0;
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new EventStoreError(
      "INVALID_QUERY",
      `${name} must be a non-negative integer, got ${value}`,
    );
  }
  return value;
}

function applyQuery(
  events: readonly StoredEvent[],
  query: EventQuery,
): readonly StoredEvent[] {
  const matching =
    query.type === undefined ? events : events.filter((e) => e.event.type === query.type);
  return query.limit === undefined
    ? matching
    : matching.slice(0, checkCount("limit", query.limit));
}
