/**
 * @intent-registry/event-store — Hash chain over the global log.
 *
 *   hash(n) = sha256(hash(n - 1) + "\n" + JCS(content(n)))
 *   hash(0) = GENESIS_HASH
 *
 * content(n) is every stored field except the two hashes, canonicalized
 * per RFC 8785 so key order never changes a hash. Editing, dropping or
 * reordering any event breaks every link after it.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";

/** `previousHash` of the event at position 1. */
export const GENESIS_HASH = "0".repeat(64);

export function computeEventHash(
  stored: UnhashedStoredEvent,
  previousHash: string,
): string {
  const content = canonicalize({
    streamId: stored.streamId,
    version: stored.version,
    globalPosition: stored.globalPosition,
    appendedAt: stored.appendedAt,
    event: {
      type: stored.event.type,
      metadata: stored.event.metadata,
      payload: stored.event.payload,
    },
  });

  return createHash("sha256")
    .update(previousHash)
    .update("\n")
    .update(content)
    .digest("hex");
}

/**
 * Walk the log from position 1 and stop at the first event whose
 * position, link or hash is wrong.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const stored of events) {
    const reason = findBreak(stored, lastVerifiedPosition + 1, previousHash);
    if (reason !== undefined) {
      return {
        valid: false,
        lastVerifiedPosition,
        errors: [{ position: lastVerifiedPosition + 1, reason }],
      };
    }

    previousHash = stored.hash;
    lastVerifiedPosition = stored.globalPosition;
  }

  return { valid: true, lastVerifiedPosition, errors: [] };
}

function findBreak(
  stored: StoredEvent,
  position: number,
  previousHash: string,
): string | undefined {
  if (stored.globalPosition !== position) {
    return `Expected position ${position}, found ${stored.globalPosition}`;
  }
  if (stored.previousHash !== previousHash) {
    return `Event at position ${position} does not link to its predecessor`;
  }
  if (stored.hash !== computeEventHash(stored, stored.previousHash)) {
    return `Event at position ${position} does not match its hash`;
  }
  return undefined;
}
