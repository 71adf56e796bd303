/**
 * Cursor pagination over integer-keyed, ascending collections.
 *
 * Every paged list here is ordered by an integer: intent id, execution
 * position, global event position or stream version. A cursor names the
 * key it was issued for and the last key served, as base64url JSON
 * `{ k, a }`. List endpoints return `{ data, pagination: { cursor, hasMore } }`.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

export interface DecodedCursor {
  readonly key: string;
  readonly after: number;
}

/**
 * A cursor that does not decode, or was issued for another key.
 * The error handler answers it with 400.
 */
export class InvalidCursorError extends Error {
  constructor(cursor: string) {
    super(`Invalid cursor "${cursor}"`);
    this.name = "InvalidCursorError";
  }
}

// =============================================================================
// Cursor Encoding
// =============================================================================

export function encodeCursor(key: string, after: number): string {
  return Buffer.from(JSON.stringify({ k: key, a: after })).toString("base64url");
}

/**
 * @returns undefined unless the cursor holds a key name and a
 *   non-negative integer
 */
export function decodeCursor(cursor: string): DecodedCursor | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }

  if (
    typeof data === "object" &&
    data !== null &&
    "k" in data &&
    "a" in data &&
    typeof data.k === "string" &&
    typeof data.a === "number" &&
    Number.isSafeInteger(data.a) &&
    data.a >= 0
  ) {
    return { key: data.k, after: data.a };
  }
  return undefined;
}

// =============================================================================
// Paging
// =============================================================================

/**
 * One page of `items`, which must be in ascending `keyOf` order.
 *
 * @throws InvalidCursorError for a cursor that fails to decode or
 *   belongs to a different key
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  keyOf: (item: T) => number,
  keyName: string,
): PaginatedResponse<T> {
  let start = 0;
  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded === undefined || decoded.key !== keyName) {
      throw new InvalidCursorError(query.cursor);
    }
    const after = decoded.after;
    start = items.findIndex((item) => keyOf(item) > after);
    if (start === -1) {
      start = items.length;
    }
  }

  const data = items.slice(start, start + query.limit);
  const hasMore = start + data.length < items.length;
  const last = data.at(-1);

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(keyName, keyOf(last)) : null,
      hasMore,
    },
  };
}
