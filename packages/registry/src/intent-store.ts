/**
 * IntentStore — owns intent records and their secondary indexes.
 *
 * Rules:
 * - Ids are assigned from a counter (1, 2, 3, ...); 0 is never issued
 * - Records are never deleted; a record changes at most once, to
 *   executed or to cancelled
 * - Indexes (global order, by submitter, by symbol) only grow;
 *   cancellation and execution do not remove entries
 * - Every mutation validates fully before it writes anything
 */

import type {
  Address,
  IntentInput,
  IntentRecord,
  Side,
  SymbolHash,
} from "@intent-registry/types";
import {
  isIntentRecord,
  isSide,
  isSymbolHash,
  normalizeAddress,
  normalizeSymbol,
} from "@intent-registry/types";
import type { LogicalClock } from "./clock.js";
import { FEE_DENOMINATOR, MAX_BULK_QUERY, MAX_INTENTS } from "./constants.js";
import { RegistryError } from "./errors.js";
import { isCancelAuthorized } from "./access-policy.js";
import { lastN, sliceRange } from "./paging.js";

// =============================================================================
// Rules
// =============================================================================

/**
 * The slice of registry config that governs submission.
 */
export interface SubmissionRules {
  readonly minAmount: bigint;
  readonly maxAmount: bigint;
  readonly feeBps: number;
}

/**
 * Fee owed for an amount: floor(amount * feeBps / 10000).
 */
export function requiredFee(amount: bigint, feeBps: number): bigint {
  return (amount * BigInt(feeBps)) / BigInt(FEE_DENOMINATOR);
}

function validateInput(input: IntentInput, rules: SubmissionRules): Side {
  if (!isSide(input.side)) {
    throw new RegistryError(
      "INVALID_SIDE",
      `Side must be 1 (buy) or 2 (sell), got ${String(input.side)}`,
    );
  }
  if (input.amount === 0n) {
    throw new RegistryError("ZERO_AMOUNT", "Amount must be greater than zero");
  }
  if (input.amount < rules.minAmount || input.amount > rules.maxAmount) {
    throw new RegistryError(
      "AMOUNT_OUT_OF_BOUNDS",
      `Amount ${input.amount} is outside [${rules.minAmount}, ${rules.maxAmount}]`,
    );
  }
  if (input.limitPrice < 0n) {
    throw new RegistryError("INVALID_PRICE", "Limit price must not be negative");
  }
  if (!isSymbolHash(input.symbol)) {
    throw new RegistryError(
      "INVALID_SYMBOL",
      `Symbol must be a 32-byte hex hash, got '${String(input.symbol)}'`,
    );
  }
  return input.side;
}

// =============================================================================
// Read-only view
// =============================================================================

/**
 * The query surface of the store. This is what the registry exposes.
 */
export interface IntentQueries {
  readonly count: number;
  get(intentId: number): IntentRecord;
  find(intentId: number): IntentRecord | undefined;
  getMany(intentIds: readonly number[]): readonly IntentRecord[];
  idAt(index: number): number;
  idsInIndexRange(from: number, to: number): readonly number[];
  lastIds(n: number): readonly number[];
  idsBySubmitter(submitter: Address): readonly number[];
  idsBySymbol(symbol: SymbolHash): readonly number[];
  idsInSequenceRange(fromSeq: number, toSeq: number): readonly number[];
  records(): readonly IntentRecord[];
}

// =============================================================================
// Store
// =============================================================================

export class IntentStore implements IntentQueries {
  private readonly _records = new Map<number, IntentRecord>();
  private readonly _order: number[] = [];
  private readonly _bySubmitter = new Map<Address, number[]>();
  private readonly _bySymbol = new Map<SymbolHash, number[]>();
  private readonly _capacity: number;
  private _lastId = 0;

  constructor(capacity: number = MAX_INTENTS) {
    if (!Number.isInteger(capacity) || capacity < 1 || capacity > MAX_INTENTS) {
      throw new RegistryError(
        "BOUNDS_INVALID",
        `Capacity must be an integer in [1, ${MAX_INTENTS}], got ${capacity}`,
      );
    }
    this._capacity = capacity;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Validate and store a single intent.
   *
   * Checks, in order: side, zero amount, bounds, capacity, fee.
   * The clock is read only once every check has passed.
   */
  submit(
    input: IntentInput,
    submitter: Address,
    feePaid: bigint,
    rules: SubmissionRules,
    clock: LogicalClock,
  ): IntentRecord {
    const side = validateInput(input, rules);

    if (this._order.length >= this._capacity) {
      throw new RegistryError(
        "CAPACITY_EXCEEDED",
        `Registry already holds the maximum of ${this._capacity} intents`,
      );
    }

    const fee = requiredFee(input.amount, rules.feeBps);
    if (feePaid < fee) {
      throw new RegistryError(
        "INSUFFICIENT_FEE",
        `Fee ${feePaid} is below the required ${fee}`,
      );
    }

    return this.append(side, input, submitter, clock.now());
  }

  /**
   * Validate every entry, then store all of them or none.
   *
   * Ids are assigned in array order and every entry shares one
   * sequence marker.
   */
  submitBatch(
    entries: readonly IntentInput[],
    submitter: Address,
    totalFeePaid: bigint,
    rules: SubmissionRules,
    clock: LogicalClock,
  ): readonly IntentRecord[] {
    if (entries.length === 0) {
      throw new RegistryError("BOUNDS_INVALID", "Batch must contain at least one entry");
    }

    const validated = entries.map((entry) => ({
      side: validateInput(entry, rules),
      entry,
    }));

    if (this._order.length + entries.length > this._capacity) {
      throw new RegistryError(
        "CAPACITY_EXCEEDED",
        `Batch of ${entries.length} would exceed the maximum of ${this._capacity} intents (currently ${this._order.length})`,
      );
    }

    const fee = entries.reduce(
      (sum, entry) => sum + requiredFee(entry.amount, rules.feeBps),
      0n,
    );
    if (totalFeePaid < fee) {
      throw new RegistryError(
        "INSUFFICIENT_FEE",
        `Fee ${totalFeePaid} is below the required ${fee} for ${entries.length} entries`,
      );
    }

    const createdAt = clock.now();
    return validated.map(({ side, entry }) =>
      this.append(side, entry, submitter, createdAt),
    );
  }

  /**
   * Cancel a pending intent. Allowed for the submitter and the owner.
   */
  cancel(intentId: number, caller: Address, owner: Address): IntentRecord {
    const intent = this.get(intentId);

    if (intent.executed) {
      throw new RegistryError("ALREADY_EXECUTED", `Intent ${intentId} was already executed`);
    }
    if (intent.cancelled) {
      throw new RegistryError("ALREADY_CANCELLED", `Intent ${intentId} was already cancelled`);
    }
    if (!isCancelAuthorized(intent, caller, owner)) {
      throw new RegistryError(
        "UNAUTHORIZED",
        `${caller} may not cancel intent ${intentId}`,
      );
    }

    const updated: IntentRecord = { ...intent, cancelled: true };
    this._records.set(intentId, updated);
    return updated;
  }

  /**
   * Record a fill on a pending intent. The execution ledger performs the
   * state and amount checks before calling this.
   */
  markExecuted(intentId: number, executedAmount: bigint): IntentRecord {
    const intent = this.get(intentId);
    const updated: IntentRecord = { ...intent, executed: true, executedAmount };
    this._records.set(intentId, updated);
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get count(): number {
    return this._order.length;
  }

  get capacity(): number {
    return this._capacity;
  }

  get(intentId: number): IntentRecord {
    const intent = this._records.get(intentId);
    if (intent === undefined) {
      throw new RegistryError("NOT_FOUND", `Intent ${intentId} not found`);
    }
    return intent;
  }

  find(intentId: number): IntentRecord | undefined {
    return this._records.get(intentId);
  }

  /**
   * Fetch up to MAX_BULK_QUERY intents. Fails on the first missing id;
   * there are no partial results.
   */
  getMany(intentIds: readonly number[]): readonly IntentRecord[] {
    if (intentIds.length > MAX_BULK_QUERY) {
      throw new RegistryError(
        "BOUNDS_INVALID",
        `Bulk query of ${intentIds.length} ids exceeds the limit of ${MAX_BULK_QUERY}`,
        "capacity",
      );
    }
    return intentIds.map((id) => this.get(id));
  }

  /** Id at a 0-based position in submission order. */
  idAt(index: number): number {
    const id = Number.isInteger(index) ? this._order[index] : undefined;
    if (id === undefined) {
      throw new RegistryError(
        "BOUNDS_INVALID",
        `Index ${index} is outside [0, ${this._order.length - 1}]`,
      );
    }
    return id;
  }

  idsInIndexRange(from: number, to: number): readonly number[] {
    return sliceRange(this._order, from, to);
  }

  lastIds(n: number): readonly number[] {
    return lastN(this._order, n);
  }

  idsBySubmitter(submitter: Address): readonly number[] {
    return [...(this._bySubmitter.get(normalizeAddress(submitter)) ?? [])];
  }

  idsBySymbol(symbol: SymbolHash): readonly number[] {
    return [...(this._bySymbol.get(normalizeSymbol(symbol)) ?? [])];
  }

  /**
   * Ids whose sequence marker lies in [fromSeq, toSeq]. Linear scan.
   */
  idsInSequenceRange(fromSeq: number, toSeq: number): readonly number[] {
    const ids: number[] = [];
    for (const id of this._order) {
      const intent = this.get(id);
      if (intent.createdAt >= fromSeq && intent.createdAt <= toSeq) {
        ids.push(id);
      }
    }
    return ids;
  }

  /** All records in submission order. */
  records(): readonly IntentRecord[] {
    return this._order.map((id) => this.get(id));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  exportIntents(): readonly IntentRecord[] {
    return this.records();
  }

  /**
   * Restore records into an empty store. Ids must run 1..n in order.
   */
  importIntents(intents: readonly IntentRecord[]): void {
    if (this._order.length > 0) {
      throw new RegistryError("INVALID_SNAPSHOT", "Cannot import into a non-empty store");
    }
    if (intents.length > this._capacity) {
      throw new RegistryError(
        "INVALID_SNAPSHOT",
        `Snapshot holds ${intents.length} intents, capacity is ${this._capacity}`,
      );
    }

    intents.forEach((intent, i) => {
      if (!isIntentRecord(intent) || intent.id !== i + 1) {
        throw new RegistryError(
          "INVALID_SNAPSHOT",
          `Snapshot intent at position ${i} is malformed or out of order`,
        );
      }
    });

    for (const intent of intents) {
      this.index({
        ...intent,
        submitter: normalizeAddress(intent.submitter),
        symbol: normalizeSymbol(intent.symbol),
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rollback
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Drop every intent stored after the first `count`, with its index
   * entries. The registry uses this to undo a submission it could not
   * announce.
   */
  truncate(count: number): void {
    while (this._order.length > count) {
      const id = this._order.pop();
      if (id === undefined) break;
      const intent = this._records.get(id);
      this._records.delete(id);
      if (intent !== undefined) {
        popFrom(this._bySubmitter, intent.submitter);
        popFrom(this._bySymbol, intent.symbol);
      }
    }
    this._lastId = this._order[this._order.length - 1] ?? 0;
  }

  /**
   * Put a record back as it was before an undone cancel or execution.
   */
  restore(intent: IntentRecord): void {
    this.get(intent.id);
    this._records.set(intent.id, intent);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private append(
    side: Side,
    input: IntentInput,
    submitter: Address,
    createdAt: number,
  ): IntentRecord {
    const intent: IntentRecord = {
      id: this._lastId + 1,
      submitter: normalizeAddress(submitter),
      side,
      amount: input.amount,
      limitPrice: input.limitPrice,
      symbol: normalizeSymbol(input.symbol),
      createdAt,
      executedAmount: 0n,
      executed: false,
      cancelled: false,
    };
    this.index(intent);
    return intent;
  }

  private index(intent: IntentRecord): void {
    this._records.set(intent.id, intent);
    this._order.push(intent.id);
    pushTo(this._bySubmitter, intent.submitter, intent.id);
    pushTo(this._bySymbol, intent.symbol, intent.id);
    this._lastId = intent.id;
  }
}

function pushTo<K>(index: Map<K, number[]>, key: K, id: number): void {
  const ids = index.get(key);
  if (ids === undefined) {
    index.set(key, [id]);
  } else {
    ids.push(id);
  }
}

function popFrom<K>(index: Map<K, number[]>, key: K): void {
  const ids = index.get(key);
  if (ids === undefined) return;
  ids.pop();
  if (ids.length === 0) index.delete(key);
}
