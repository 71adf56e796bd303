/**
 * ExecutionLedger — one execution record per executed intent.
 *
 * Rules:
 * - At most one record per intent; records are never removed
 * - The execution order index grows by one per execution
 * - Executing an intent also marks it executed in the IntentStore
 */

import type { Address, ExecutionRecord, IntentRecord } from "@intent-registry/types";
import { ZERO_ADDRESS, isExecutionRecord, normalizeAddress } from "@intent-registry/types";
import type { LogicalClock } from "./clock.js";
import { MAX_BULK_QUERY } from "./constants.js";
import { RegistryError } from "./errors.js";
import type { IntentStore } from "./intent-store.js";
import { lastN, sliceRange } from "./paging.js";

/**
 * Returned by a bulk fetch in place of a missing record.
 */
export const EMPTY_EXECUTION: ExecutionRecord = {
  intentId: 0,
  executor: ZERO_ADDRESS,
  executedAmount: 0n,
  avgPrice: 0n,
  createdAt: 0,
};

export interface ExecutionQueries {
  readonly count: number;
  get(intentId: number): ExecutionRecord;
  find(intentId: number): ExecutionRecord | undefined;
  getMany(intentIds: readonly number[]): readonly ExecutionRecord[];
  lastIds(n: number): readonly number[];
  idsInIndexRange(from: number, to: number): readonly number[];
  records(): readonly ExecutionRecord[];
}

export interface ExecutionResult {
  readonly intent: IntentRecord;
  readonly execution: ExecutionRecord;
}

export class ExecutionLedger implements ExecutionQueries {
  private readonly _records = new Map<number, ExecutionRecord>();
  private readonly _order: number[] = [];
  private readonly intents: IntentStore;

  constructor(intents: IntentStore) {
    this.intents = intents;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Execute a pending intent in full or in part.
   *
   * The executed amount must be in (0, requested]. A partial fill still
   * moves the intent to its terminal executed state.
   */
  execute(
    intentId: number,
    executedAmount: bigint,
    avgPrice: bigint,
    executor: Address,
    clock: LogicalClock,
  ): ExecutionResult {
    const intent = this.intents.get(intentId);

    if (intent.executed) {
      throw new RegistryError("ALREADY_EXECUTED", `Intent ${intentId} was already executed`);
    }
    if (intent.cancelled) {
      throw new RegistryError("ALREADY_CANCELLED", `Intent ${intentId} was cancelled`);
    }
    if (executedAmount <= 0n || executedAmount > intent.amount) {
      throw new RegistryError(
        "AMOUNT_OUT_OF_BOUNDS",
        `Executed amount ${executedAmount} must be in (0, ${intent.amount}]`,
      );
    }
    if (avgPrice < 0n) {
      throw new RegistryError("INVALID_PRICE", "Average price must not be negative");
    }

    const execution: ExecutionRecord = {
      intentId,
      executor: normalizeAddress(executor),
      executedAmount,
      avgPrice,
      createdAt: clock.now(),
    };

    const updated = this.intents.markExecuted(intentId, executedAmount);
    this._records.set(intentId, execution);
    this._order.push(intentId);

    return { intent: updated, execution };
  }

  /**
   * Undo the latest execution, which must be of `previous.id`, and put
   * the intent back as `previous`.
   */
  revert(previous: IntentRecord): void {
    if (this._order[this._order.length - 1] !== previous.id) {
      throw new RegistryError(
        "NOT_FOUND",
        `Intent ${previous.id} is not the latest execution`,
      );
    }
    this._order.pop();
    this._records.delete(previous.id);
    this.intents.restore(previous);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get count(): number {
    return this._order.length;
  }

  get(intentId: number): ExecutionRecord {
    const execution = this._records.get(intentId);
    if (execution === undefined) {
      throw new RegistryError("NOT_FOUND", `No execution for intent ${intentId}`);
    }
    return execution;
  }

  find(intentId: number): ExecutionRecord | undefined {
    return this._records.get(intentId);
  }

  /**
   * Fetch up to MAX_BULK_QUERY records. Missing ids yield EMPTY_EXECUTION
   * instead of failing, unlike the intent bulk fetch.
   */
  getMany(intentIds: readonly number[]): readonly ExecutionRecord[] {
    if (intentIds.length > MAX_BULK_QUERY) {
      throw new RegistryError(
        "BOUNDS_INVALID",
        `Bulk query of ${intentIds.length} ids exceeds the limit of ${MAX_BULK_QUERY}`,
        "capacity",
      );
    }
    return intentIds.map((id) => this._records.get(id) ?? EMPTY_EXECUTION);
  }

  lastIds(n: number): readonly number[] {
    return lastN(this._order, n);
  }

  idsInIndexRange(from: number, to: number): readonly number[] {
    return sliceRange(this._order, from, to);
  }

  /** All records in execution order. */
  records(): readonly ExecutionRecord[] {
    return this._order.map((id) => this.get(id));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  exportExecutions(): readonly ExecutionRecord[] {
    return this.records();
  }

  /**
   * Restore records in execution order. Each must reference an intent
   * already marked executed with the same amount, exactly once.
   */
  importExecutions(executions: readonly ExecutionRecord[]): void {
    if (this._order.length > 0) {
      throw new RegistryError("INVALID_SNAPSHOT", "Cannot import into a non-empty ledger");
    }

    const seen = new Set<number>();
    for (const execution of executions) {
      const intent = isExecutionRecord(execution)
        ? this.intents.find(execution.intentId)
        : undefined;
      if (
        intent === undefined ||
        !intent.executed ||
        intent.executedAmount !== execution.executedAmount ||
        seen.has(execution.intentId)
      ) {
        throw new RegistryError(
          "INVALID_SNAPSHOT",
          `Snapshot execution for intent ${String(execution.intentId)} does not match an executed intent`,
        );
      }
      seen.add(execution.intentId);
    }

    const executedCount = this.intents.records().filter((i) => i.executed).length;
    if (executedCount !== executions.length) {
      throw new RegistryError(
        "INVALID_SNAPSHOT",
        `Snapshot has ${executedCount} executed intents but ${executions.length} executions`,
      );
    }

    for (const execution of executions) {
      this._records.set(execution.intentId, {
        ...execution,
        executor: normalizeAddress(execution.executor),
      });
      this._order.push(execution.intentId);
    }
  }
}
