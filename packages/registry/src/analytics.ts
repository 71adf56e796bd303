/**
 * RegistryAnalytics — aggregate queries over the intent and execution
 * indexes.
 *
 * Every query is a linear scan over the current records. Nothing is
 * cached; results always reflect committed state.
 */

import type { Address, IntentRecord, Side, SymbolHash } from "@intent-registry/types";
import { SIDE_BUY, SIDE_SELL, normalizeAddress, normalizeSymbol } from "@intent-registry/types";
import { FEE_DENOMINATOR } from "./constants.js";
import type { ExecutionQueries } from "./execution-ledger.js";
import type { IntentQueries } from "./intent-store.js";

export interface SideBreakdown<T> {
  readonly buy: T;
  readonly sell: T;
}

export interface RegistrySummary {
  readonly totalIntents: number;
  readonly pending: number;
  readonly executed: number;
  readonly cancelled: number;
  readonly executions: number;
  readonly totalVolume: bigint;
  readonly executedVolume: bigint;
  readonly volumeBySide: SideBreakdown<bigint>;
  readonly countBySide: SideBreakdown<number>;
  readonly fillRateBps: number;
  readonly cancellationRateBps: number;
  readonly executionRateBps: number;
}

function ratioBps(numerator: bigint, denominator: bigint): number {
  if (denominator === 0n) return 0;
  return Number((numerator * BigInt(FEE_DENOMINATOR)) / denominator);
}

export class RegistryAnalytics {
  private readonly intents: IntentQueries;
  private readonly executions: ExecutionQueries;

  constructor(intents: IntentQueries, executions: ExecutionQueries) {
    this.intents = intents;
    this.executions = executions;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Counts
  // ───────────────────────────────────────────────────────────────────────

  countPending(): number {
    return this.count((i) => !i.executed && !i.cancelled);
  }

  countExecuted(): number {
    return this.count((i) => i.executed);
  }

  countCancelled(): number {
    return this.count((i) => i.cancelled);
  }

  countBySide(): SideBreakdown<number> {
    return {
      buy: this.count((i) => i.side === SIDE_BUY),
      sell: this.count((i) => i.side === SIDE_SELL),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Volume
  // ───────────────────────────────────────────────────────────────────────

  /** Sum of requested amounts over every intent, whatever its state. */
  totalVolume(): bigint {
    return this.sum(() => true, (i) => i.amount);
  }

  /** Sum of executed amounts, from the execution records. */
  executedVolume(): bigint {
    return this.executions
      .records()
      .reduce((total, e) => total + e.executedAmount, 0n);
  }

  volumeBySide(): SideBreakdown<bigint> {
    return {
      buy: this.sideVolume(SIDE_BUY),
      sell: this.sideVolume(SIDE_SELL),
    };
  }

  volumeBySymbol(symbol: SymbolHash): bigint {
    const key = normalizeSymbol(symbol);
    return this.sum((i) => i.symbol === key, (i) => i.amount);
  }

  volumeBySubmitter(submitter: Address): bigint {
    const key = normalizeAddress(submitter);
    return this.sum((i) => i.submitter === key, (i) => i.amount);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rates (basis points, floored)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Executed amount over requested amount, across executed intents only.
   * 0 when nothing has executed.
   */
  fillRateBps(): number {
    const executed = (i: IntentRecord): boolean => i.executed;
    return ratioBps(
      this.sum(executed, (i) => i.executedAmount),
      this.sum(executed, (i) => i.amount),
    );
  }

  cancellationRateBps(): number {
    return ratioBps(BigInt(this.countCancelled()), BigInt(this.intents.count));
  }

  executionRateBps(): number {
    return ratioBps(BigInt(this.countExecuted()), BigInt(this.intents.count));
  }

  summary(): RegistrySummary {
    return {
      totalIntents: this.intents.count,
      pending: this.countPending(),
      executed: this.countExecuted(),
      cancelled: this.countCancelled(),
      executions: this.executions.count,
      totalVolume: this.totalVolume(),
      executedVolume: this.executedVolume(),
      volumeBySide: this.volumeBySide(),
      countBySide: this.countBySide(),
      fillRateBps: this.fillRateBps(),
      cancellationRateBps: this.cancellationRateBps(),
      executionRateBps: this.executionRateBps(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private sideVolume(side: Side): bigint {
    return this.sum((i) => i.side === side, (i) => i.amount);
  }

  private count(predicate: (intent: IntentRecord) => boolean): number {
    let n = 0;
    for (const intent of this.intents.records()) {
      if (predicate(intent)) n++;
    }
    return n;
  }

  private sum(
    predicate: (intent: IntentRecord) => boolean,
    value: (intent: IntentRecord) => bigint,
  ): bigint {
    let total = 0n;
    for (const intent of this.intents.records()) {
      if (predicate(intent)) total += value(intent);
    }
    return total;
  }
}
