/**
 * Intent Types
 *
 * An Intent is a Buy/Sell signal submitted by the controller and later
 * either executed by the keeper or cancelled.
 *
 * Lifecycle: pending → executed | cancelled (both terminal).
 *
 * Rules:
 * - Ids are 1-based and monotonically increasing; 0 means "absent"
 * - `executed` and `cancelled` are never both true
 * - Records are never deleted
 * - Amounts and prices are unsigned integers in the smallest unit
 */

import type { Address, SymbolHash } from "./identity.js";

/** Side codes. */
export const SIDE_BUY = 1;
export const SIDE_SELL = 2;

export type Side = typeof SIDE_BUY | typeof SIDE_SELL;

/** Derived lifecycle state of an intent. */
export type IntentState = "pending" | "executed" | "cancelled";

export interface IntentRecord {
  /** 1-based monotonically increasing id */
  readonly id: number;

  /** Who submitted the intent (the controller at submission time) */
  readonly submitter: Address;

  readonly side: Side;

  /** Requested amount in the smallest currency unit */
  readonly amount: bigint;

  /** Limit price, unscaled */
  readonly limitPrice: bigint;

  readonly symbol: SymbolHash;

  /** Logical-clock marker of the submitting transaction (never 0) */
  readonly createdAt: number;

  /** 0 until executed */
  readonly executedAmount: bigint;

  readonly executed: boolean;
  readonly cancelled: boolean;
}

/**
 * Record of a single execution. At most one exists per intent.
 */
export interface ExecutionRecord {
  /** The intent this execution belongs to (0 for a zero-valued record) */
  readonly intentId: number;
  readonly executor: Address;
  readonly executedAmount: bigint;
  readonly avgPrice: bigint;
  readonly createdAt: number;
}

/**
 * One entry of a batch submission.
 */
export interface IntentInput {
  readonly side: number;
  readonly amount: bigint;
  readonly limitPrice: bigint;
  readonly symbol: SymbolHash;
}

export function intentState(intent: IntentRecord): IntentState {
  if (intent.executed) return "executed";
  if (intent.cancelled) return "cancelled";
  return "pending";
}
