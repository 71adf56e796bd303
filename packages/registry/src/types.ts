/**
 * Registry construction and persistence types.
 */

import type { Address, ExecutionRecord, IntentRecord, RegistryConfig } from "@intent-registry/types";
import type { LogicalClock } from "./clock.js";
import type { NotificationSink } from "./notifications.js";
import type { TransferPort } from "./transfer.js";

// ─── Construction ────────────────────────────────────────────────────────

export interface RegistryOptions {
  readonly owner: Address;
  readonly controller: Address;
  readonly keeper: Address;

  /** Default 0 */
  readonly feeBps?: number | undefined;

  /** Default 1 */
  readonly minAmount?: bigint | undefined;

  /** Default 2^256 - 1 */
  readonly maxAmount?: bigint | undefined;

  /** Default false */
  readonly paused?: boolean | undefined;

  /** Intent capacity. May be lowered below MAX_INTENTS, never raised. */
  readonly maxIntents?: number | undefined;
}

/**
 * Collaborators supplied by the host.
 */
export interface RegistryDeps {
  readonly sink: NotificationSink;
  readonly transfer: TransferPort;

  /** Default: a SequenceClock continuing after the highest known marker */
  readonly clock?: LogicalClock | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Snapshot of the whole registry. Amounts are bigints, so convert with
 * snapshotToJson() before JSON.stringify.
 * Restore with Registry.fromSnapshot().
 */
export interface RegistrySnapshot {
  readonly version: 1;
  readonly config: RegistryConfig;
  readonly maxIntents: number;
  readonly treasuryBalance: bigint;

  /** In id order */
  readonly intents: readonly IntentRecord[];

  /** In execution order */
  readonly executions: readonly ExecutionRecord[];

  readonly createdAt: string;
}
