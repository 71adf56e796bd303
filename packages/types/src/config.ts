/**
 * Registry configuration — process-wide mutable state owned by one
 * registry instance.
 *
 * Invariants:
 * - 0 ≤ feeBps ≤ 10000
 * - minAmount ≤ maxAmount
 * - owner, controller and keeper are never the null identity
 */

import type { Address } from "./identity.js";

export interface RegistryConfig {
  readonly owner: Address;
  readonly controller: Address;
  readonly keeper: Address;
  readonly paused: boolean;

  /** Fee rate in basis points (1/10000th) */
  readonly feeBps: number;

  /** Inclusive lower bound on intent amounts */
  readonly minAmount: bigint;

  /** Inclusive upper bound on intent amounts */
  readonly maxAmount: bigint;
}
