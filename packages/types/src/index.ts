/**
 * @intent-registry/types — Shared domain types for the intent registry.
 *
 * These types are used across all registry packages:
 * - Identities (addresses, symbol hashes)
 * - Intent and execution records
 * - Registry configuration
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Identity
export type { Address, SymbolHash } from "./identity.js";
export {
  ZERO_ADDRESS,
  isAddress,
  isSymbolHash,
  normalizeAddress,
  normalizeSymbol,
  sameAddress,
  isZeroAddress,
} from "./identity.js";

// Intent types
export type {
  Side,
  IntentState,
  IntentRecord,
  ExecutionRecord,
  IntentInput,
} from "./intent.js";
export { SIDE_BUY, SIDE_SELL, intentState } from "./intent.js";

// Config
export type { RegistryConfig } from "./config.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isSide,
  isIntentRecord,
  isExecutionRecord,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
