/**
 * @intent-registry/registry — Intent registry core.
 *
 * Provides:
 * - Registry facade (role checks, pause gate, notifications)
 * - IntentStore and ExecutionLedger with their indexes
 * - TreasuryAccount with guarded withdrawals
 * - AccessPolicy predicates and RegistryAnalytics scans
 * - Logical clocks, transfer port, notification sinks
 *
 * @packageDocumentation
 */

// Facade
export { Registry } from "./registry.js";
export type { RegistryOptions, RegistryDeps, RegistrySnapshot } from "./types.js";
export { snapshotToJson, snapshotFromJson } from "./snapshot-json.js";
export type {
  RegistrySnapshotJson,
  IntentRecordJson,
  ExecutionRecordJson,
  RegistryConfigJson,
} from "./snapshot-json.js";

// Components
export { IntentStore, requiredFee } from "./intent-store.js";
export type { IntentQueries, SubmissionRules } from "./intent-store.js";
export { ExecutionLedger, EMPTY_EXECUTION } from "./execution-ledger.js";
export type { ExecutionQueries, ExecutionResult } from "./execution-ledger.js";
export { TreasuryAccount } from "./treasury-account.js";
export { AccessPolicy, isCancelAuthorized } from "./access-policy.js";
export type { IntentLookup } from "./access-policy.js";
export { RegistryAnalytics } from "./analytics.js";
export type { RegistrySummary, SideBreakdown } from "./analytics.js";

// Collaborators
export { SequenceClock, ManualClock } from "./clock.js";
export type { LogicalClock } from "./clock.js";
export { RecordingTransferPort } from "./transfer.js";
export type { TransferPort, TransferResult, TransferRecord } from "./transfer.js";
export {
  CollectingSink,
  EventStoreNotificationSink,
  toEventMapping,
} from "./notifications.js";
export type {
  NotificationSink,
  RegistryNotification,
  RegistryNotificationType,
} from "./notifications.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";

// Errors & constants
export { RegistryError } from "./errors.js";
export type { RegistryErrorCode, RegistryErrorCategory } from "./errors.js";
export {
  SIDE_BUY,
  SIDE_SELL,
  FEE_DENOMINATOR,
  MAX_INTENTS,
  MAX_BULK_QUERY,
  MAX_UINT256,
} from "./constants.js";
