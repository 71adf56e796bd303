/**
 * @intent-registry/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore: a hash-chained global log with per-stream views
 * - EventCatalog: versioned zod schemas for event payloads
 * - Registry domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  AppendOptions,
  AppendResult,
  EventQuery,
  EventStore,
  EventStoreErrorCode,
  ChainBreak,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export { EventCatalog, CatalogError } from "./catalog.js";
export type { EventSchema, PayloadCheck } from "./catalog.js";

// Registry events
export {
  REGISTRY_EVENTS,
  createRegistryCatalog,
  IntentSubmittedPayloadSchema,
  IntentExecutedPayloadSchema,
  IntentCancelledPayloadSchema,
  RoleChangedPayloadSchema,
  BoundsChangedPayloadSchema,
  FeeChangedPayloadSchema,
  PausedPayloadSchema,
  TreasuryToppedPayloadSchema,
  TreasuryWithdrawnPayloadSchema,
} from "./registry-events.js";
export type {
  RegistryEventType,
  IntentSubmittedPayload,
  IntentExecutedPayload,
  IntentCancelledPayload,
  RoleChangedPayload,
  BoundsChangedPayload,
  FeeChangedPayload,
  PausedPayload,
  TreasuryToppedPayload,
  TreasuryWithdrawnPayload,
} from "./registry-events.js";
