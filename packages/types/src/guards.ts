/**
 * Runtime Type Guards
 *
 * Narrowing functions for registry domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, restored snapshots, event payloads).
 */

import type { Side, IntentRecord, ExecutionRecord } from "./intent.js";
import { SIDE_BUY, SIDE_SELL } from "./intent.js";
import type { DomainEvent, EventMetadata } from "./event.js";
import { isAddress, isSymbolHash } from "./identity.js";

// =============================================================================
// Intent guards
// =============================================================================

export function isSide(value: unknown): value is Side {
  return value === SIDE_BUY || value === SIDE_SELL;
}

function isMarker(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isUnsigned(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

export function isIntentRecord(value: unknown): value is IntentRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isMarker(v.id) &&
    v.id > 0 &&
    isAddress(v.submitter) &&
    isSide(v.side) &&
    isUnsigned(v.amount) &&
    isUnsigned(v.limitPrice) &&
    isSymbolHash(v.symbol) &&
    isMarker(v.createdAt) &&
    v.createdAt > 0 &&
    isUnsigned(v.executedAmount) &&
    typeof v.executed === "boolean" &&
    typeof v.cancelled === "boolean" &&
    !(v.executed && v.cancelled)
  );
}

export function isExecutionRecord(value: unknown): value is ExecutionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isMarker(v.intentId) &&
    isAddress(v.executor) &&
    isUnsigned(v.executedAmount) &&
    isUnsigned(v.avgPrice) &&
    isMarker(v.createdAt)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["intents", "executions", "treasury", "config"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
