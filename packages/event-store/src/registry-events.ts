/**
 * @intent-registry/event-store — Registry Domain Event Definitions.
 *
 * Naming convention: `registry.<entity>.<action>`
 *
 * Payloads are JSON-safe: amounts, prices and balances are decimal
 * strings; sequence markers are positive integers.
 */

import { z } from "zod";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Event Type Constants
// =============================================================================

export const REGISTRY_EVENTS = {
  INTENT_SUBMITTED: "registry.intent.submitted",
  INTENT_EXECUTED: "registry.intent.executed",
  INTENT_CANCELLED: "registry.intent.cancelled",

  CONTROLLER_CHANGED: "registry.config.controller-changed",
  KEEPER_CHANGED: "registry.config.keeper-changed",
  BOUNDS_CHANGED: "registry.config.bounds-changed",
  FEE_CHANGED: "registry.config.fee-changed",
  PAUSED: "registry.config.paused",

  TREASURY_TOPPED: "registry.treasury.topped",
  TREASURY_WITHDRAWN: "registry.treasury.withdrawn",
} as const;

export type RegistryEventType =
  (typeof REGISTRY_EVENTS)[keyof typeof REGISTRY_EVENTS];

// =============================================================================
// Payload Schemas
// =============================================================================

const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/, "Expected a 20-byte hex address");
const symbol = z.string().regex(/^0x[0-9a-fA-F]{64}$/, "Expected a 32-byte hex symbol");
const uint = z.string().regex(/^\d+$/, "Expected a decimal string");
const seq = z.number().int().positive();
const intentId = z.number().int().positive();

export const IntentSubmittedPayloadSchema = z
  .object({
    intentId,
    submitter: address,
    side: z.union([z.literal(1), z.literal(2)]),
    amount: uint,
    limitPrice: uint,
    symbol,
    seq,
  })
  .strict();

export const IntentExecutedPayloadSchema = z
  .object({ intentId, executor: address, executedAmount: uint, avgPrice: uint, seq })
  .strict();

export const IntentCancelledPayloadSchema = z
  .object({ intentId, by: address, seq })
  .strict();

export const RoleChangedPayloadSchema = z
  .object({ previous: address, next: address, seq })
  .strict();

export const BoundsChangedPayloadSchema = z
  .object({ minAmount: uint, maxAmount: uint, seq })
  .strict();

const feeBps = z.number().int().min(0).max(10_000);

export const FeeChangedPayloadSchema = z
  .object({ previous: feeBps, next: feeBps, seq })
  .strict();

export const PausedPayloadSchema = z.object({ paused: z.boolean(), seq }).strict();

export const TreasuryToppedPayloadSchema = z
  .object({ amount: uint, from: address, seq })
  .strict();

export const TreasuryWithdrawnPayloadSchema = z
  .object({ to: address, amount: uint, seq })
  .strict();

export type IntentSubmittedPayload = z.infer<typeof IntentSubmittedPayloadSchema>;
export type IntentExecutedPayload = z.infer<typeof IntentExecutedPayloadSchema>;
export type IntentCancelledPayload = z.infer<typeof IntentCancelledPayloadSchema>;
export type RoleChangedPayload = z.infer<typeof RoleChangedPayloadSchema>;
export type BoundsChangedPayload = z.infer<typeof BoundsChangedPayloadSchema>;
export type FeeChangedPayload = z.infer<typeof FeeChangedPayloadSchema>;
export type PausedPayload = z.infer<typeof PausedPayloadSchema>;
export type TreasuryToppedPayload = z.infer<typeof TreasuryToppedPayloadSchema>;
export type TreasuryWithdrawnPayload = z.infer<typeof TreasuryWithdrawnPayloadSchema>;

// =============================================================================
// Catalog Entries
// =============================================================================

const REGISTRY_SCHEMAS: readonly EventSchema[] = [
  {
    type: REGISTRY_EVENTS.INTENT_SUBMITTED,
    version: 1,
    description: "The controller submitted a new intent",
    source: "intents",
    payload: IntentSubmittedPayloadSchema,
  },
  {
    type: REGISTRY_EVENTS.INTENT_CANCELLED,
    version: 1,
    description: "An intent was cancelled by its submitter or the owner",
    source: "intents",
    payload: IntentCancelledPayloadSchema,
  },
  {
    type: REGISTRY_EVENTS.INTENT_EXECUTED,
    version: 1,
    description: "The keeper executed an intent",
    source: "executions",
    payload: IntentExecutedPayloadSchema,
  },
  {
    type: REGISTRY_EVENTS.CONTROLLER_CHANGED,
    version: 1,
    description: "The owner replaced the controller",
    source: "config",
    payload: RoleChangedPayloadSchema,
  },
  {
    type: REGISTRY_EVENTS.KEEPER_CHANGED,
    version: 1,
    description: "The owner replaced the keeper",
    source: "config",
    payload: RoleChangedPayloadSchema,
  },
  {
    type: REGISTRY_EVENTS.BOUNDS_CHANGED,
    version: 1,
    description: "The owner changed the amount bounds",
    source: "config",
    payload: BoundsChangedPayloadSchema,
  },
  {
    type: REGISTRY_EVENTS.FEE_CHANGED,
    version: 1,
    description: "The owner changed the fee rate",
    source: "config",
    payload: FeeChangedPayloadSchema,
  },
  {
    type: REGISTRY_EVENTS.PAUSED,
    version: 1,
    description: "The owner toggled the pause gate",
    source: "config",
    payload: PausedPayloadSchema,
  },
  {
    type: REGISTRY_EVENTS.TREASURY_TOPPED,
    version: 1,
    description: "Funds were deposited into the treasury",
    source: "treasury",
    payload: TreasuryToppedPayloadSchema,
  },
  {
    type: REGISTRY_EVENTS.TREASURY_WITHDRAWN,
    version: 1,
    description: "The owner withdrew funds from the treasury",
    source: "treasury",
    payload: TreasuryWithdrawnPayloadSchema,
  },
];

/**
 * Create an EventCatalog with every registry event registered at version 1.
 */
export function createRegistryCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of REGISTRY_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
