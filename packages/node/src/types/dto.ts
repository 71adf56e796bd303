/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 *
 * Amounts and prices travel as decimal strings and come out as bigint.
 * Only shape is checked here; range, role and null-identity checks stay
 * in the registry so its error codes reach the client unchanged.
 */

import { z } from "zod";
import type { Address, SymbolHash } from "@intent-registry/types";
import {
  isAddress,
  isSymbolHash,
  normalizeAddress,
  normalizeSymbol,
} from "@intent-registry/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .refine((v): v is Address => isAddress(v), {
    message: "Expected a 0x-prefixed 20-byte hex address",
  })
  .transform((v) => normalizeAddress(v));

export const SymbolSchema = z
  .string()
  .refine((v): v is SymbolHash => isSymbolHash(v), {
    message: "Expected a 0x-prefixed 32-byte hex symbol",
  })
  .transform((v) => normalizeSymbol(v));

export const UintStringSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer as a decimal string")
  .transform((v) => BigInt(v));

export const IdParamSchema = z.coerce.number().int().min(0);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const LatestQuerySchema = z.object({
  n: z.coerce.number().int().min(0).default(10),
});

export type LatestQuery = z.infer<typeof LatestQuerySchema>;

export const RangeQuerySchema = z.object({
  from: z.coerce.number().int().min(0),
  to: z.coerce.number().int().min(0),
});

export type RangeQuery = z.infer<typeof RangeQuerySchema>;

export const BulkIdsSchema = z.object({
  ids: z.array(z.number().int().min(0)),
});

export type BulkIdsDto = z.infer<typeof BulkIdsSchema>;

// =============================================================================
// Intent DTOs
// =============================================================================

export const IntentInputSchema = z.object({
  side: z.number().int(),
  amount: UintStringSchema,
  limitPrice: UintStringSchema,
  symbol: SymbolSchema,
});

export type IntentInputDto = z.infer<typeof IntentInputSchema>;

export const SubmitIntentSchema = IntentInputSchema.extend({
  feePaid: UintStringSchema.default("0"),
});

export type SubmitIntentDto = z.infer<typeof SubmitIntentSchema>;

export const SubmitBatchSchema = z.object({
  entries: z.array(IntentInputSchema),
  feePaid: UintStringSchema.default("0"),
});

export type SubmitBatchDto = z.infer<typeof SubmitBatchSchema>;

export const ExecuteIntentSchema = z.object({
  executedAmount: UintStringSchema,
  avgPrice: UintStringSchema,
});

export type ExecuteIntentDto = z.infer<typeof ExecuteIntentSchema>;

export const ListIntentsQuerySchema = PaginationQuerySchema.extend({
  state: z.enum(["pending", "executed", "cancelled"]).optional(),
});

export type ListIntentsQuery = z.infer<typeof ListIntentsQuerySchema>;

// =============================================================================
// Treasury DTOs
// =============================================================================

export const DepositSchema = z.object({
  amount: UintStringSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  to: AddressSchema,
  amount: UintStringSchema,
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

// =============================================================================
// Config DTOs
// =============================================================================

export const SetAddressSchema = z.object({
  address: AddressSchema,
});

export type SetAddressDto = z.infer<typeof SetAddressSchema>;

export const SetBoundsSchema = z.object({
  minAmount: UintStringSchema,
  maxAmount: UintStringSchema,
});

export type SetBoundsDto = z.infer<typeof SetBoundsSchema>;

export const SetFeeSchema = z.object({
  feeBps: z.number().int(),
});

export type SetFeeDto = z.infer<typeof SetFeeSchema>;

export const SetPausedSchema = z.object({
  paused: z.boolean(),
});

export type SetPausedDto = z.infer<typeof SetPausedSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
