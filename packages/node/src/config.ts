/**
 * @intent-registry/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Address } from "@intent-registry/types";
import { isAddress, normalizeAddress } from "@intent-registry/types";
import { AddressSchema } from "./types/dto.js";

// =============================================================================
// Schema
// =============================================================================

const UintSchema = (fallback: string) =>
  z
    .string()
    .regex(/^\d+$/, "Expected a non-negative integer")
    .default(fallback)
    .transform((v) => BigInt(v));

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Auth
    API_KEYS: z.string().default(""),

    // Roles
    OWNER_ADDRESS: AddressSchema,
    CONTROLLER_ADDRESS: AddressSchema,
    KEEPER_ADDRESS: AddressSchema,

    // Registry rules
    FEE_BPS: z.coerce.number().int().min(0).max(10_000).default(0),
    MIN_AMOUNT: UintSchema("1"),
    MAX_AMOUNT: UintSchema("1000000000000000000000000000000"),
  })
  .refine((c) => c.MIN_AMOUNT <= c.MAX_AMOUNT, {
    message: "MIN_AMOUNT must not exceed MAX_AMOUNT",
    path: ["MIN_AMOUNT"],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:0xaddress1,key2:0xaddress2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, address] = parts;
    if (parts.length !== 2 || key === undefined || address === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }

    keys.push({ key, address: normalizeAddress(address) });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
