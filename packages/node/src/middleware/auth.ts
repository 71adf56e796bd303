/**
 * Caller identity middleware.
 *
 * Two modes:
 * 1. Secured: X-Api-Key header → looked up in the configured key registry,
 *    which binds each key to a caller address
 * 2. Unsecured (tests, dev): X-Caller header names the address directly;
 *    without it the request acts as the null identity
 *
 * On success, sets `c.set("auth", authContext)`. Whether the caller may
 * perform an operation is decided by the registry, not here.
 */

import type { MiddlewareHandler } from "hono";
import { ZERO_ADDRESS, isAddress, normalizeAddress } from "@intent-registry/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

// =============================================================================
// Secured Mode
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create authentication middleware.
 *
 * Returns 401 if the key is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", {
      type: "api-key",
      caller: normalizeAddress(record.address),
      keyId: record.key,
    });
    return next();
  };
}

// =============================================================================
// Unsecured Mode
// =============================================================================

export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(CALLER_HEADER);

    if (header === undefined) {
      c.set("auth", { type: "anonymous", caller: ZERO_ADDRESS });
      return next();
    }

    if (!isAddress(header)) {
      return c.json(
        createErrorEnvelope(
          "VALIDATION_ERROR",
          `${CALLER_HEADER} must be a 0x-prefixed 20-byte hex address`,
        ),
        400,
      );
    }

    c.set("auth", { type: "header", caller: normalizeAddress(header) });
    return next();
  };
}
