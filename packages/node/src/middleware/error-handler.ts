/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * RegistryError maps by category, with a few codes singled out.
 * EventStoreError maps by code; a bad pagination cursor is a 400.
 * Anything else is a 500 whose message stays on the server.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { RegistryError } from "@intent-registry/registry";
import type { RegistryErrorCategory, RegistryErrorCode } from "@intent-registry/registry";
import { EventStoreError } from "@intent-registry/event-store";
import { createErrorEnvelope } from "../types/error.js";
import { InvalidCursorError } from "../types/pagination.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const CATEGORY_STATUS: Record<RegistryErrorCategory, ContentfulStatusCode> = {
  validation: 400,
  authorization: 403,
  state: 409,
  capacity: 422,
  funds: 422,
};

const STATUS_MAP: Partial<Record<RegistryErrorCode, ContentfulStatusCode>> = {
  NOT_FOUND: 404,
  TRANSFER_FAILED: 502,
};

export function statusForRegistryError(error: RegistryError): ContentfulStatusCode {
  return STATUS_MAP[error.code] ?? CATEGORY_STATUS[error.category];
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof RegistryError) {
    return c.json(
      createErrorEnvelope(err.code, err.message, { category: err.category }),
      statusForRegistryError(err),
    );
  }

  if (err instanceof EventStoreError && err.code === "CONCURRENCY_CONFLICT") {
    return c.json(createErrorEnvelope(err.code, err.message), 409);
  }

  if (err instanceof InvalidCursorError) {
    return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), 400);
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
