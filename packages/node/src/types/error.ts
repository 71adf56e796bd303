/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { RegistryErrorCode } from "@intent-registry/registry";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Known API error codes.
 *
 * Registry errors keep their own code; the rest come from HTTP semantics.
 */
export type ApiErrorCode =
  | RegistryErrorCode
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "CONCURRENCY_CONFLICT"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
