/**
 * Shared helpers for path and query parameters.
 */

import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { IdParamSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Parse a non-negative integer path parameter.
 *
 * @returns The id, or undefined if the parameter is not one.
 */
export function parseIdParam(raw: string): number | undefined {
  const result = IdParamSchema.safeParse(raw);
  return result.success ? result.data : undefined;
}

export function invalidId<E extends AppEnv>(c: Context<E>, raw: string): Response {
  return c.json(createErrorEnvelope("VALIDATION_ERROR", `Invalid id "${raw}"`), 400);
}
