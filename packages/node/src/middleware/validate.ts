/**
 * Zod validation middleware.
 *
 * Bodies and query strings are checked against Zod schemas before the
 * handler runs; a failure answers 400 with the issues in `details`.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { QueryEnv, ValidatedEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` (the schema's output) in context
 * variables. On failure, returns 400 with structured validation errors.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * Validate the query string. Every parameter arrives as a string, so
 * numeric fields in the schema should coerce.
 */
export function validateQuery<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<QueryEnv<T>> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedQuery", result.data);
    return next();
  };
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
