/**
 * Structured request logging middleware.
 *
 * Emits one entry per request through the supplied log function;
 * main.ts wires that to pino. Entries carry the request id and, for
 * API routes, the resolved caller address.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@intent-registry/types";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext } from "../types/auth.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly caller?: Address | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    // Unset on routes outside /api
    const auth: AuthContext | undefined = c.get("auth");

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      caller: auth?.caller,
    });
  };
}
