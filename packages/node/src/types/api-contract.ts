/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { RegistryService } from "../services/registry-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the registry node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The registry service backing this app */
    service: RegistryService;

    /** Resolved caller identity (set by auth or caller middleware) */
    auth: AuthContext;
  };
}

/**
 * Environment of a route whose body passed `validateBody(schema)`.
 */
export interface ValidatedEnv<T> extends AppEnv {
  Variables: AppEnv["Variables"] & {
    validatedBody: T;
  };
}

/**
 * Environment of a route whose query string passed `validateQuery(schema)`.
 */
export interface QueryEnv<T> extends AppEnv {
  Variables: AppEnv["Variables"] & {
    validatedQuery: T;
  };
}
