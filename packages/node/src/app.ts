/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * main.ts serves it; tests call `app.request` on it directly.
 */

import { Hono } from "hono";
import type { LogicalClock, TransferPort } from "@intent-registry/registry";
import type { AppEnv } from "./types/api-contract.js";
import { RegistryService } from "./services/registry-service.js";
import type { RegistryServiceConfig } from "./services/registry-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createIntentRoutes } from "./routes/intents.js";
import { createExecutionRoutes } from "./routes/executions.js";
import { createTreasuryRoutes } from "./routes/treasury.js";
import { createConfigRoutes } from "./routes/config.js";
import { createStatsRoutes } from "./routes/stats.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: RegistryServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Auth configuration. When provided, callers are identified by API key. */
  readonly auth?: AuthConfig | undefined;
  /** Sequence marker source. Default: a counter starting at 1 */
  readonly clock?: LogicalClock | undefined;
  /** Where withdrawals are paid. Default: a recording port */
  readonly transfer?: TransferPort | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: RegistryService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new RegistryService(options.serviceConfig, {
    clock: options.clock,
    transfer: options.transfer,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    // Secured mode: X-Api-Key → caller address
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Caller header or the null identity
    app.use("/api/*", callerHeaderMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1/intents", createIntentRoutes());
  app.route("/api/v1/executions", createExecutionRoutes());
  app.route("/api/v1/treasury", createTreasuryRoutes());
  app.route("/api/v1/config", createConfigRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1", createStatsRoutes());

  return { app, service };
}
