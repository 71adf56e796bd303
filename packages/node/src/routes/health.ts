/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event store hash chain and payload schemas)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { RegistryService } from "../services/registry-service.js";

export function createHealthRoutes(service: RegistryService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { integrity, invalidPayloads } = service.checkEventStore();
    const ready = service.isReady() && integrity.valid && invalidPayloads === 0;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        eventStore: {
          chainValid: integrity.valid,
          lastVerifiedPosition: integrity.lastVerifiedPosition,
          invalidPayloads,
        },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
