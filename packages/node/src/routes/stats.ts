/**
 * Aggregate routes.
 *
 * GET /api/v1/stats      — Registry summary (counts, volumes, rates in bps)
 * GET /api/v1/constants  — Protocol constants integrators build against
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toSummaryView } from "../types/views.js";

export function createStatsRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/stats", (c) => {
    const service = c.get("service");
    return c.json({
      data: {
        ...toSummaryView(service.registry.analytics.summary()),
        treasuryBalance: service.registry.treasuryBalance.toString(),
      },
    });
  });

  routes.get("/constants", (c) => {
    return c.json({ data: c.get("service").constants() });
  });

  return routes;
}
