/**
 * Execution routes.
 *
 * GET  /api/v1/executions             — List executions in execution order
 * GET  /api/v1/executions/latest?n=   — Newest n executions, newest first
 * POST /api/v1/executions/bulk        — Fetch up to 200 executions by intent id
 * GET  /api/v1/executions/:intentId   — The execution of one intent
 *
 * The bulk fetch never fails on a missing id: it returns a zero-valued
 * record in that slot.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BulkIdsSchema, LatestQuerySchema, PaginationQuerySchema } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate } from "../types/pagination.js";
import { toExecutionView } from "../types/views.js";
import { invalidId, parseIdParam } from "./params.js";

export function createExecutionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/executions
  routes.get("/", validateQuery(PaginationQuerySchema), (c) => {
    const service = c.get("service");
    const { cursor, limit } = c.get("validatedQuery");

    // Executions are not ordered by intent id, so page on position
    const positioned = service.registry.executions
      .records()
      .map((execution, position) => ({ position, execution }));

    const result = paginate(
      positioned,
      { cursor, limit },
      (p) => p.position,
      "position",
    );

    return c.json({
      data: result.data.map((p) => toExecutionView(p.execution)),
      pagination: result.pagination,
    });
  });

  // GET /api/v1/executions/latest
  routes.get("/latest", validateQuery(LatestQuerySchema), (c) => {
    const service = c.get("service");
    const ids = service.registry.executions.lastIds(c.get("validatedQuery").n);
    return c.json({
      data: ids.map((id) => toExecutionView(service.registry.executions.get(id))),
    });
  });

  // POST /api/v1/executions/bulk
  routes.post("/bulk", validateBody(BulkIdsSchema), (c) => {
    const service = c.get("service");
    const { ids } = c.get("validatedBody");

    return c.json({ data: service.registry.executions.getMany(ids).map(toExecutionView) });
  });

  // GET /api/v1/executions/:intentId
  routes.get("/:intentId", (c) => {
    const service = c.get("service");
    const raw = c.req.param("intentId");
    const intentId = parseIdParam(raw);
    if (intentId === undefined) {
      return invalidId(c, raw);
    }

    return c.json({ data: toExecutionView(service.registry.executions.get(intentId)) });
  });

  return routes;
}
