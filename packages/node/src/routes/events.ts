/**
 * Event query routes.
 *
 * GET /api/v1/events            — All registry events in global order
 * GET /api/v1/events/:streamId  — One stream ("intent-<id>", "config", "treasury")
 *
 * Both use cursor pagination. `type` narrows to one event type;
 * `afterPosition` / `afterVersion` skip what a consumer has already seen.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { validateQuery } from "../middleware/validate.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events
  routes.get("/", validateQuery(ListEventsQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.get("validatedQuery");
    const events = service.readAllEvents({ after: query.afterPosition, type: query.type });

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.globalPosition,
      "globalPosition",
    );

    return c.json(result);
  });

  // GET /api/v1/events/:streamId
  routes.get("/:streamId", validateQuery(ListStreamEventsQuerySchema), (c) => {
    const service = c.get("service");
    const streamId = c.req.param("streamId");
    const query = c.get("validatedQuery");
    const events = service.readStreamEvents(streamId, {
      after: query.afterVersion,
      type: query.type,
    });
    if (events === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Stream "${streamId}" has no events`),
        404,
      );
    }

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.version,
      "version",
    );

    return c.json(result);
  });

  return routes;
}
