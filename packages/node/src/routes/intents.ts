/**
 * Intent routes.
 *
 * POST   /api/v1/intents                        — Submit one intent
 * POST   /api/v1/intents/batch                  — Submit several intents atomically
 * GET    /api/v1/intents                        — List intents (cursor pagination)
 * GET    /api/v1/intents/latest?n=              — Newest n intents, newest first
 * GET    /api/v1/intents/range?from=&to=        — Intents by submission index
 * GET    /api/v1/intents/sequence?from=&to=     — Intents by sequence marker
 * POST   /api/v1/intents/bulk                   — Fetch up to 200 intents by id
 * GET    /api/v1/intents/by-submitter/:address  — Ids submitted by an address
 * GET    /api/v1/intents/by-symbol/:symbol      — Ids for a symbol
 * GET    /api/v1/intents/:id                    — Get a single intent
 * POST   /api/v1/intents/:id/execute            — Execute (keeper)
 * POST   /api/v1/intents/:id/cancel             — Cancel (submitter or owner)
 * GET    /api/v1/intents/:id/policy             — Whether the caller may cancel/execute
 */

import { Hono } from "hono";
import type { IntentRecord } from "@intent-registry/types";
import { intentState, isAddress, isSymbolHash } from "@intent-registry/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  SubmitIntentSchema,
  SubmitBatchSchema,
  ExecuteIntentSchema,
  BulkIdsSchema,
  ListIntentsQuerySchema,
  LatestQuerySchema,
  RangeQuerySchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { toExecutionView, toIntentView } from "../types/views.js";
import { invalidId, parseIdParam } from "./params.js";

export function createIntentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Submission ─────────────────────────────────────────────────

  // POST /api/v1/intents
  routes.post("/", validateBody(SubmitIntentSchema), (c) => {
    const service = c.get("service");
    const { feePaid, ...input } = c.get("validatedBody");

    const intent = service.submitIntent(c.get("auth").caller, input, feePaid);
    return c.json({ data: toIntentView(intent) }, 201);
  });

  // POST /api/v1/intents/batch
  routes.post("/batch", validateBody(SubmitBatchSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const intents = service.submitBatch(c.get("auth").caller, body.entries, body.feePaid);
    return c.json({ data: intents.map(toIntentView) }, 201);
  });

  // ─── Queries ────────────────────────────────────────────────────

  // GET /api/v1/intents
  routes.get("/", validateQuery(ListIntentsQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.get("validatedQuery");
    let intents: readonly IntentRecord[] = service.registry.intents.records();
    if (query.state !== undefined) {
      const state = query.state;
      intents = intents.filter((i) => intentState(i) === state);
    }

    const result = paginate(
      intents,
      { cursor: query.cursor, limit: query.limit },
      (i) => i.id,
      "id",
    );

    return c.json({ data: result.data.map(toIntentView), pagination: result.pagination });
  });

  // GET /api/v1/intents/latest
  routes.get("/latest", validateQuery(LatestQuerySchema), (c) => {
    const service = c.get("service");
    const ids = service.registry.intents.lastIds(c.get("validatedQuery").n);
    return c.json({ data: ids.map((id) => toIntentView(service.registry.intents.get(id))) });
  });

  // GET /api/v1/intents/range
  routes.get("/range", validateQuery(RangeQuerySchema), (c) => {
    const service = c.get("service");
    const { from, to } = c.get("validatedQuery");
    const ids = service.registry.intents.idsInIndexRange(from, to);
    return c.json({ data: ids.map((id) => toIntentView(service.registry.intents.get(id))) });
  });

  // GET /api/v1/intents/sequence
  routes.get("/sequence", validateQuery(RangeQuerySchema), (c) => {
    const service = c.get("service");
    const { from, to } = c.get("validatedQuery");
    const ids = service.registry.intents.idsInSequenceRange(from, to);
    return c.json({ data: ids.map((id) => toIntentView(service.registry.intents.get(id))) });
  });

  // POST /api/v1/intents/bulk
  routes.post("/bulk", validateBody(BulkIdsSchema), (c) => {
    const service = c.get("service");
    const { ids } = c.get("validatedBody");

    const intents = service.registry.intents.getMany(ids);
    return c.json({ data: intents.map(toIntentView) });
  });

  // GET /api/v1/intents/by-submitter/:address
  routes.get("/by-submitter/:address", (c) => {
    const service = c.get("service");
    const address = c.req.param("address");
    if (!isAddress(address)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `Invalid address "${address}"`),
        400,
      );
    }

    return c.json({ data: service.registry.intents.idsBySubmitter(address) });
  });

  // GET /api/v1/intents/by-symbol/:symbol
  routes.get("/by-symbol/:symbol", (c) => {
    const service = c.get("service");
    const symbol = c.req.param("symbol");
    if (!isSymbolHash(symbol)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `Invalid symbol "${symbol}"`),
        400,
      );
    }

    return c.json({ data: service.registry.intents.idsBySymbol(symbol) });
  });

  // GET /api/v1/intents/:id
  routes.get("/:id", (c) => {
    const service = c.get("service");
    const raw = c.req.param("id");
    const id = parseIdParam(raw);
    if (id === undefined) {
      return invalidId(c, raw);
    }

    return c.json({ data: toIntentView(service.registry.intents.get(id)) });
  });

  // ─── Lifecycle ──────────────────────────────────────────────────

  // POST /api/v1/intents/:id/execute
  routes.post("/:id/execute", validateBody(ExecuteIntentSchema), (c) => {
    const service = c.get("service");
    const raw = c.req.param("id");
    const id = parseIdParam(raw);
    if (id === undefined) {
      return invalidId(c, raw);
    }

    const body = c.get("validatedBody");
    const execution = service.registry.execute(
      c.get("auth").caller,
      id,
      body.executedAmount,
      body.avgPrice,
    );

    return c.json({
      data: {
        intent: toIntentView(service.registry.intents.get(id)),
        execution: toExecutionView(execution),
      },
    });
  });

  // POST /api/v1/intents/:id/cancel
  routes.post("/:id/cancel", (c) => {
    const service = c.get("service");
    const raw = c.req.param("id");
    const id = parseIdParam(raw);
    if (id === undefined) {
      return invalidId(c, raw);
    }

    const intent = service.registry.cancel(c.get("auth").caller, id);
    return c.json({ data: toIntentView(intent) });
  });

  // GET /api/v1/intents/:id/policy
  routes.get("/:id/policy", (c) => {
    const service = c.get("service");
    const raw = c.req.param("id");
    const id = parseIdParam(raw);
    if (id === undefined) {
      return invalidId(c, raw);
    }

    const caller = c.get("auth").caller;
    return c.json({
      data: {
        intentId: id,
        caller,
        canCancel: service.registry.policy.canCancel(id, caller),
        canExecute: service.registry.policy.canExecute(id),
      },
    });
  });

  return routes;
}
