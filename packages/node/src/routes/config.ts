/**
 * Configuration routes. All mutations are owner-only; the registry
 * rejects any other caller with NOT_OWNER.
 *
 * GET /api/v1/config
 * PUT /api/v1/config/controller  — { address }
 * PUT /api/v1/config/keeper      — { address }
 * PUT /api/v1/config/bounds      — { minAmount, maxAmount }
 * PUT /api/v1/config/fee         — { feeBps }
 * PUT /api/v1/config/paused      — { paused }
 *
 * Every route answers with the resulting configuration.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  SetAddressSchema,
  SetBoundsSchema,
  SetFeeSchema,
  SetPausedSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { toConfigView } from "../types/views.js";

export function createConfigRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({
      data: { ...toConfigView(service.registry.config), maxIntents: service.registry.maxIntents },
    });
  });

  routes.put("/controller", validateBody(SetAddressSchema), (c) => {
    const { registry } = c.get("service");
    registry.setController(c.get("auth").caller, c.get("validatedBody").address);
    return c.json({ data: toConfigView(registry.config) });
  });

  routes.put("/keeper", validateBody(SetAddressSchema), (c) => {
    const { registry } = c.get("service");
    registry.setKeeper(c.get("auth").caller, c.get("validatedBody").address);
    return c.json({ data: toConfigView(registry.config) });
  });

  routes.put("/bounds", validateBody(SetBoundsSchema), (c) => {
    const { registry } = c.get("service");
    const { minAmount, maxAmount } = c.get("validatedBody");
    registry.setBounds(c.get("auth").caller, minAmount, maxAmount);
    return c.json({ data: toConfigView(registry.config) });
  });

  routes.put("/fee", validateBody(SetFeeSchema), (c) => {
    const { registry } = c.get("service");
    registry.setFeeBps(c.get("auth").caller, c.get("validatedBody").feeBps);
    return c.json({ data: toConfigView(registry.config) });
  });

  routes.put("/paused", validateBody(SetPausedSchema), (c) => {
    const { registry } = c.get("service");
    registry.setPaused(c.get("auth").caller, c.get("validatedBody").paused);
    return c.json({ data: toConfigView(registry.config) });
  });

  return routes;
}
