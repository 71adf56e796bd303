/**
 * Treasury routes.
 *
 * GET  /api/v1/treasury           — Current balance
 * POST /api/v1/treasury/deposit   — Top up from the caller
 * POST /api/v1/treasury/withdraw  — Owner-only payout
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DepositSchema, WithdrawSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createTreasuryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/treasury
  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: { balance: service.registry.treasuryBalance.toString() } });
  });

  // POST /api/v1/treasury/deposit
  routes.post("/deposit", validateBody(DepositSchema), (c) => {
    const service = c.get("service");
    const { amount } = c.get("validatedBody");

    const balance = service.registry.topUpTreasury(c.get("auth").caller, amount);
    return c.json({ data: { balance: balance.toString() } });
  });

  // POST /api/v1/treasury/withdraw
  routes.post("/withdraw", validateBody(WithdrawSchema), (c) => {
    const service = c.get("service");
    const { to, amount } = c.get("validatedBody");

    const balance = service.registry.withdraw(c.get("auth").caller, to, amount);
    return c.json({ data: { to, amount: amount.toString(), balance: balance.toString() } });
  });

  return routes;
}
