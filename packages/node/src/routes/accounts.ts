/**
 * Account routes.
 *
 * GET /api/v1/accounts/:address/balance — ledger balance in base units
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address/balance", (c) => {
    const parsed = AddressSchema.safeParse(c.req.param("address"));
    if (!parsed.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid address"), 400);
    }

    const service = c.get("service");
    return c.json({
      data: {
        address: parsed.data,
        balance: service.balanceOf(parsed.data).toString(),
        decimals: service.ledger.metadata.decimals,
        symbol: service.ledger.metadata.symbol,
      },
    });
  });

  return routes;
}
