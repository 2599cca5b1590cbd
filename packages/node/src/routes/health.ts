/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (notification log integrity + supply accounting)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { RelayService } from "../services/relay-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: RelayService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const health = service.checkHealth();

    const eventStore: SubsystemStatus = health.integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `chainValid=false, errors=${health.integrity.errors.length}, lastVerified=${health.integrity.lastVerifiedPosition}`,
        };
    const ledger: SubsystemStatus = health.supplyConsistent
      ? { status: "ok" }
      : { status: "down", detail: "balances do not sum to total supply" };

    const body = {
      status: health.ready ? "ready" : "not_ready",
      subsystems: { eventStore, ledger },
      timestamp: new Date().toISOString(),
    };

    return health.ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
