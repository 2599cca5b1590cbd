/**
 * GET /metrics — Prometheus scrape endpoint, outside /api so it needs no
 * credentials. Mounted only when metrics are enabled.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PROMETHEUS_CONTENT_TYPE } from "../middleware/metrics.js";
import type { MetricsCollector } from "../middleware/metrics.js";

export function createMetricsRoute(collector: MetricsCollector): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metrics", (c) =>
    c.body(collector.render(), 200, {
      "Content-Type": PROMETHEUS_CONTENT_TYPE,
      "Cache-Control": "no-store",
    }),
  );

  return routes;
}
