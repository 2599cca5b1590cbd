/**
 * Signing domain routes. Clients read these to build what they sign.
 *
 * GET /api/v1/domain      — domain parameters and separator
 * GET /api/v1/type-hashes — transfer, receive and cancel type hashes
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toDomainDto, toTypeHashesDto } from "../types/dto.js";

export function createDomainRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/domain", (c) => {
    const service = c.get("service");
    return c.json({ data: toDomainDto(service.domain, service.domainSeparator) });
  });

  routes.get("/type-hashes", (c) => {
    return c.json({ data: toTypeHashesDto(c.get("service").typeHashes) });
  });

  return routes;
}
