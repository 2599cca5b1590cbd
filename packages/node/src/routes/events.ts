/**
 * Notification log routes.
 *
 * GET /api/v1/events — Events in global order (fromPosition, limit, type)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import type { EventPageDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const query = queryResult.data;
    // One extra to detect hasMore
    const events = service.readAllEvents({
      fromPosition: query.fromPosition,
      maxCount: query.limit + 1,
      ...(query.type !== undefined ? { type: query.type } : {}),
    });

    const hasMore = events.length > query.limit;
    const data = hasMore ? events.slice(0, query.limit) : events;
    const last = data[data.length - 1];

    const page: EventPageDto = {
      data,
      pagination: {
        nextPosition: hasMore && last !== undefined ? last.globalPosition + 1 : null,
        hasMore,
      },
    };
    return c.json(page);
  });

  return routes;
}
