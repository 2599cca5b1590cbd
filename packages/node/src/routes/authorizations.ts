/**
 * Authorization routes.
 *
 * POST /api/v1/authorizations/transfer             — transferWithAuthorization
 * POST /api/v1/authorizations/receive              — receiveWithAuthorization (caller = credential address)
 * POST /api/v1/authorizations/cancel               — cancelAuthorization
 * GET  /api/v1/authorizations/:authorizer/:nonce   — authorizationState
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext } from "../types/auth.js";
import {
  AuthorizationKeySchema,
  CancelAuthorizationSchema,
  TransferAuthorizationSchema,
  toReceiptDto,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

function actorOf(auth: AuthContext): string {
  return auth.address ?? auth.identity;
}

export function createAuthorizationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/transfer",
    requirePermission("submit"),
    validateBody(TransferAuthorizationSchema),
    async (c) => {
      const receipt = await c
        .get("service")
        .transferWithAuthorization(c.get("validatedBody"), actorOf(c.get("auth")));
      return c.json({ data: toReceiptDto(receipt) }, 201);
    },
  );

  routes.post(
    "/receive",
    requirePermission("submit"),
    validateBody(TransferAuthorizationSchema),
    async (c) => {
      const caller = c.get("auth").address;
      if (caller === undefined) {
        return c.json(
          createErrorEnvelope("FORBIDDEN", "No caller address is bound to these credentials"),
          403,
        );
      }
      const receipt = await c.get("service").receiveWithAuthorization(c.get("validatedBody"), caller);
      return c.json({ data: toReceiptDto(receipt) }, 201);
    },
  );

  routes.post(
    "/cancel",
    requirePermission("submit"),
    validateBody(CancelAuthorizationSchema),
    async (c) => {
      const receipt = await c
        .get("service")
        .cancelAuthorization(c.get("validatedBody"), actorOf(c.get("auth")));
      return c.json({ data: toReceiptDto(receipt) }, 201);
    },
  );

  routes.get("/:authorizer/:nonce", requirePermission("read"), (c) => {
    const params = AuthorizationKeySchema.safeParse(c.req.param());
    if (!params.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid path parameters", {
          issues: formatZodErrors(params.error),
        }),
        400,
      );
    }

    const { authorizer, nonce } = params.data;
    const entry = c.get("service").authorizationState(authorizer, nonce);
    return c.json({
      data: {
        authorizer,
        nonce,
        used: entry !== undefined,
        consumption: entry?.consumption ?? null,
        consumedAt: entry?.consumedAt ?? null,
      },
    });
  });

  return routes;
}
