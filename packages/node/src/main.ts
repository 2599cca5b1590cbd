/**
 * @presign/node — Entry point.
 *
 * Loads config, builds the app, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development" ? { transport: { target: "pino-pretty" } } : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0 || config.JWT_SECRET !== undefined) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = {
      apiKeys: keyMap,
      jwtSecret: config.JWT_SECRET,
      jwtIssuer: config.JWT_ISSUER,
    };
    logger.info(
      { apiKeyCount: parsedKeys.length, jwtEnabled: config.JWT_SECRET !== undefined },
      "Auth configured",
    );
  } else {
    logger.warn("No API keys or JWT secret configured, running in unsecured mode");
  }

  const { app, service } = createApp({
    serviceConfig: {
      token: {
        name: config.TOKEN_NAME,
        version: config.TOKEN_VERSION,
        symbol: config.TOKEN_SYMBOL,
        decimals: config.TOKEN_DECIMALS,
      },
      chainId: config.CHAIN_ID,
      verifyingContract: config.VERIFYING_CONTRACT,
      genesis:
        config.GENESIS_HOLDER !== undefined
          ? { holder: config.GENESIS_HOLDER, supply: config.GENESIS_SUPPLY }
          : undefined,
    },
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.route} ${entry.status}`);
    },
    outcomeFn: (outcome) => {
      const level = outcome.outcome === "ok" ? "info" : "warn";
      logger[level](outcome, `${outcome.operation} ${outcome.outcome}`);
    },
    auth: authConfig,
    rateLimit: { rpm: config.RATE_LIMIT_RPM, burst: config.RATE_LIMIT_BURST },
  });

  logger.info(
    {
      separator: service.domainSeparator,
      chainId: config.CHAIN_ID.toString(),
      verifyingContract: config.VERIFYING_CONTRACT,
    },
    "Signing domain bound",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Presign relayer started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
