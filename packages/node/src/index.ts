/**
 * @presign/node — HTTP relayer for signed authorizations.
 *
 * Public API for embedding the relayer; main.ts is the process entry.
 */

export { RelayService, LEDGER_STREAM } from "./services/relay-service.js";
export type {
  RelayServiceConfig,
  GenesisMint,
  AuthorizationOutcome,
  HealthReport,
} from "./services/relay-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
