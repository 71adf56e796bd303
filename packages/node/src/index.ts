/**
 * @intent-registry/node — HTTP API for the intent registry.
 *
 * Start the server with `src/main.ts`; this module is the public API
 * for embedding the app or its pieces.
 *
 * @packageDocumentation
 */

export { RegistryService } from "./services/registry-service.js";
export type {
  RegistryServiceConfig,
  RegistryServiceDeps,
  RegistryConstants,
  EventStoreHealth,
} from "./services/registry-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
