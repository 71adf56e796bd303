/**
 * @intent-registry/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
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
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; callers are taken from the X-Caller header");
  }

  const { app, service } = createApp({
    serviceConfig: {
      owner: config.OWNER_ADDRESS,
      controller: config.CONTROLLER_ADDRESS,
      keeper: config.KEEPER_ADDRESS,
      feeBps: config.FEE_BPS,
      minAmount: config.MIN_AMOUNT,
      maxAmount: config.MAX_AMOUNT,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    auth: authConfig,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      owner: config.OWNER_ADDRESS,
      feeBps: config.FEE_BPS,
    },
    "Intent registry node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing the HTTP server");
        process.exit(1);
      }
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
