/**
 * tinyhop Management API
 *
 * Endpoints:
 *   POST   /urls           - Create a short URL
 *   GET    /urls           - List the caller's short URLs
 *   GET    /urls/check     - Check custom identifier availability
 *   GET    /urls/:id       - Record and statistics
 *   PUT    /urls/:id       - Update
 *   DELETE /urls/:id       - Soft delete
 *   GET    /urls/:id/qr    - QR code redirect
 *   GET    /health         - Health check
 *   GET    /docs           - OpenAPI UI (ENABLE_DOCS)
 *
 * Also runs the periodic expiry sweep.
 */

import { createResolutionStack } from "@tinyhop/core";
import { createLogger } from "@tinyhop/logger";
import { buildApp } from "./app.js";
import { loadApiConfig, validateApiConfig } from "./config.js";

const logger = createLogger("api");

async function start(): Promise<void> {
  const config = loadApiConfig();
  validateApiConfig(config, logger);

  const stack = createResolutionStack(config.stack, logger);

  const app = await buildApp(
    {
      env: config.env,
      apiKeys: config.apiKeys,
      requestTimeoutMs: config.requestTimeoutMs,
      corsOrigin: config.corsOrigin,
      qrGeneratorUrl: config.qrGeneratorUrl,
      enableDocs: config.enableDocs,
      baseUrl: config.stack.baseUrl,
      rateLimitPerMinute: config.rateLimitPerMinute,
    },
    { service: stack.service, store: stack.store, cache: stack.cache, redis: stack.redis }
  );

  // ==========================================================================
  // Expiry Sweep
  // ==========================================================================

  let sweepTimer: NodeJS.Timeout | null = null;
  if (config.expirySweepIntervalMs > 0) {
    sweepTimer = setInterval(() => {
      stack.service.sweepExpired().catch((err: unknown) => {
        logger.error({ err }, "Expiry sweep failed");
      });
    }, config.expirySweepIntervalMs);
    sweepTimer.unref();
  }

  // ==========================================================================
  // Graceful Shutdown
  // ==========================================================================

  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received shutdown signal");

    try {
      if (sweepTimer) clearInterval(sweepTimer);
      await app.close();
      logger.info("HTTP server closed");

      await stack.close();
      logger.info("Store and cache closed");

      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

  await app.listen({ port: config.port, host: config.host });
  logger.info(`tinyhop API running on http://${config.host}:${config.port}`);
  if (config.enableDocs) {
    logger.info(`OpenAPI docs: http://${config.host}:${config.port}/docs`);
  }
}

start().catch((err: unknown) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
