/**
 * tinyhop Redirect Service
 *
 * Public entry point: GET /:id answers 301 to the original URL.
 */

import { serve } from "@hono/node-server";
import { SlidingWindowRateLimiter, createResolutionStack } from "@tinyhop/core";
import { createLogger } from "@tinyhop/logger";
import { loadConfig, validateConfig } from "./config.js";
import { RedirectMetrics } from "./metrics.js";
import { createApp } from "./server.js";

const logger = createLogger("redirect");

function main(): void {
  const config = loadConfig();
  validateConfig(config, logger);

  const stack = createResolutionStack(config.stack, logger);
  const limiter = new SlidingWindowRateLimiter({ limit: config.rateLimitPerMinute, windowMs: 60_000 });
  const metrics = new RedirectMetrics();

  const app = createApp({
    service: stack.service,
    store: stack.store,
    cache: stack.cache,
    limiter,
    metrics,
    logger,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  });

  logger.info(`tinyhop redirect service running on http://${config.host}:${config.port}`);

  // ===========================================================================
  // Graceful Shutdown
  // ===========================================================================

  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    limiter.shutdown();
    // Pending click accounting gets a chance to land
    await stack.close();

    logger.info({ metrics: metrics.summary() }, "Shutdown complete");
  }

  const onSignal = (signal: string) => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "Error during shutdown");
        process.exit(1);
      }
    );
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  process.on("unhandledRejection", (reason) => {
    // Log and continue
    logger.error({ err: reason }, "Unhandled rejection");
  });
}

try {
  main();
} catch (err) {
  logger.error({ err }, "Failed to start");
  process.exit(1);
}
