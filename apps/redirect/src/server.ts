/**
 * Redirect Application
 *
 * Hono app for the public redirect service. Built from injected
 * collaborators so tests can drive it with app.request().
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { ErrorCode, notFoundError, rateLimitError } from "@tinyhop/shared";
import { rateLimitKey } from "@tinyhop/core";
import type { ResolutionService, SlidingWindowRateLimiter } from "@tinyhop/core";
import type { UrlStore } from "@tinyhop/db";
import type { UrlCache } from "@tinyhop/cache";
import type { Logger } from "@tinyhop/logger";
import { createRedirectHandler, errorResponse } from "./handler.js";
import type { RedirectMetrics } from "./metrics.js";

export interface AppDeps {
  service: ResolutionService;
  store: Pick<UrlStore, "ping">;
  cache: Pick<UrlCache, "ping">;
  limiter: SlidingWindowRateLimiter;
  metrics: RedirectMetrics;
  logger: Logger;
  requestTimeoutMs: number;
}

const UNLIMITED_PATHS = new Set(["/health", "/health/ready", "/metrics"]);

/**
 * Client address from common proxy headers.
 */
export function clientIp(c: Context): string {
  const cfConnecting = c.req.header("cf-connecting-ip");
  if (cfConnecting) return cfConnecting;

  const forwardedFor = c.req.header("x-forwarded-for");
  if (forwardedFor) {
    // First entry is the client
    const first = forwardedFor.split(",")[0]?.trim();
    if (first) return first;
  }

  return c.req.header("x-real-ip") ?? "unknown";
}

async function reachable(check: () => Promise<boolean>): Promise<boolean> {
  try {
    return await check();
  } catch {
    return false;
  }
}

/**
 * Create and configure the Hono application.
 */
export function createApp(deps: AppDeps): Hono {
  const { limiter, metrics, logger } = deps;
  const app = new Hono();
  const windowSeconds = Math.ceil(limiter.windowMs / 1000);

  // ---------------------------------------------------------------------------
  // Rate Limiting
  // ---------------------------------------------------------------------------

  app.use("*", async (c, next) => {
    if (UNLIMITED_PATHS.has(c.req.path)) {
      await next();
      return;
    }

    const decision = limiter.allow(rateLimitKey(c.req.header("x-api-key"), clientIp(c)));
    if (!decision.allowed) {
      metrics.recordRedirect(429, 0);
      c.header("Retry-After", String(Math.max(1, Math.ceil(decision.retryAfterMs / 1000))));
      return errorResponse(c, rateLimitError(decision.limit, windowSeconds));
    }

    await next();
  });

  // ---------------------------------------------------------------------------
  // Health & Monitoring Routes (before the redirect catch-all)
  // ---------------------------------------------------------------------------

  // Liveness check - no dependencies
  app.get("/health", (c) => c.json({ status: "ok" }));

  // Readiness check - the store is required, the cache only degrades
  app.get("/health/ready", async (c) => {
    const [storeOk, cacheOk] = await Promise.all([
      reachable(() => deps.store.ping()),
      reachable(() => deps.cache.ping()),
    ]);

    const status = storeOk ? (cacheOk ? "ok" : "degraded") : "unavailable";
    const body = {
      status,
      checks: {
        database: storeOk ? "ok" : "error",
        cache: cacheOk ? "ok" : "error",
      },
    };

    return storeOk ? c.json(body, 200) : c.json(body, 503);
  });

  // Prometheus metrics
  app.get("/metrics", (c) => {
    c.header("Content-Type", "text/plain; version=0.0.4");
    return c.body(metrics.render());
  });

  app.get("/", (c) => c.text("tinyhop redirect service"));

  // ---------------------------------------------------------------------------
  // Redirect Route (the hot path)
  // ---------------------------------------------------------------------------

  app.get("/:id", createRedirectHandler(deps));

  // ---------------------------------------------------------------------------
  // Fallbacks
  // ---------------------------------------------------------------------------

  app.notFound((c) => errorResponse(c, notFoundError("Route")));

  app.onError((err, c) => {
    logger.error({ err, path: c.req.path }, "Unhandled error");
    return c.json({ success: false, error: "Internal server error", errorCode: ErrorCode.INTERNAL }, 500);
  });

  return app;
}
