/**
 * Health Check Routes
 *
 * Liveness and readiness checks for orchestrators and load balancers.
 */

import type { FastifyInstance } from "fastify";
import type { UrlStore } from "@tinyhop/db";
import type { UrlCache } from "@tinyhop/cache";

export interface HealthRoutesOptions {
  store: Pick<UrlStore, "ping">;
  cache: Pick<UrlCache, "ping">;
}

type CheckStatus = "ok" | "error";

async function reachable(check: () => Promise<boolean>): Promise<CheckStatus> {
  try {
    return (await check()) ? "ok" : "error";
  } catch {
    return "error";
  }
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  // Liveness check - basic server health
  fastify.get("/health", { schema: { tags: ["health"] } }, async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Readiness check - the store is required, the cache only degrades
  fastify.get("/health/ready", { schema: { tags: ["health"] } }, async (request, reply) => {
    const [database, cache] = await Promise.all([
      reachable(() => options.store.ping()),
      reachable(() => options.cache.ping()),
    ]);

    const status = database === "ok" ? (cache === "ok" ? "ok" : "degraded") : "unavailable";

    return reply.status(database === "ok" ? 200 : 503).send({
      status,
      checks: { database, cache },
      timestamp: new Date().toISOString(),
    });
  });
}
