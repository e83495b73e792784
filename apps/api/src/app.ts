/**
 * API Application
 *
 * Builds the Fastify instance without listening, so tests can drive it
 * through inject().
 */

import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import rateLimit from "@fastify/rate-limit";
import { rateLimitKey } from "@tinyhop/core";
import type { ResolutionService } from "@tinyhop/core";
import type { UrlStore } from "@tinyhop/db";
import type { RedisClient, UrlCache } from "@tinyhop/cache";
import { pinoOptions } from "@tinyhop/logger";
import { rateLimitError } from "@tinyhop/shared";

import { registerErrorHandling } from "./errors.js";
import { authPlugin, readApiKey } from "./middleware/auth.js";
import { requestSignalPlugin } from "./middleware/request-signal.js";
import { healthRoutes } from "./routes/health.js";
import { urlsRoutes } from "./routes/urls/index.js";

const RATE_LIMIT_WINDOW_MS = 60_000;

export interface AppSettings {
  env: string;
  apiKeys: readonly string[];
  requestTimeoutMs: number;
  corsOrigin: string | boolean;
  qrGeneratorUrl: string;
  enableDocs: boolean;
  /** Public address shown in the OpenAPI document */
  baseUrl: string;
  /** Requests per client per minute */
  rateLimitPerMinute: number;
}

export interface AppDeps {
  service: ResolutionService;
  store: Pick<UrlStore, "ping">;
  cache: Pick<UrlCache, "ping">;
  /** Counts requests in Redis so every instance shares one window; in memory when absent */
  redis?: RedisClient | null;
  /** Request logging; false turns it off */
  logger?: boolean;
}

export async function buildApp(settings: AppSettings, deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: deps.logger === false ? false : pinoOptions("api", { env: settings.env }),
    trustProxy: true,
    requestIdHeader: "x-request-id",
    disableRequestLogging: true,
  });

  // ==========================================================================
  // Plugins
  // ==========================================================================

  await app.register(helmet, {
    contentSecurityPolicy: settings.env === "production",
  });

  await app.register(cors, {
    origin: settings.corsOrigin,
    allowedHeaders: ["Content-Type", "X-API-Key", "X-Request-Id"],
  });

  if (settings.enableDocs) {
    await app.register(swagger, {
      openapi: {
        info: {
          title: "tinyhop API",
          description: "Short URL management",
          version: "1.0.0",
        },
        servers: [{ url: settings.baseUrl }],
        tags: [
          { name: "urls", description: "Short URL management" },
          { name: "qr", description: "QR code redirects" },
          { name: "health", description: "Health checks" },
        ],
        components: {
          securitySchemes: {
            apiKey: {
              type: "apiKey",
              name: "X-API-Key",
              in: "header",
            },
          },
        },
      },
    });

    await app.register(swaggerUi, {
      routePrefix: "/docs",
      uiConfig: {
        docExpansion: "list",
        deepLinking: true,
      },
    });
  }

  // Per client: the API key when one is presented, the address otherwise
  await app.register(rateLimit, {
    max: settings.rateLimitPerMinute,
    timeWindow: RATE_LIMIT_WINDOW_MS,
    redis: deps.redis ?? undefined,
    nameSpace: "th:v1:rl:",
    // Redis errors let the request through
    skipOnError: true,
    keyGenerator: (request) => rateLimitKey(readApiKey(request) ?? undefined, request.ip),
    allowList: (request) => request.url.startsWith("/health"),
    onExceeded: (request) => {
      request.log.warn({ ip: request.ip }, "Rate limit exceeded");
    },
    // Thrown by the plugin with the status already set to 429
    errorResponseBuilder: (_request, context) =>
      rateLimitError(context.max, Math.ceil(RATE_LIMIT_WINDOW_MS / 1000)),
  });

  await app.register(requestSignalPlugin, { timeoutMs: settings.requestTimeoutMs });
  await app.register(authPlugin, { apiKeys: settings.apiKeys });

  registerErrorHandling(app);

  app.addHook("onResponse", async (request, reply) => {
    request.log.info(
      {
        url: request.url,
        method: request.method,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      "Request completed"
    );
  });

  // ==========================================================================
  // Routes
  // ==========================================================================

  await app.register(healthRoutes, { store: deps.store, cache: deps.cache });
  await app.register(urlsRoutes, { service: deps.service, qrGeneratorUrl: settings.qrGeneratorUrl });

  return app;
}
