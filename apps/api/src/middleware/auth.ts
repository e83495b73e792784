/**
 * API Key Authentication
 *
 * Owner routes require an X-API-Key header naming one of the configured
 * keys. The accepted key becomes the request's owner key: URLs belong to
 * the key that created them.
 *
 * Usage:
 * ```ts
 * await app.register(authPlugin, { apiKeys: ["test-key-1"] });
 * app.get("/urls", { preHandler: app.authenticate }, handler);
 * ```
 */

import type { FastifyPluginAsync, FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from "fastify";
import fp from "fastify-plugin";
import { unauthorizedError } from "@tinyhop/shared";
import { sendError } from "../errors.js";

export const API_KEY_HEADER = "x-api-key";

// ============================================================================
// Type Augmentation
// ============================================================================

declare module "fastify" {
  interface FastifyRequest {
    /** Accepted API key; empty on routes without authentication */
    ownerKey: string;
  }

  interface FastifyInstance {
    /** preHandler rejecting requests without a valid API key */
    authenticate: preHandlerAsyncHookHandler;
  }
}

export interface AuthPluginOptions {
  apiKeys: readonly string[];
}

/**
 * Header value as a single trimmed string, or null when absent.
 */
export function readApiKey(request: FastifyRequest): string | null {
  const raw = request.headers[API_KEY_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

// ============================================================================
// Fastify Plugin
// ============================================================================

const authPluginCallback: FastifyPluginAsync<AuthPluginOptions> = async (fastify, options) => {
  const accepted = new Set(options.apiKeys.map((key) => key.trim()).filter((key) => key.length > 0));

  fastify.decorateRequest("ownerKey", "");

  fastify.decorate("authenticate", async (request: FastifyRequest, reply: FastifyReply) => {
    const key = readApiKey(request);

    if (!key) {
      return sendError(reply, unauthorizedError("API key is required"));
    }

    if (!accepted.has(key)) {
      request.log.debug("Rejected unknown API key");
      return sendError(reply, unauthorizedError("Invalid API key"));
    }

    request.ownerKey = key;
  });
};

export const authPlugin = fp(authPluginCallback, {
  name: "api-key-auth",
  fastify: "4.x",
});
