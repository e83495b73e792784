/**
 * Request Deadline
 *
 * Each request gets an AbortSignal that fires after REQUEST_TIMEOUT_MS.
 * Handlers pass it to every service call.
 */

import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import type { CallOptions } from "@tinyhop/shared";

declare module "fastify" {
  interface FastifyRequest {
    abortSignal: AbortSignal;
  }
}

export interface RequestSignalOptions {
  timeoutMs: number;
}

const requestSignalCallback: FastifyPluginAsync<RequestSignalOptions> = async (fastify, options) => {
  fastify.decorateRequest("abortSignal", null);

  fastify.addHook("onRequest", async (request) => {
    request.abortSignal = AbortSignal.timeout(options.timeoutMs);
  });
};

export const requestSignalPlugin = fp(requestSignalCallback, {
  name: "request-signal",
  fastify: "4.x",
});

/**
 * Call options bound to the request's deadline.
 */
export function callOptions(request: { abortSignal: AbortSignal }): CallOptions {
  return { signal: request.abortSignal };
}
