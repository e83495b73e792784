/**
 * Redirect Request Handler
 *
 * The hot path: resolve the identifier, answer 301, and leave click
 * accounting to the background queue.
 *
 * Flow:
 * 1. Extract the identifier from the path
 * 2. Resolve through the cache, falling back to the store
 * 3. Dispatch click accounting (never awaited)
 * 4. 301 with a short browser cache lifetime
 *
 * Resolution failures map to JSON errors: 404 unknown or disabled,
 * 410 expired, 500 backend failure.
 */

import type { Context } from "hono";
import { ErrorCode, isServiceError } from "@tinyhop/shared";
import type { ServiceError } from "@tinyhop/shared";
import type { ResolutionService } from "@tinyhop/core";
import type { Logger } from "@tinyhop/logger";
import type { RedirectMetrics, RedirectOutcome } from "./metrics.js";

/**
 * Browsers may reuse a redirect for five minutes; an edit or delete can
 * take that long to reach a client that already followed the link.
 */
export const REDIRECT_CACHE_CONTROL = "public, max-age=300";

const SLOW_REDIRECT_MS = 50;

export type ErrorStatus = 400 | 401 | 404 | 409 | 410 | 429 | 500;

export function errorStatus(code: ErrorCode): ErrorStatus {
  switch (code) {
    case ErrorCode.VALIDATION:
      return 400;
    case ErrorCode.UNAUTHORIZED:
      return 401;
    case ErrorCode.NOT_FOUND:
      return 404;
    case ErrorCode.CONFLICT:
      return 409;
    case ErrorCode.EXPIRED:
      return 410;
    case ErrorCode.RATE_LIMIT:
      return 429;
    case ErrorCode.INTERNAL:
      return 500;
  }
}

/**
 * JSON error response in the API's envelope.
 */
export function errorResponse(c: Context, err: ServiceError): Response {
  return c.json({ success: false, error: err.message, errorCode: err.code }, errorStatus(err.code));
}

function outcomeOf(code: ErrorCode): RedirectOutcome {
  switch (code) {
    case ErrorCode.NOT_FOUND:
      return 404;
    case ErrorCode.EXPIRED:
      return 410;
    case ErrorCode.RATE_LIMIT:
      return 429;
    default:
      return 500;
  }
}

export interface RedirectHandlerDeps {
  service: ResolutionService;
  metrics: RedirectMetrics;
  logger: Logger;
  requestTimeoutMs: number;
}

export function createRedirectHandler(deps: RedirectHandlerDeps): (c: Context) => Promise<Response> {
  const { service, metrics, logger, requestTimeoutMs } = deps;

  return async (c) => {
    const start = performance.now();
    const id = c.req.param("id") ?? "";

    try {
      const view = await service.resolveForRedirect(id, {
        signal: AbortSignal.timeout(requestTimeoutMs),
      });

      const latencyMs = performance.now() - start;
      metrics.recordRedirect(301, latencyMs);
      if (latencyMs > SLOW_REDIRECT_MS) {
        logger.warn({ id, latencyMs: Math.round(latencyMs) }, "Slow redirect");
      }

      c.header("Cache-Control", REDIRECT_CACHE_CONTROL);
      return c.redirect(view.originalUrl, 301);
    } catch (err) {
      if (!isServiceError(err)) throw err;

      metrics.recordRedirect(outcomeOf(err.code), performance.now() - start);
      if (err.code === ErrorCode.INTERNAL) {
        logger.error({ err, cause: err.cause, id }, "Redirect failed");
      }
      return errorResponse(c, err);
    }
  };
}
