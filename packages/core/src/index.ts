/**
 * @tinyhop/core - Resolution Core
 *
 * The resolution service plus the in-process machinery around it:
 * background tasks, rate limiting, configuration and wiring.
 */

export { ResolutionService, normalizeListOptions } from "./resolution-service.js";
export type { ResolutionServiceOptions } from "./resolution-service.js";

export { BackgroundTaskQueue } from "./background.js";
export type { BackgroundTaskQueueOptions, TaskErrorHandler } from "./background.js";

export { SlidingWindowRateLimiter, rateLimitKey } from "./rate-limiter.js";
export type { RateLimiterOptions, RateLimitDecision } from "./rate-limiter.js";

export * from "./config.js";

export { createResolutionStack, createStore } from "./factory.js";
export type { ResolutionStack } from "./factory.js";
