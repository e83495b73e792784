/**
 * API Test Helpers
 *
 * Builds the real application over in-memory collaborators.
 */

import type { FastifyInstance } from "fastify";
import { BackgroundTaskQueue, ResolutionService } from "@tinyhop/core";
import { InMemoryUrlStore } from "@tinyhop/db";
import type { UrlStore } from "@tinyhop/db";
import { InMemoryUrlCache } from "@tinyhop/cache";
import type { UrlCache } from "@tinyhop/cache";
import { buildApp } from "../src/app.js";

export const API_KEY = "test-key-1";
export const OTHER_KEY = "test-key-2";
export const BASE_URL = "https://th.example";
export const QR_GENERATOR = "https://qr.test/gen";

export interface TestContext {
  app: FastifyInstance;
  service: ResolutionService;
  store: UrlStore;
  cache: UrlCache;
  tasks: BackgroundTaskQueue;
  close(): Promise<void>;
}

export interface TestAppOptions {
  store?: UrlStore;
  cache?: UrlCache;
  rateLimit?: number;
}

export async function createTestApp(options: TestAppOptions = {}): Promise<TestContext> {
  const store = options.store ?? new InMemoryUrlStore();
  const cache = options.cache ?? new InMemoryUrlCache();
  const tasks = new BackgroundTaskQueue();
  const service = new ResolutionService({ store, cache, tasks, baseUrl: BASE_URL });

  const app = await buildApp(
    {
      env: "test",
      apiKeys: [API_KEY, OTHER_KEY],
      requestTimeoutMs: 5000,
      corsOrigin: true,
      qrGeneratorUrl: QR_GENERATOR,
      enableDocs: false,
      baseUrl: BASE_URL,
      rateLimitPerMinute: options.rateLimit ?? 1000,
    },
    { service, store, cache, logger: false }
  );

  return {
    app,
    service,
    store,
    cache,
    tasks,
    async close() {
      await app.close();
      await tasks.shutdown();
    },
  };
}
