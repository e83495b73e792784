import { describe, it, expect } from "@jest/globals";
import { InMemoryUrlCache } from "@tinyhop/cache";
import { InMemoryUrlStore } from "@tinyhop/db";
import { createLogger } from "@tinyhop/logger";
import { createResolutionStack, loadStackConfig } from "../src/index.js";

describe("createResolutionStack", () => {
  const logger = createLogger("factory-test", { level: "silent" });

  it("should build on the memory drivers without a Redis connection", async () => {
    const stack = createResolutionStack(
      loadStackConfig({ STORE_DRIVER: "memory", CACHE_DRIVER: "memory" }),
      logger
    );

    try {
      expect(stack.store).toBeInstanceOf(InMemoryUrlStore);
      expect(stack.cache).toBeInstanceOf(InMemoryUrlCache);
      expect(stack.redis).toBeNull();

      const view = await stack.service.create({ originalUrl: "https://example.com/a" }, "test-key-1");
      expect((await stack.service.resolve(view.id)).originalUrl).toBe("https://example.com/a");
    } finally {
      await stack.close();
    }
  });
});
