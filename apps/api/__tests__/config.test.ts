import { describe, it, expect } from "@jest/globals";
import { createLogger } from "@tinyhop/logger";
import { loadApiConfig, parseList, validateApiConfig } from "../src/config.js";

const MEMORY = { STORE_DRIVER: "memory", CACHE_DRIVER: "memory" };

describe("loadApiConfig", () => {
  it("should apply defaults", () => {
    const config = loadApiConfig({ ...MEMORY });

    expect(config).toMatchObject({
      port: 8080,
      host: "0.0.0.0",
      env: "development",
      apiKeys: [],
      rateLimitPerMinute: 100,
      requestTimeoutMs: 5000,
      expirySweepIntervalMs: 60_000,
      corsOrigin: true,
      qrGeneratorUrl: "https://api.qrserver.com/v1/create-qr-code/",
      enableDocs: true,
    });
    expect(config.stack.storeDriver).toBe("memory");
  });

  it("should read overrides", () => {
    const config = loadApiConfig({
      ...MEMORY,
      NODE_ENV: "production",
      PORT: "9000",
      API_KEYS: "test-key-1, test-key-2,,",
      CORS_ORIGIN: "https://admin.th.example",
      EXPIRY_SWEEP_INTERVAL_MS: "0",
    });

    expect(config.port).toBe(9000);
    expect(config.apiKeys).toEqual(["test-key-1", "test-key-2"]);
    expect(config.corsOrigin).toBe("https://admin.th.example");
    expect(config.expirySweepIntervalMs).toBe(0);
    expect(config.enableDocs).toBe(false);
  });

  it("should let ENABLE_DOCS override the environment default", () => {
    expect(loadApiConfig({ ...MEMORY, NODE_ENV: "production", ENABLE_DOCS: "true" }).enableDocs).toBe(true);
  });
});

describe("parseList", () => {
  it("should drop blanks", () => {
    expect(parseList(undefined)).toEqual([]);
    expect(parseList(" , ")).toEqual([]);
    expect(parseList("a,b")).toEqual(["a", "b"]);
  });
});

describe("validateApiConfig", () => {
  const logger = createLogger("config-test", { level: "silent" });

  it("should reject a non-positive rate limit", () => {
    const config = loadApiConfig({ ...MEMORY, RATE_LIMIT_PER_MINUTE: "0", API_KEYS: "test-key-1" });
    expect(() => validateApiConfig(config, logger)).toThrow("RATE_LIMIT_PER_MINUTE must be positive");
  });

  it("should accept a sane configuration", () => {
    const config = loadApiConfig({ ...MEMORY, API_KEYS: "test-key-1" });
    expect(() => validateApiConfig(config, logger)).not.toThrow();
  });
});
