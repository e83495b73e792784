import { describe, it, expect, jest } from "@jest/globals";
import { createLogger } from "@tinyhop/logger";
import {
  loadStackConfig,
  oneOf,
  optionalBool,
  optionalInt,
  required,
  validateStackConfig,
} from "../src/index.js";

describe("environment helpers", () => {
  it("should throw on a missing required variable", () => {
    expect(() => required({}, "DATABASE_URL")).toThrow("Missing required environment variable: DATABASE_URL");
    expect(required({ DATABASE_URL: "postgres://db" }, "DATABASE_URL")).toBe("postgres://db");
  });

  it("should fall back on unparsable integers", () => {
    expect(optionalInt({ PORT: "9090" }, "PORT", 3000)).toBe(9090);
    expect(optionalInt({ PORT: "abc" }, "PORT", 3000)).toBe(3000);
    expect(optionalInt({}, "PORT", 3000)).toBe(3000);
  });

  it("should read booleans", () => {
    expect(optionalBool({ FLAG: "TRUE" }, "FLAG", false)).toBe(true);
    expect(optionalBool({ FLAG: "0" }, "FLAG", true)).toBe(false);
    expect(optionalBool({ FLAG: "maybe" }, "FLAG", true)).toBe(true);
  });

  it("should restrict enumerated values", () => {
    expect(oneOf({ MODE: "b" }, "MODE", ["a", "b"], "a")).toBe("b");
    expect(oneOf({}, "MODE", ["a", "b"], "a")).toBe("a");
    expect(() => oneOf({ MODE: "c" }, "MODE", ["a", "b"], "a")).toThrow("MODE must be one of a, b, got 'c'");
  });
});

describe("loadStackConfig", () => {
  it("should require connection URLs for the default drivers", () => {
    expect(() => loadStackConfig({})).toThrow("DATABASE_URL");
    expect(() => loadStackConfig({ DATABASE_URL: "postgres://db" })).toThrow("REDIS_URL");
  });

  it("should apply defaults", () => {
    const config = loadStackConfig({
      DATABASE_URL: "postgres://db",
      REDIS_URL: "redis://cache",
    });

    expect(config).toEqual({
      baseUrl: "http://localhost:8080",
      storeDriver: "postgres",
      databaseUrl: "postgres://db",
      dbTimeoutMs: 2000,
      cacheDriver: "redis",
      redisUrl: "redis://cache",
      redisTimeoutMs: 500,
      cacheTtlSeconds: 300,
      idLength: 6,
      maxIdAttempts: 10,
    });
  });

  it("should run without backends on the memory drivers", () => {
    const config = loadStackConfig({
      STORE_DRIVER: "memory",
      CACHE_DRIVER: "memory",
      BASE_URL: "https://th.example",
      ID_LENGTH: "8",
    });

    expect(config.databaseUrl).toBe("");
    expect(config.redisUrl).toBe("");
    expect(config.baseUrl).toBe("https://th.example");
    expect(config.idLength).toBe(8);
  });
});

describe("validateStackConfig", () => {
  const base = loadStackConfig({ STORE_DRIVER: "memory", CACHE_DRIVER: "memory" });

  it("should reject non-positive identifier settings", () => {
    const logger = createLogger("config-test", { level: "silent" });
    expect(() => validateStackConfig({ ...base, idLength: 0 }, logger)).toThrow("must be positive");
    expect(() => validateStackConfig({ ...base, maxIdAttempts: 0 }, logger)).toThrow("must be positive");
  });

  it("should warn about short TTLs", () => {
    const logger = createLogger("config-test", { level: "silent" });
    const warn = jest.spyOn(logger, "warn");

    validateStackConfig({ ...base, storeDriver: "postgres", cacheTtlSeconds: 10 }, logger);

    expect(warn).toHaveBeenCalledTimes(1);
  });
});
