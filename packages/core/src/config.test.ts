import { describe, it, expect } from "vitest";
import { loadBaseConfig, getBaseConfig, resetBaseConfig, getEnv, requireEnv } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadBaseConfig", () => {
  it("applies defaults", () => {
    expect(loadBaseConfig({})).toEqual({
      log: { level: "info", format: "pretty" },
      env: { nodeEnv: "development" },
    });
  });

  it("reads provided values", () => {
    const config = loadBaseConfig({ LOG_LEVEL: "debug", LOG_FORMAT: "json", NODE_ENV: "test" });
    expect(config.log).toEqual({ level: "debug", format: "json" });
    expect(config.env.nodeEnv).toBe("test");
  });

  it("rejects invalid values with a ConfigError", () => {
    expect(() => loadBaseConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
    expect(() => loadBaseConfig({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL/);
  });
});

describe("getBaseConfig", () => {
  it("caches until reset", () => {
    resetBaseConfig();
    const first = getBaseConfig();
    expect(getBaseConfig()).toBe(first);
    resetBaseConfig();
    expect(getBaseConfig()).not.toBe(first);
  });
});

describe("env helpers", () => {
  it("requires present variables", () => {
    process.env.FORECAST_TEST_VALUE = "present";
    expect(requireEnv("FORECAST_TEST_VALUE")).toBe("present");
    delete process.env.FORECAST_TEST_VALUE;
    expect(() => requireEnv("FORECAST_TEST_VALUE")).toThrow(ConfigError);
  });

  it("falls back to defaults", () => {
    delete process.env.FORECAST_TEST_OTHER;
    expect(getEnv("FORECAST_TEST_OTHER", "fallback")).toBe("fallback");
  });
});
