import { describe, it, expect } from "vitest";
import { loadConfig, loadLogConfig, loadPoolLimit } from "../src/config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      prettyLogs: false,
      poolLimit: 10_000,
    });
  });

  it("reads the environment", () => {
    expect(
      loadConfig({ LOG_LEVEL: "debug", LOG_PRETTY: "true", POOL_LIMIT: "5" }),
    ).toEqual({ logLevel: "debug", prettyLogs: true, poolLimit: 5 });
  });

  it("accepts silent", () => {
    expect(loadConfig({ LOG_LEVEL: "silent" }).logLevel).toBe("silent");
  });

  it("rejects unknown values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow();
    expect(() => loadConfig({ LOG_PRETTY: "yes" })).toThrow();
    expect(() => loadConfig({ POOL_LIMIT: "0" })).toThrow();
    expect(() => loadConfig({ POOL_LIMIT: "1.5" })).toThrow();
  });
});

describe("partial loaders", () => {
  it("read only their own variables", () => {
    expect(loadLogConfig({ LOG_LEVEL: "warn", POOL_LIMIT: "0" })).toEqual({
      logLevel: "warn",
      prettyLogs: false,
    });
    expect(loadPoolLimit({ POOL_LIMIT: "7", LOG_PRETTY: "yes" })).toBe(7);
  });

  it("still reject their own bad values", () => {
    expect(() => loadLogConfig({ LOG_PRETTY: "yes" })).toThrow();
    expect(() => loadPoolLimit({ POOL_LIMIT: "-3" })).toThrow();
  });
});
