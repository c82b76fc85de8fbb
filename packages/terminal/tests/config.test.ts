/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      LOG_DIR: "logs",
      LOG_TO_FILE: true,
      COLOR: true,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      NODE_ENV: "test",
      LOG_DIR: "/tmp/wallet-logs",
      LOG_TO_FILE: "false",
      COLOR: "false",
    });

    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("test");
    expect(config.LOG_DIR).toBe("/tmp/wallet-logs");
    expect(config.LOG_TO_FILE).toBe(false);
    expect(config.COLOR).toBe(false);
  });

  it("ignores unrelated variables", () => {
    const config = loadConfig({ PATH: "/usr/bin", HOME: "/root" });
    expect(config).not.toHaveProperty("PATH");
  });

  it("throws on an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });

  it("throws on a flag that is not true or false", () => {
    expect(() => loadConfig({ LOG_TO_FILE: "yes" })).toThrow(ZodError);
  });

  it("throws on an empty log directory", () => {
    expect(() => loadConfig({ LOG_DIR: "" })).toThrow(ZodError);
  });
});
