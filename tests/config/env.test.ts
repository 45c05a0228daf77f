import { afterEach, describe, expect, it, vi } from "vitest";
import { config, envInt, parseLogLevel } from "../../src/config/env.js";

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("is frozen", () => {
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.store)).toBe(true);
  });

  it("reads the log level set for the test run", () => {
    expect(config.logLevel).toBe("error");
  });

  describe("envInt", () => {
    it("parses a set variable", () => {
      vi.stubEnv("STORE_TEST_INT", "250");

      expect(envInt("STORE_TEST_INT", 500)).toBe(250);
    });

    it("falls back when unset, empty, negative or not a number", () => {
      expect(envInt("STORE_TEST_UNSET", 500)).toBe(500);
      vi.stubEnv("STORE_TEST_INT", "");
      expect(envInt("STORE_TEST_INT", 500)).toBe(500);
      vi.stubEnv("STORE_TEST_INT", "-5");
      expect(envInt("STORE_TEST_INT", 500)).toBe(500);
      vi.stubEnv("STORE_TEST_INT", "soon");
      expect(envInt("STORE_TEST_INT", 500)).toBe(500);
    });
  });

  describe("parseLogLevel", () => {
    it("accepts known levels case-insensitively", () => {
      expect(parseLogLevel(" WARN ")).toBe("warn");
      expect(parseLogLevel("debug")).toBe("debug");
    });

    it("falls back on anything else", () => {
      expect(parseLogLevel(undefined)).toBe("info");
      expect(parseLogLevel("verbose", "error")).toBe("error");
    });
  });
});
