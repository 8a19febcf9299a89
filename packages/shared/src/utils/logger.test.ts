import { describe, it, expect, afterEach } from "vitest";
import { createLogger, loggerOptions } from "./logger.js";

describe("createLogger", () => {
  const originalEnv = process.env["LOG_LEVEL"];

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env["LOG_LEVEL"] = originalEnv;
    } else {
      delete process.env["LOG_LEVEL"];
    }
  });

  it("returns a logger with expected methods", () => {
    const logger = createLogger("test-service");
    expect(typeof logger.info).toBe("function");
    expect(typeof logger.warn).toBe("function");
    expect(typeof logger.error).toBe("function");
    expect(typeof logger.debug).toBe("function");
    expect(typeof logger.fatal).toBe("function");
  });

  it("defaults to info level when LOG_LEVEL not set", () => {
    delete process.env["LOG_LEVEL"];
    expect(createLogger("test").level).toBe("info");
  });

  it("respects LOG_LEVEL environment variable", () => {
    process.env["LOG_LEVEL"] = "debug";
    expect(createLogger("test").level).toBe("debug");
  });

  it("creates separate logger instances", () => {
    expect(createLogger("service-a")).not.toBe(createLogger("service-b"));
  });
});

describe("loggerOptions", () => {
  it("carries the service name and extra bindings", () => {
    const options = loggerOptions("querier", { region: "local" });
    expect(options.name).toBe("querier");
    expect(options.base).toEqual({ region: "local" });
  });

  it("formats the level as its label", () => {
    const options = loggerOptions("querier");
    expect(options.formatters?.level?.("warn", 40)).toEqual({ level: "warn" });
  });
});
