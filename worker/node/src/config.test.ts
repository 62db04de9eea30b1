import { describe, it, expect, vi } from "vitest";
import { loadConfig } from "./config.js";

function createLog() {
  return { warn: vi.fn() };
}

describe("loadConfig", () => {
  it("should use defaults for an empty environment", () => {
    const log = createLog();
    expect(loadConfig({ env: {}, log })).toEqual({
      serviceName: "procedure-router",
      logLevel: "info",
      maxLineBytes: 1_048_576,
      requestTimeoutMs: undefined,
    });
    expect(log.warn).not.toHaveBeenCalled();
  });

  it("should read values from the environment", () => {
    const config = loadConfig({
      env: { SERVICE_NAME: "orders", LOG_LEVEL: "debug", MAX_LINE_BYTES: "2048", REQUEST_TIMEOUT_MS: "1500" },
      log: createLog(),
    });
    expect(config).toEqual({
      serviceName: "orders",
      logLevel: "debug",
      maxLineBytes: 2048,
      requestTimeoutMs: 1500,
    });
  });

  it("should fall back and warn on invalid values", () => {
    const log = createLog();
    const config = loadConfig({
      env: { LOG_LEVEL: "verbose", MAX_LINE_BYTES: "-1", REQUEST_TIMEOUT_MS: "1.5" },
      log,
    });
    expect(config.logLevel).toBe("info");
    expect(config.maxLineBytes).toBe(1_048_576);
    expect(config.requestTimeoutMs).toBeUndefined();
    expect(log.warn).toHaveBeenCalledTimes(3);
    expect(log.warn).toHaveBeenCalledWith(
      { name: "MAX_LINE_BYTES", value: "-1" },
      "procroute-worker:config:loadConfig - Ignoring invalid integer"
    );
  });
});
