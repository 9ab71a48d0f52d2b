import { afterEach, describe, expect, it, vi } from "vitest";
import { resolveMonitoringConfig } from "../config/monitoring.js";
import { createLogger, isLogLevel, toErrorPayload } from "../logger.js";

const monitoring = resolveMonitoringConfig({ APP_ENV: "test" });

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("writes enriched entries to the console", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = createLogger({ module: "evaluator", monitoring });

    logger.info("Frame evaluated", { frameNum: 3 });

    expect(info).toHaveBeenCalledTimes(1);
    const [message, metadata] = info.mock.calls[0] ?? [];
    expect(message).toMatch(/^\[.+\] \[INFO\] Frame evaluated$/);
    expect(metadata).toMatchObject({
      frameNum: 3,
      module: "evaluator",
      environment: "test",
      level: "info",
    });
  });

  it("drops entries below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createLogger({ module: "cli", level: "warn", monitoring });

    logger.debug("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("routes fatal entries to console.error", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger({ module: "cli", monitoring });

    logger.fatal("crashed");

    expect(error.mock.calls[0]?.[0]).toMatch(/\[FATAL\] crashed$/);
  });

  it("flushes without a Better Stack client", async () => {
    const logger = createLogger({ module: "cli", monitoring });

    await expect(logger.flush()).resolves.toBeUndefined();
  });
});

describe("logger helpers", () => {
  it("recognises log levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("fatal")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });

  it("serialises thrown values", () => {
    const payload = toErrorPayload(new TypeError("bad frame"));

    expect(payload.name).toBe("TypeError");
    expect(payload.message).toBe("bad frame");
    expect(toErrorPayload("boom")).toEqual({
      message: "boom",
      name: "NonErrorThrown",
      stack: undefined,
    });
  });
});
