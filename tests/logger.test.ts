// CHANGE: Verify logger respects configured log level.
// WHY: Per-request detail stays hidden unless debug output is requested.

import { afterEach, describe, expect, it, vi } from "vitest";
import { debug, getLogLevel, info, setLogLevel, warn } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("suppresses debug logs when level is info", () => {
    setLogLevel("info");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("hidden");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("emits debug logs when level is debug", () => {
    setLogLevel("debug");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("visible");
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(String(logSpy.mock.calls[0]?.[0])).toContain("[DEBUG] visible");
  });

  it("routes warnings to stderr and filters info at warn level", () => {
    setLogLevel("warn");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    info("quiet");
    warn("slow mode");
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("rejects unknown levels", () => {
    expect(() => setLogLevel("verbose")).toThrow("Unsupported log level: verbose");
    expect(getLogLevel()).toBe("info");
  });
});
