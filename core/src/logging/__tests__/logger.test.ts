/**
 * Tests for logger.ts
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { createLogger, resolveLogLevel, setLogLevel, getLogLevel } from "../logger.js";

describe("createLogger", () => {
  let spies: Array<{ mockRestore: () => void }>;
  let logSpy: ReturnType<typeof jest.spyOn>;
  let warnSpy: ReturnType<typeof jest.spyOn>;
  let debugSpy: ReturnType<typeof jest.spyOn>;

  beforeEach(() => {
    setLogLevel("info");
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    debugSpy = jest.spyOn(console, "debug").mockImplementation(() => {});
    spies = [logSpy, warnSpy, debugSpy];
  });

  afterEach(() => {
    spies.forEach((spy) => spy.mockRestore());
    setLogLevel("info");
  });

  it("is silent unless asked otherwise", () => {
    const logger = createLogger();
    logger.log("test");
    logger.warn("test");
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("prepends the prefix to string messages", () => {
    const logger = createLogger({ silent: false, prefix: "[Store]" });
    logger.log("evicted", 3);
    expect(logSpy).toHaveBeenCalledWith("[Store] evicted", 3);
  });

  it("puts the prefix in front of non-string arguments", () => {
    const logger = createLogger({ silent: false, prefix: "[Store]" });
    logger.warn({ id: 4 });
    expect(warnSpy).toHaveBeenCalledWith("[Store]", { id: 4 });
  });

  it("drops debug output at info level", () => {
    const logger = createLogger({ silent: false });
    logger.debug("hidden");
    expect(debugSpy).not.toHaveBeenCalled();
  });

  it("follows level changes made after creation", () => {
    const logger = createLogger({ silent: false });
    setLogLevel("debug");
    logger.debug("shown");
    expect(debugSpy).toHaveBeenCalledWith("shown");

    setLogLevel("error");
    logger.log("quiet");
    logger.warn("quiet");
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
    expect(getLogLevel()).toBe("error");
  });
});

describe("resolveLogLevel", () => {
  it("prefers the environment override", () => {
    expect(resolveLogLevel("warn", { NOTIFLUX_LOG: "DEBUG" })).toBe("debug");
  });

  it("ignores unknown environment values", () => {
    expect(resolveLogLevel("warn", { NOTIFLUX_LOG: "loud" })).toBe("warn");
  });

  it("falls back to info", () => {
    expect(resolveLogLevel(undefined, {})).toBe("info");
  });
});
