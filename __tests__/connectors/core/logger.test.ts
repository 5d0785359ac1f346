import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger, SilentLogger, createLogger } from "../../../src/connectors/core/logger.js";

describe("ConsoleLogger", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the component and appends data", () => {
    const logger = new ConsoleLogger("cache");
    logger.info("Cached item", { id: "A" });
    logger.warn("Slow down");
    logger.error("Gave up");

    expect(console.log).toHaveBeenCalledWith('[cache] Cached item {"id":"A"}');
    expect(console.warn).toHaveBeenCalledWith("[cache] ⚠ Slow down");
    expect(console.error).toHaveBeenCalledWith("[cache] ✗ Gave up");
  });

  it("drops messages below its level", () => {
    const logger = new ConsoleLogger("migrate", "warn");
    logger.info("hidden");
    logger.progress(1, 2, "Migrating");
    logger.warn("shown");

    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith("[migrate] ⚠ shown");
  });
});

describe("createLogger", () => {
  it("returns a silent logger for the silent level", () => {
    expect(createLogger("notion", "silent")).toBeInstanceOf(SilentLogger);
    expect(createLogger("notion")).toBeInstanceOf(ConsoleLogger);
  });
});
