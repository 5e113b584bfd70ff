/**
 * @fileoverview Tests for logger construction.
 */

import { describe, it, expect } from "vitest";
import { createLogger, silentLogger } from "../../src/utils/logger.js";

describe("createLogger", () => {
  it("creates a stderr logger with the given level", () => {
    const logger = createLogger("test-logger", "debug");

    expect(logger.level).toBe("debug");
    expect(logger.isLevelEnabled("debug")).toBe(true);
    expect(logger.isLevelEnabled("trace")).toBe(false);
  });
});

describe("silentLogger", () => {
  it("discards every level", () => {
    expect(silentLogger.level).toBe("silent");
    expect(silentLogger.isLevelEnabled("fatal")).toBe(false);
  });
});
