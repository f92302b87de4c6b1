import { describe, it, expect } from "vitest";
import { LogLevel } from "effect";
import { formatLogLine, parseLogLevel, isLogLevelName } from "@tnames/effect-runtime";

describe("formatLogLine", () => {
  const date = new Date("2026-03-04T05:06:07.089Z");

  it("prints time, padded level and message", () => {
    expect(formatLogLine(LogLevel.Info, "wrote header", date)).toBe("[05:06:07.089] INFO  wrote header");
  });

  it("joins message parts and serialises non-strings", () => {
    expect(formatLogLine(LogLevel.Warning, ["count", { declared: 3 }], date)).toBe(
      '[05:06:07.089] WARN  count {"declared":3}',
    );
  });
});

describe("parseLogLevel", () => {
  it("maps names case-insensitively", () => {
    expect(parseLogLevel("DEBUG")).toBe(LogLevel.Debug);
    expect(parseLogLevel("warning")).toBe(LogLevel.Warning);
    expect(parseLogLevel("warn")).toBe(LogLevel.Warning);
    expect(parseLogLevel("error")).toBe(LogLevel.Error);
  });

  it("falls back to info", () => {
    expect(parseLogLevel("verbose")).toBe(LogLevel.Info);
    expect(isLogLevelName("verbose")).toBe(false);
    expect(isLogLevelName("Info")).toBe(true);
  });
});
