/**
 * Structured logging and tracing integration.
 *
 * Log lines go to stderr so a header printed to stdout stays clean.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function messageText(message: unknown): string {
  const parts = Array.isArray(message) ? message : [message];
  return parts
    .map((part: unknown) => (typeof part === "string" ? part : JSON.stringify(part)))
    .join(" ");
}

export function formatLogLine(logLevel: LogLevel.LogLevel, message: unknown, date: Date): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  return `[${ts}] ${lvl} ${messageText(message)}`;
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  console.error(formatLogLine(logLevel, message, date));
});

/** Replace the default logger with `prettyLogger`, filtered at `level`. */
export function LoggerLive(level: LogLevel.LogLevel): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
}

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "warning", "error"];

export function isLogLevelName(level: string): boolean {
  return LOG_LEVELS.includes(level.toLowerCase());
}

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}
