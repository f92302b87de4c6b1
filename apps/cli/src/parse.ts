/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError } from "@tnames/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(
  kv: Record<string, string>,
  key: string,
  label?: string,
): Effect.Effect<string, ConfigError> {
  const val = kv[key];
  if (!val) {
    return Effect.fail(new ConfigError({
      message: `Missing required argument: --${key}${label ? ` (${label})` : ""}`,
    }));
  }
  return Effect.succeed(val);
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: Record<string, string>, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** Load a JSON config file and merge with CLI overrides. */
export function loadConfig(kv: Record<string, string>): Effect.Effect<Record<string, string>, ConfigError> {
  const configPath = kv["config"];
  if (!configPath) return Effect.succeed(kv);
  return Effect.tryPromise({
    try: async () => {
      const raw = await readFile(configPath, "utf-8");
      const config: unknown = JSON.parse(raw);
      if (typeof config !== "object" || config === null || Array.isArray(config)) {
        throw new Error("config must be a JSON object");
      }
      const flat: Record<string, string> = {};
      for (const [key, value] of Object.entries(config)) {
        flat[key] = String(value);
      }
      // CLI overrides take precedence
      return { ...flat, ...kv };
    },
    catch: (cause) =>
      new ConfigError({
        message: `Failed to load config from ${configPath}: ${cause instanceof Error ? cause.message : String(cause)}`,
        cause,
      }),
  });
}
