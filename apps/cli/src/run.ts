/**
 * Shared command runner: parses args, loads config, installs the logger,
 * and turns a failed command into a logged error and exit code 1.
 */
import { Effect, LogLevel } from "effect";
import type {
  ConfigError,
  EmitError,
  RequestFileError,
  RequestValidationError,
} from "@tnames/core";
import { LoggerLive, parseLogLevel } from "@tnames/effect-runtime";
import { loadConfig, parseKV } from "./parse.js";
import { resolveCliConfig, type CliConfig } from "./config.js";

export type CommandError = ConfigError | RequestFileError | RequestValidationError | EmitError;

export type CommandBody = (
  kv: Record<string, string>,
  config: CliConfig,
) => Effect.Effect<number, CommandError>;

export function runCommand(args: string[], body: CommandBody): Promise<number> {
  const program = Effect.gen(function* () {
    const kv = yield* loadConfig(parseKV(args));
    const config = yield* resolveCliConfig(kv);
    return yield* Effect.provide(body(kv, config), LoggerLive(parseLogLevel(config.logLevel)));
  });

  const handled = Effect.catchAll(program, (err) =>
    Effect.as(Effect.logError(`${err._tag}: ${err.message}`), 1),
  );

  return Effect.runPromise(Effect.provide(handled, LoggerLive(LogLevel.Info)));
}
