/**
 * CLI configuration: defaults, resolution from parsed args, validation.
 */
import { Effect } from "effect";
import { ConfigError } from "@tnames/core";
import { isLogLevelName } from "@tnames/effect-runtime";
import { boolArg, strArg } from "./parse.js";

export interface CliConfig {
  /** Validate requests before rendering. */
  readonly strict: boolean;
  readonly logLevel: string;
  /** Log a warning when numTensors differs from the entry count. */
  readonly warnOnCountMismatch: boolean;
}

export const defaultCliConfig: CliConfig = {
  strict: false,
  logLevel: "info",
  warnOnCountMismatch: true,
};

/** Guard used when neither --guard nor --out names one. */
export const DEFAULT_HEADER_GUARD = "TENSOR_NAMES_HPP";

export function resolveCliConfig(kv: Record<string, string>): Effect.Effect<CliConfig, ConfigError> {
  const config: CliConfig = {
    strict: boolArg(kv, "strict", defaultCliConfig.strict),
    logLevel: strArg(kv, "logLevel", defaultCliConfig.logLevel),
    warnOnCountMismatch: boolArg(kv, "warnOnCountMismatch", defaultCliConfig.warnOnCountMismatch),
  };
  return validateCliConfig(config);
}

export function validateCliConfig(config: CliConfig): Effect.Effect<CliConfig, ConfigError> {
  if (!isLogLevelName(config.logLevel)) {
    return Effect.fail(new ConfigError({
      message: `logLevel must be one of debug, info, warn, error; got "${config.logLevel}"`,
    }));
  }
  return Effect.succeed(config);
}
