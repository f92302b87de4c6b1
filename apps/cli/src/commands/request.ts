/**
 * Loads the request named by --input and applies --guard / --out defaults.
 */
import { Effect } from "effect";
import type { ConfigError, RenderRequest, RequestFileError } from "@tnames/core";
import { countMismatch, guardFromPath, loadRequest } from "@tnames/header";
import { requireArg } from "../parse.js";
import { DEFAULT_HEADER_GUARD, type CliConfig } from "../config.js";

/**
 * Guard precedence: --guard, then the request's own `headerGuard`, then
 * the --out file name, then `TENSOR_NAMES_HPP`.
 */
export function requestFromArgs(
  kv: Record<string, string>,
  config: CliConfig,
): Effect.Effect<RenderRequest, ConfigError | RequestFileError> {
  return Effect.gen(function* () {
    const input = yield* requireArg(kv, "input", "path to request JSON");
    const out = kv["out"];
    const fallback = out ? guardFromPath(out) : DEFAULT_HEADER_GUARD;

    const loaded = yield* loadRequest(input, { headerGuard: fallback });
    const guard = kv["guard"];
    const request = guard ? { ...loaded, headerGuard: guard } : loaded;

    const mismatch = config.warnOnCountMismatch ? countMismatch(request) : undefined;
    if (mismatch) {
      yield* Effect.logWarning(
        `numTensors is ${mismatch.declared} but tensorList has ${mismatch.actual} entries`,
      );
    }
    return request;
  });
}
