/**
 * Request files and header output.
 *
 * A request file is JSON:
 *
 * ```json
 * { "headerGuard": "MODEL_TENSORS_H", "numTensors": 2,
 *   "tensorList": { "INPUT_0": 0, "OUTPUT_0": 1 } }
 * ```
 *
 * `tensorList` may also be an array of `[name, index]` pairs, which keeps
 * repeated names. The object form rejects integer-like names: JSON objects
 * enumerate those first, so the written order would be lost. Every I/O operation is wrapped in `Effect.tryPromise` so
 * callers get typed failures instead of raw exceptions.
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { EmitError, RequestFileError, type RenderRequest, type TensorIndexEntry } from "@tnames/core";
import { integerLikeKeys } from "./mapping.js";

export interface RequestDefaults {
  /** Used when the request carries no `headerGuard`. */
  readonly headerGuard?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toEntry(name: unknown, index: unknown, where: string): TensorIndexEntry {
  if (typeof name !== "string") {
    throw new Error(`${where}: macro name must be a string`);
  }
  if (typeof index !== "number") {
    throw new Error(`${where}: index of "${name}" must be a number`);
  }
  return [name, index];
}

function toEntries(list: unknown): TensorIndexEntry[] {
  if (Array.isArray(list)) {
    return list.map((pair: unknown, i) => {
      if (!Array.isArray(pair) || pair.length !== 2) {
        throw new Error(`tensorList[${i}] must be a [name, index] pair`);
      }
      return toEntry(pair[0], pair[1], `tensorList[${i}]`);
    });
  }
  if (isRecord(list)) {
    const reordered = integerLikeKeys(list);
    if (reordered.length > 0) {
      throw new Error(
        `tensorList: integer-like macro names (${reordered.join(", ")}) lose their order in an object; use a list of [name, index] pairs`,
      );
    }
    return Object.entries(list).map(([name, index]) => toEntry(name, index, "tensorList"));
  }
  throw new Error("Missing or invalid 'tensorList' field");
}

/**
 * Turn parsed JSON into a request. `numTensors` defaults to the number of
 * entries.
 */
export function parseRequest(
  data: unknown,
  defaults: RequestDefaults = {},
): Effect.Effect<RenderRequest, RequestFileError> {
  return Effect.try({
    try: () => {
      if (!isRecord(data)) {
        throw new Error("Request must be a JSON object");
      }

      const tensorList = toEntries(data.tensorList);

      const headerGuard = data.headerGuard ?? defaults.headerGuard;
      if (typeof headerGuard !== "string") {
        throw new Error("Missing or invalid 'headerGuard' field");
      }

      const numTensors = data.numTensors ?? tensorList.length;
      if (typeof numTensors !== "number") {
        throw new Error("Invalid 'numTensors' field");
      }

      return { headerGuard, numTensors, tensorList } satisfies RenderRequest;
    },
    catch: (cause) =>
      new RequestFileError({
        message: cause instanceof Error ? cause.message : String(cause),
        cause,
      }),
  });
}

/** Read and parse a JSON request file. */
export function loadRequest(
  path: string,
  defaults: RequestDefaults = {},
): Effect.Effect<RenderRequest, RequestFileError> {
  const read = Effect.tryPromise({
    try: async () => JSON.parse(await readFile(path, "utf-8")) as unknown,
    catch: (cause) =>
      new RequestFileError({
        message: `Failed to read request from "${path}"`,
        cause,
      }),
  });
  return Effect.flatMap(read, (data) =>
    Effect.mapError(parseRequest(data, defaults), (err) =>
      new RequestFileError({ message: `${path}: ${err.message}`, cause: err }),
    ),
  );
}

/**
 * Write header text to disk, creating parent directories if they don't
 * already exist.
 */
export function writeHeader(path: string, text: string): Effect.Effect<void, EmitError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, text, "utf-8");
    },
    catch: (cause) =>
      new EmitError({
        message: `Failed to write header to "${path}"`,
        cause,
      }),
  });
}
