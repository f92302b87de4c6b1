/**
 * Optional validation layer.
 *
 * The renderer accepts anything; these checks sit in front of it for
 * callers that want a broken request rejected before it turns into a
 * header that fails to compile.
 */
import { Effect } from "effect";
import {
  DuplicateMacroNameError,
  InvalidIdentifierError,
  InvalidRequestError,
  isPreprocessorIdentifier,
  type RenderRequest,
  type RequestValidationError,
} from "@tnames/core";
import { withSpan } from "@tnames/effect-runtime";
import { entriesOf } from "./mapping.js";
import { renderRequest } from "./render.js";

function isIndex(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

/** Offsets of every macro name that occurs more than once, first name first. */
export function findDuplicates(request: RenderRequest): [string, number[]][] {
  const seen = new Map<string, number[]>();
  entriesOf(request.tensorList).forEach(([name], i) => {
    const positions = seen.get(name);
    if (positions) positions.push(i);
    else seen.set(name, [i]);
  });
  return [...seen].filter(([, positions]) => positions.length > 1);
}

/**
 * Check identifiers, then duplicates, then counts and indices.
 * Succeeds with the request unchanged.
 */
export function validateRequest(
  request: RenderRequest,
): Effect.Effect<RenderRequest, RequestValidationError> {
  // The emitted guard is `_<headerGuard>`, so only its tail is checked.
  if (request.headerGuard.length === 0 || !isPreprocessorIdentifier(`_${request.headerGuard}`)) {
    return Effect.fail(new InvalidIdentifierError({
      message: `Invalid header guard "${request.headerGuard}"`,
      field: "headerGuard",
      value: request.headerGuard,
    }));
  }

  const entries = entriesOf(request.tensorList);
  for (const [name] of entries) {
    if (!isPreprocessorIdentifier(name)) {
      return Effect.fail(new InvalidIdentifierError({
        message: `Invalid macro name "${name}"`,
        field: "macroName",
        value: name,
      }));
    }
  }

  const duplicates = findDuplicates(request);
  if (duplicates.length > 0) {
    const [name, positions] = duplicates[0];
    return Effect.fail(new DuplicateMacroNameError({
      message: `Macro "${name}" defined ${positions.length} times (entries ${positions.join(", ")})`,
      name,
      positions,
    }));
  }

  if (!isIndex(request.numTensors)) {
    return Effect.fail(new InvalidRequestError({
      message: `numTensors must be a non-negative integer, got ${request.numTensors}`,
    }));
  }
  for (const [name, index] of entries) {
    if (!isIndex(index)) {
      return Effect.fail(new InvalidRequestError({
        message: `Index of "${name}" must be a non-negative integer, got ${index}`,
      }));
    }
  }

  return Effect.succeed(request);
}

/** Declared vs. actual tensor count, when they differ. */
export function countMismatch(
  request: RenderRequest,
): { readonly declared: number; readonly actual: number } | undefined {
  const actual = entriesOf(request.tensorList).length;
  return actual === request.numTensors ? undefined : { declared: request.numTensors, actual };
}

/** Validate, then render. */
export function renderChecked(
  request: RenderRequest,
): Effect.Effect<string, RequestValidationError> {
  return withSpan(
    "renderHeader",
    Effect.gen(function* () {
      const valid = yield* validateRequest(request);
      yield* Effect.logDebug(`rendering _${valid.headerGuard} (${valid.numTensors} tensors)`);
      return renderRequest(valid);
    }),
  );
}
