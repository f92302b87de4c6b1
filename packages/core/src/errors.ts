/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class InvalidIdentifierError extends Data.TaggedError("InvalidIdentifierError")<{
  readonly message: string;
  readonly field: "headerGuard" | "macroName";
  readonly value: string;
}> {}

export class DuplicateMacroNameError extends Data.TaggedError("DuplicateMacroNameError")<{
  readonly message: string;
  readonly name: string;
  /** 0-based entry offsets where the name occurs. */
  readonly positions: readonly number[];
}> {}

export class InvalidRequestError extends Data.TaggedError("InvalidRequestError")<{
  readonly message: string;
}> {}

export class RequestFileError extends Data.TaggedError("RequestFileError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class EmitError extends Data.TaggedError("EmitError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export type RequestValidationError =
  | InvalidIdentifierError
  | DuplicateMacroNameError
  | InvalidRequestError;
