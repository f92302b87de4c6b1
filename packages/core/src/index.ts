export type {
  TensorIndexEntry,
  TensorIndexMapping,
  RenderRequest,
  IndexWidth,
  IndexTypeHint,
} from "./types.js";

export {
  InvalidIdentifierError,
  DuplicateMacroNameError,
  InvalidRequestError,
  RequestFileError,
  EmitError,
  ConfigError,
  type RequestValidationError,
} from "./errors.js";

export { isPreprocessorIdentifier, toIdentifierFragment } from "./identifiers.js";
