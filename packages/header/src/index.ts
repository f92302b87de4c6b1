/**
 * @tnames/header -- renders tensor name headers.
 *
 * Provides the renderer, the index type hint policy, an optional
 * validation layer, and request/output file helpers.
 */
export { renderHeader, renderRequest } from "./render.js";
export { NARROW_INDEX_LIMIT, indexTypeHint, hintComment } from "./hint.js";
export { entriesOf, mappingFromRecord, integerLikeKeys, guardFromPath } from "./mapping.js";
export { validateRequest, findDuplicates, countMismatch, renderChecked } from "./validate.js";
export { parseRequest, loadRequest, writeHeader, type RequestDefaults } from "./persist.js";
