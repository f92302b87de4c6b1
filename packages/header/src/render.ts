/**
 * Header renderer.
 *
 * Turns a macro name -> tensor index mapping into an include-guarded C/C++
 * header. Pure text production: names, indices and the guard are emitted
 * verbatim, nothing is sorted, deduplicated or checked. Use
 * `renderChecked` for the validating variant.
 */
import type { RenderRequest, TensorIndexMapping } from "@tnames/core";
import { hintComment, indexTypeHint } from "./hint.js";
import { entriesOf } from "./mapping.js";

export function renderHeader(
  headerGuard: string,
  numTensors: number,
  tensorList: TensorIndexMapping,
): string {
  const guard = `_${headerGuard}`;
  const lines: string[] = [];

  lines.push(`#ifndef ${guard}`);
  lines.push(`#define ${guard}`);
  lines.push("");
  lines.push(hintComment(indexTypeHint(numTensors)));
  lines.push("");

  const entries = entriesOf(tensorList);
  for (const [name, index] of entries) {
    lines.push(`#define ${name} ${index}`);
  }
  if (entries.length > 0) lines.push("");

  lines.push(`#endif // ${guard}`);
  lines.push("");

  return lines.join("\n");
}

export function renderRequest(request: RenderRequest): string {
  return renderHeader(request.headerGuard, request.numTensors, request.tensorList);
}
