/**
 * Command: tnames render
 *
 * Usage:
 *   tnames render --input=model.tensors.json --out=include/tensor_names.hpp
 */
import { Effect } from "effect";
import { entriesOf, renderChecked, renderRequest, writeHeader } from "@tnames/header";
import { withSpan } from "@tnames/effect-runtime";
import { runCommand } from "../run.js";
import { requestFromArgs } from "./request.js";

export function renderCmd(args: string[]): Promise<number> {
  return runCommand(args, (kv, config) =>
    withSpan("render", Effect.gen(function* () {
      const request = yield* requestFromArgs(kv, config);
      const text = config.strict ? yield* renderChecked(request) : renderRequest(request);

      const out = kv["out"];
      if (!out) {
        yield* Effect.sync(() => process.stdout.write(text));
        return 0;
      }

      yield* writeHeader(out, text);
      yield* Effect.logInfo(
        `Wrote ${entriesOf(request.tensorList).length} tensor names to ${out} (guard _${request.headerGuard})`,
      );
      return 0;
    })),
  );
}
