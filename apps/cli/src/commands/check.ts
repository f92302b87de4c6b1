/**
 * Command: tnames check
 *
 * Runs the validation layer over a request without writing anything.
 */
import { Effect } from "effect";
import { entriesOf, validateRequest } from "@tnames/header";
import { runCommand } from "../run.js";
import { requestFromArgs } from "./request.js";

export function checkCmd(args: string[]): Promise<number> {
  return runCommand(args, (kv, config) =>
    Effect.gen(function* () {
      const request = yield* validateRequest(yield* requestFromArgs(kv, config));
      yield* Effect.logInfo(
        `ok: _${request.headerGuard}, ${entriesOf(request.tensorList).length} tensor names`,
      );
      return 0;
    }),
  );
}
