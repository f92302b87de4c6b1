import { describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import type { RenderRequest, RequestValidationError } from "@tnames/core";
import { isPreprocessorIdentifier, toIdentifierFragment } from "@tnames/core";
import { validateRequest, renderChecked, countMismatch, findDuplicates } from "@tnames/header";

function failure(request: RenderRequest): RequestValidationError {
  const result = Effect.runSync(Effect.either(validateRequest(request)));
  if (Either.isRight(result)) throw new Error("expected validation to fail");
  return result.left;
}

const good: RenderRequest = {
  headerGuard: "MODEL_H",
  numTensors: 2,
  tensorList: [["INPUT_0", 0], ["OUTPUT_0", 1]],
};

describe("identifiers", () => {
  it("accepts C identifiers", () => {
    expect(isPreprocessorIdentifier("_A1")).toBe(true);
    expect(isPreprocessorIdentifier("tensor_0")).toBe(true);
  });

  it("rejects leading digits and punctuation", () => {
    expect(isPreprocessorIdentifier("0A")).toBe(false);
    expect(isPreprocessorIdentifier("a-b")).toBe(false);
    expect(isPreprocessorIdentifier("")).toBe(false);
  });

  it("replaces invalid characters", () => {
    expect(toIdentifierFragment("conv2d/weights:0")).toBe("conv2d_weights_0");
  });
});

describe("validateRequest", () => {
  it("passes a well-formed request through unchanged", () => {
    expect(Effect.runSync(validateRequest(good))).toBe(good);
  });

  it("allows a guard that starts with a digit", () => {
    const request = { ...good, headerGuard: "3RD_MODEL" };
    expect(Effect.runSync(validateRequest(request))).toBe(request);
  });

  it("rejects an empty or malformed guard", () => {
    const empty = failure({ ...good, headerGuard: "" });
    expect(empty._tag).toBe("InvalidIdentifierError");

    const dashed = failure({ ...good, headerGuard: "MY-GUARD" });
    expect(dashed).toMatchObject({ _tag: "InvalidIdentifierError", field: "headerGuard", value: "MY-GUARD" });
  });

  it("rejects an invalid macro name", () => {
    const err = failure({ ...good, tensorList: [["OK", 0], ["conv/w", 1]] });
    expect(err).toMatchObject({ _tag: "InvalidIdentifierError", field: "macroName", value: "conv/w" });
  });

  it("reports duplicate names with their positions", () => {
    const err = failure({ ...good, tensorList: [["A", 0], ["B", 1], ["A", 2]] });
    expect(err).toMatchObject({ _tag: "DuplicateMacroNameError", name: "A", positions: [0, 2] });
    expect(err.message).toBe('Macro "A" defined 2 times (entries 0, 2)');
  });

  it("checks identifiers before duplicates", () => {
    const err = failure({ ...good, tensorList: [["A", 0], ["A", 1], ["9X", 2]] });
    expect(err._tag).toBe("InvalidIdentifierError");
  });

  it("rejects negative or fractional counts and indices", () => {
    expect(failure({ ...good, numTensors: -1 })._tag).toBe("InvalidRequestError");
    expect(failure({ ...good, numTensors: 1.5 })._tag).toBe("InvalidRequestError");
    const err = failure({ ...good, tensorList: [["A", -3]] });
    expect(err.message).toBe('Index of "A" must be a non-negative integer, got -3');
  });

  it("does not require numTensors to match the entry count", () => {
    const request = { ...good, numTensors: 500 };
    expect(Effect.runSync(validateRequest(request))).toBe(request);
  });
});

describe("findDuplicates", () => {
  it("lists every repeated name in first-seen order", () => {
    const request = { ...good, tensorList: [["B", 0], ["A", 1], ["B", 2], ["A", 3], ["C", 4]] as const };
    expect(findDuplicates(request)).toEqual([["B", [0, 2]], ["A", [1, 3]]]);
  });
});

describe("countMismatch", () => {
  it("is undefined when counts agree", () => {
    expect(countMismatch(good)).toBeUndefined();
  });

  it("reports declared and actual counts", () => {
    expect(countMismatch({ ...good, numTensors: 7 })).toEqual({ declared: 7, actual: 2 });
  });
});

describe("renderChecked", () => {
  it("renders a valid request", async () => {
    const text = await Effect.runPromise(renderChecked(good));
    expect(text).toContain("#define INPUT_0 0\n#define OUTPUT_0 1\n");
  });

  it("fails instead of rendering duplicates", async () => {
    const result = await Effect.runPromise(
      Effect.either(renderChecked({ ...good, tensorList: [["A", 0], ["A", 1]] })),
    );
    expect(Either.isLeft(result)).toBe(true);
  });
});
