/**
 * Index type hint.
 *
 * The generated header carries a commented-out typedef naming the smallest
 * unsigned type that can hold every tensor index. The typedef stays inert;
 * the consuming code base defines the real type.
 */
import type { IndexTypeHint } from "@tnames/core";

/** Largest tensor count hinted with a single-byte index type. */
export const NARROW_INDEX_LIMIT = 256;

export function indexTypeHint(numTensors: number): IndexTypeHint {
  return numTensors <= NARROW_INDEX_LIMIT
    ? { width: 1, cType: "uchar" }
    : { width: 2, cType: "ushort" };
}

export function hintComment(hint: IndexTypeHint): string {
  return `//typedef ${hint.cType} TName;`;
}
