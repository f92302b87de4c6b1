/**
 * Helpers for building and reading tensor index mappings.
 */
import { toIdentifierFragment, type TensorIndexEntry, type TensorIndexMapping } from "@tnames/core";

/** List form of a mapping, in iteration order. */
export function entriesOf(mapping: TensorIndexMapping): TensorIndexEntry[] {
  return Array.from<TensorIndexEntry>(mapping);
}

/**
 * Keys an object enumerates ahead of all others, in ascending numeric
 * order, whatever order they were written in.
 */
export function integerLikeKeys(record: object): string[] {
  return Object.keys(record).filter((key) => /^(?:0|[1-9][0-9]*)$/.test(key));
}

/**
 * Entries of a plain object, in its own key order. Throws when a key is
 * integer-like, since the object no longer holds the order it was written
 * in; pass `[name, index]` pairs instead.
 */
export function mappingFromRecord(record: Readonly<Record<string, number>>): TensorIndexEntry[] {
  const reordered = integerLikeKeys(record);
  if (reordered.length > 0) {
    throw new Error(
      `Integer-like macro names (${reordered.join(", ")}) lose their order in an object; use [name, index] pairs`,
    );
  }
  return Object.entries(record);
}

/**
 * Derive a header guard from an output path.
 *
 * `out/tensor_names.hpp` -> `TENSOR_NAMES_HPP`
 */
export function guardFromPath(path: string): string {
  const base = path.split(/[\\/]/).pop() ?? path;
  return toIdentifierFragment(base).toUpperCase();
}
