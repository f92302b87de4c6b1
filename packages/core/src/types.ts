/**
 * Core types for tensor name headers.
 */

// ── Mapping ────────────────────────────────────────────────────────────────

/** One `#define`: macro name and tensor index. */
export type TensorIndexEntry = readonly [macroName: string, index: number];

/**
 * Ordered macro name -> tensor index mapping. Iteration order is emitted
 * order. The list form keeps repeated names, which a Map would collapse.
 */
export type TensorIndexMapping = readonly TensorIndexEntry[] | ReadonlyMap<string, number>;

// ── Request ────────────────────────────────────────────────────────────────

export interface RenderRequest {
  /** Include guard token, emitted as `_<headerGuard>`. */
  readonly headerGuard: string;
  /** Advisory tensor count; selects the index type hint only. */
  readonly numTensors: number;
  readonly tensorList: TensorIndexMapping;
}

// ── Index type hint ────────────────────────────────────────────────────────

export type IndexWidth = 1 | 2;

export interface IndexTypeHint {
  readonly width: IndexWidth;
  readonly cType: "uchar" | "ushort";
}
