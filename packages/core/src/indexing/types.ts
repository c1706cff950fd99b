/**
 * Index specifications
 *
 * A closed set of per-dimension coordinate transforms used when slicing an
 * array. Each variant is resolved against the size of the dimension it applies
 * to (see `resolveIndex`).
 */

/**
 * Anything that can supply a single integer coordinate at slice time, such as
 * a rank-0 `NdArray<number>` or `NdArray<bigint>`
 */
export interface IndexSource {
  readonly rank: number;
  getValue(...coords: number[]): number | bigint;
}

/**
 * Keep the whole dimension
 */
export interface AllIndex {
  readonly kind: 'all';
}

/**
 * Fix the dimension to one position; the dimension is removed from the result
 */
export interface AtIndex {
  readonly kind: 'at';
  readonly position: number | IndexSource;
}

/**
 * Half-open interval `[begin, end)` visited every `step` positions
 */
export interface RangeIndex {
  readonly kind: 'range';
  readonly begin: number;
  readonly end: number;
  readonly step: number;
}

/**
 * Explicit list of positions, in any order and possibly repeated
 */
export interface SequenceIndex {
  readonly kind: 'sequence';
  readonly positions: readonly number[];
}

/**
 * Positions 0, 2, 4, ...
 */
export interface EvenIndex {
  readonly kind: 'even';
}

/**
 * Positions 1, 3, 5, ...
 */
export interface OddIndex {
  readonly kind: 'odd';
}

/**
 * Whole dimension in reverse order
 */
export interface FlipIndex {
  readonly kind: 'flip';
}

/**
 * Interval `[begin, size)`
 */
export interface FromIndex {
  readonly kind: 'from';
  readonly begin: number;
}

/**
 * Interval `[0, end)`
 */
export interface ToIndex {
  readonly kind: 'to';
  readonly end: number;
}

export type IndexSpec =
  | AllIndex
  | AtIndex
  | RangeIndex
  | SequenceIndex
  | EvenIndex
  | OddIndex
  | FlipIndex
  | FromIndex
  | ToIndex;

export type IndexKind = IndexSpec['kind'];

/**
 * Linear coordinate transform `original = start + local * step`
 */
export interface AffineMapping {
  readonly start: number;
  readonly step: number;
}

/**
 * Index specification resolved against a concrete dimension size
 */
export interface ResolvedIndex {
  /** Size of the resulting dimension (0 when collapsed) */
  readonly size: number;
  /** True when the dimension is removed from the result (`at`) */
  readonly collapsed: boolean;
  /** Maps a coordinate of the result to a coordinate of the source */
  map(index: number): number;
  /** Present when `map` is linear, letting strided views stay strided */
  readonly affine?: AffineMapping;
}
