/**
 * Position mappings of array dimensions
 *
 * An array view locates element `(c0, ..., cn)` at buffer position
 * `base + Σ dimensions[i].positionOf(ci)`. Slicing rewrites the base and the
 * dimension list; the buffer is never touched.
 */

import type { Dims } from '../shape/types';
import { computeStrides } from '../shape/shape';
import type { ResolvedIndex } from '../indexing/types';

export interface Dimension {
  readonly size: number;
  /** Distance between consecutive positions, when they are evenly spaced */
  readonly stride: number | undefined;
  positionOf(index: number): number;
}

export class StridedDimension implements Dimension {
  constructor(
    readonly size: number,
    readonly stride: number,
  ) {}

  positionOf(index: number): number {
    return index * this.stride;
  }
}

/**
 * Dimension whose coordinates go through an arbitrary map before reaching
 * the source dimension (explicit position lists)
 */
export class MappedDimension implements Dimension {
  readonly stride = undefined;

  constructor(
    readonly size: number,
    private readonly source: Dimension,
    private readonly map: (index: number) => number,
  ) {}

  positionOf(index: number): number {
    return this.source.positionOf(this.map(index));
  }
}

export interface ArrayMapping {
  readonly base: number;
  readonly dimensions: readonly Dimension[];
}

/**
 * Dense row-major mapping of `dims` starting at `base`
 */
export function rowMajorMapping(dims: Dims, base = 0): ArrayMapping {
  const strides = computeStrides(dims);
  return {
    base,
    dimensions: dims.map((size, i) => new StridedDimension(size, strides[i])),
  };
}

/**
 * Apply a resolved index to `dimension`
 *
 * Returns the base shift and the replacement dimension, or `undefined` as the
 * dimension when the index collapses it.
 */
export function applyIndex(
  dimension: Dimension,
  resolved: ResolvedIndex,
): { shift: number; dimension: Dimension | undefined } {
  if (resolved.collapsed) {
    return { shift: dimension.positionOf(resolved.map(0)), dimension: undefined };
  }
  const affine = resolved.affine;
  if (affine !== undefined && dimension.stride !== undefined) {
    return {
      shift: resolved.size > 0 ? dimension.positionOf(affine.start) : 0,
      dimension: new StridedDimension(resolved.size, affine.step * dimension.stride),
    };
  }
  return {
    shift: 0,
    dimension: new MappedDimension(resolved.size, dimension, (index) => resolved.map(index)),
  };
}
