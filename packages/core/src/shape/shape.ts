/**
 * Runtime shape management and validation
 *
 * A `Shape` is an immutable value object: an ordered list of non-negative
 * dimension sizes with its rank, element count and row-major strides computed
 * once at construction.
 */

import {
  IndexOutOfRangeError,
  InvalidArgumentError,
  RankMismatchError,
} from '../errors';
import type { Dims } from './types';

// =============================================================================
// Configuration and Constants
// =============================================================================

/**
 * Maximum number of elements allowed in an array
 * Default: Number.MAX_SAFE_INTEGER (2^53 - 1), the largest exact flat index
 */
export const MAX_SIZE = Number.MAX_SAFE_INTEGER;

/**
 * Maximum rank (number of dimensions) of an array
 */
export const MAX_RANK = 32;

// =============================================================================
// Runtime Shape Class
// =============================================================================

/**
 * Runtime representation of an array shape with computed properties
 */
export class Shape<D extends Dims = Dims> {
  readonly dims: D;
  private readonly _size: number;
  private readonly _strides: readonly number[];

  constructor(dims: D) {
    Shape.validate(dims);
    this.dims = dims;
    this._size = Shape.product(dims);
    this._strides = computeStrides(dims);
  }

  /**
   * Shape of a rank-0 (scalar) array
   */
  static scalar(): Shape<readonly []> {
    return new Shape([] as const);
  }

  /**
   * Create a shape from its dimension sizes
   *
   * @example
   * Shape.of(2, 3).dims // readonly [2, 3]
   */
  static of<const D extends Dims>(...dims: D): Shape<D> {
    return new Shape(dims);
  }

  /**
   * Number of dimensions
   */
  get rank(): number {
    return this.dims.length;
  }

  /**
   * Total number of elements (1 for a scalar)
   */
  get size(): number {
    return this._size;
  }

  /**
   * Row-major strides, in elements
   */
  get strides(): readonly number[] {
    return this._strides;
  }

  get isScalar(): boolean {
    return this.dims.length === 0;
  }

  /**
   * Size of one dimension, with support for negative indexing
   */
  dim(index: number): number {
    const normalized = index < 0 ? this.rank + index : index;
    const dimension = this.dims[normalized];
    if (!Number.isInteger(normalized) || dimension === undefined) {
      throw new IndexOutOfRangeError(
        `Dimension index ${index.toString()} out of bounds for rank ${this.rank.toString()} shape`,
        { index, rank: this.rank },
      );
    }
    return dimension;
  }

  /**
   * Shape made of dimensions `[begin, end)`
   */
  subShape(begin: number, end: number = this.rank): Shape {
    if (begin < 0 || end > this.rank || begin > end) {
      throw new IndexOutOfRangeError(
        `Invalid sub-shape range [${begin.toString()}, ${end.toString()}) for rank ${this.rank.toString()} shape`,
        { begin, end, rank: this.rank },
      );
    }
    return new Shape(this.dims.slice(begin, end));
  }

  /**
   * Shape with `dimension` inserted before the first dimension
   */
  prepend(dimension: number): Shape {
    return new Shape([dimension, ...this.dims]);
  }

  /**
   * Check if this shape is exactly equal to another
   */
  equals(other: Shape): boolean {
    return Shape.equals(this.dims, other.dims);
  }

  /**
   * Convert a flat row-major index to coordinates
   */
  unravel(index: number): number[] {
    if (!Number.isInteger(index) || index < 0 || index >= this._size) {
      throw new IndexOutOfRangeError(
        `Index ${index.toString()} out of bounds for shape with ${this._size.toString()} elements`,
        { index, size: this._size },
      );
    }

    const coords = new Array<number>(this.rank);
    let remaining = index;
    this._strides.forEach((stride, i) => {
      coords[i] = Math.floor(remaining / stride);
      remaining %= stride;
    });
    return coords;
  }

  /**
   * Convert coordinates to a flat row-major index
   */
  ravel(coords: readonly number[]): number {
    if (coords.length !== this.rank) {
      throw new RankMismatchError(
        `Expected ${this.rank.toString()} coordinates, got ${coords.length.toString()}`,
        { rank: this.rank, coords },
      );
    }

    let index = 0;
    coords.forEach((coord, i) => {
      const dimension = this.dim(i);
      if (!Number.isInteger(coord) || coord < 0 || coord >= dimension) {
        throw new IndexOutOfRangeError(
          `Coordinate ${coord.toString()} out of bounds for dimension ${i.toString()} with size ${dimension.toString()}`,
          { dimension: i, coord, size: dimension },
        );
      }
      index += coord * (this._strides[i] ?? 0);
    });
    return index;
  }

  /**
   * String representation for debugging
   */
  toString(): string {
    return `Shape[${this.dims.join(', ')}]`;
  }

  // =============================================================================
  // Static Utility Methods
  // =============================================================================

  /**
   * Check if two dimension lists are exactly equal
   */
  static equals(dims1: Dims, dims2: Dims): boolean {
    if (dims1.length !== dims2.length) {
      return false;
    }
    return dims1.every((dim, i) => dim === dims2[i]);
  }

  /**
   * Compute the product of all dimensions
   */
  static product(dims: Dims): number {
    return dims.reduce((prod, dim) => prod * dim, 1);
  }

  /**
   * Validate that a dimension list is well-formed, throwing otherwise
   */
  static validate(dims: Dims): void {
    if (dims.length > MAX_RANK) {
      throw new InvalidArgumentError(
        `Shape rank ${dims.length.toString()} exceeds maximum supported rank of ${MAX_RANK.toString()}`,
        { rank: dims.length },
      );
    }

    dims.forEach((dim, i) => {
      if (!Number.isInteger(dim) || dim < 0) {
        throw new InvalidArgumentError(
          `Invalid dimension ${String(dim)} at index ${i.toString()}: dimensions must be non-negative integers`,
          { index: i, dim },
        );
      }
    });

    const size = Shape.product(dims);
    if (size > MAX_SIZE) {
      throw new InvalidArgumentError(
        `Shape size ${size.toString()} exceeds maximum safe size of ${MAX_SIZE.toString()}. ` +
          `Shape: [${dims.join(', ')}]`,
        { dims },
      );
    }
  }
}

// =============================================================================
// Shape Validation and Type Guards
// =============================================================================

/**
 * Type guard to check if a value is a valid dimension list
 */
export function isValidShape(value: unknown): value is Dims {
  if (!Array.isArray(value) || value.length > MAX_RANK) {
    return false;
  }
  const dims: unknown[] = value;
  if (!dims.every((dim) => typeof dim === 'number' && Number.isInteger(dim) && dim >= 0)) {
    return false;
  }
  return dims.reduce<number>((prod, dim) => prod * Number(dim), 1) <= MAX_SIZE;
}

/**
 * Assertion function for dimension list validation
 */
export function assertValidShape(value: unknown, message?: string): asserts value is Dims {
  if (!isValidShape(value)) {
    throw new InvalidArgumentError(message ?? `Invalid shape: ${JSON.stringify(value)}`);
  }
}

/**
 * Format a shape for display in error messages
 */
export function formatShape(shape: Shape | Dims): string {
  const dims = shape instanceof Shape ? shape.dims : shape;
  if (dims.length === 0) {
    return 'scalar []';
  }
  return `[${dims.join(', ')}]`;
}

/**
 * Compute strides for row-major (C-style) memory layout
 */
export function computeStrides(dims: Dims): number[] {
  const strides = new Array<number>(dims.length);
  let stride = 1;

  // right to left: the last dimension varies fastest
  for (let i = dims.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= dims[i] ?? 1;
  }

  return strides;
}
