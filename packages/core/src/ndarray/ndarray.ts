/**
 * N-dimensional array views over data buffers
 *
 * An `NdArray` pairs a shape with a position mapping into a `DataBuffer`.
 * `get`, `slice` and `elements` return new views of the same buffer: writes
 * through any view are visible through all others. Only `copyTo`, `read` and
 * `toArray` move data out.
 */

import type { DataBuffer, WritableArrayLike } from '../buffer/types';
import { isDataBuffer } from '../buffer/types';
import {
  BufferOverrunError,
  BufferUnderrunError,
  IndexOutOfRangeError,
  InvalidArgumentError,
  InvalidOffsetError,
  RankMismatchError,
  ReadOnlyViolationError,
  ShapeMismatchError,
} from '../errors';
import { resolveIndex } from '../indexing/resolve';
import type { IndexSpec } from '../indexing/types';
import { ElementSequence } from '../sequence/element-sequence';
import { formatShape, Shape } from '../shape/shape';
import type { Dims } from '../shape/types';
import type { ArrayMapping, Dimension } from './dimension';
import { applyIndex, rowMajorMapping } from './dimension';
import { formatNdArray } from './format';
import type { FormatOptions } from './format';

/**
 * Nested JS arrays mirroring an array's dimensions; a bare value at rank 0
 */
export type NestedArray<T> = T | NestedArray<T>[];

export class NdArray<T> implements Iterable<NdArray<T>> {
  readonly shape: Shape;
  readonly buffer: DataBuffer<T>;
  private readonly base: number;
  private readonly dimensions: readonly Dimension[];

  /**
   * @param shape - Dimensions of the array
   * @param buffer - Storage holding at least `shape.size` elements
   * @param mapping - Position mapping into `buffer`, dense row-major from 0 when omitted
   * @throws {InvalidArgumentError} If a dense array would not fit in `buffer`
   */
  constructor(shape: Shape | Dims, buffer: DataBuffer<T>, mapping?: ArrayMapping) {
    this.shape = shape instanceof Shape ? shape : new Shape(shape);
    this.buffer = buffer;
    if (mapping === undefined) {
      if (buffer.size < this.shape.size) {
        throw new InvalidArgumentError(
          `Buffer of size ${buffer.size.toString()} is too small for shape ${formatShape(this.shape)}`,
          { size: buffer.size, required: this.shape.size },
        );
      }
      mapping = rowMajorMapping(this.shape.dims);
    }
    this.base = mapping.base;
    this.dimensions = mapping.dimensions;
  }

  get rank(): number {
    return this.shape.rank;
  }

  get size(): number {
    return this.shape.size;
  }

  // =============================================================================
  // Element access
  // =============================================================================

  /**
   * Value of the element at `coords`
   *
   * @throws {RankMismatchError} If `coords.length !== rank`
   * @throws {IndexOutOfRangeError} If a coordinate is outside its dimension
   */
  getValue(...coords: number[]): T {
    this.checkScalarCoords(coords);
    return this.buffer.get(this.positionOf(coords));
  }

  setValue(value: T, ...coords: number[]): this {
    this.checkScalarCoords(coords);
    this.buffer.set(value, this.positionOf(coords));
    return this;
  }

  /**
   * View of the sub-array at `coords`, of rank `rank - coords.length`
   *
   * @example
   * const matrix = NdArrays.ofInts([5, 4, 5]).get(1); // shape [4, 5]
   * const scalar = matrix.get(2, 3); // rank 0
   */
  get(...coords: number[]): NdArray<T> {
    if (coords.length > this.rank) {
      throw new RankMismatchError(
        `Cannot index rank ${this.rank.toString()} array with ${coords.length.toString()} coordinates`,
        { rank: this.rank, coords },
      );
    }
    if (coords.length === 0) {
      return this;
    }
    const base = this.positionOf(coords);
    return new NdArray(this.shape.subShape(coords.length), this.buffer, {
      base,
      dimensions: this.dimensions.slice(coords.length),
    });
  }

  /**
   * Copy `source` into the sub-array at `coords`
   */
  set(source: NdArray<T>, ...coords: number[]): this {
    source.copyTo(this.get(...coords));
    return this;
  }

  /**
   * View selected by one index specification per leading dimension; the
   * remaining dimensions are kept whole
   *
   * @example
   * array.slice(at(1), range(0, 4, 2)); // row 1, every other column
   * array.slice(flip());                // first dimension reversed
   *
   * @throws {RankMismatchError} If more specs than dimensions are given
   */
  slice(...indices: IndexSpec[]): NdArray<T> {
    if (indices.length > this.rank) {
      throw new RankMismatchError(
        `Cannot slice rank ${this.rank.toString()} array with ${indices.length.toString()} indices`,
        { rank: this.rank, indices: indices.length },
      );
    }

    let base = this.base;
    const dims: number[] = [];
    const dimensions: Dimension[] = [];
    this.dimensions.forEach((dimension, i) => {
      const spec = indices[i];
      if (spec === undefined) {
        dims.push(dimension.size);
        dimensions.push(dimension);
        return;
      }
      const applied = applyIndex(dimension, resolveIndex(spec, dimension.size));
      base += applied.shift;
      if (applied.dimension !== undefined) {
        dims.push(applied.dimension.size);
        dimensions.push(applied.dimension);
      }
    });

    return new NdArray(new Shape(dims), this.buffer, { base, dimensions });
  }

  /**
   * View of the same positions in `buffer`, which must have as many elements
   * as this array's buffer
   *
   * @throws {ShapeMismatchError} If the buffer sizes differ
   */
  withBuffer<U>(buffer: DataBuffer<U>): NdArray<U> {
    if (buffer.size !== this.buffer.size) {
      throw new ShapeMismatchError(
        `Cannot remap array over a buffer of ${buffer.size.toString()} elements, expected ${this.buffer.size.toString()}`,
        { size: buffer.size, expected: this.buffer.size },
      );
    }
    return new NdArray(this.shape, buffer, { base: this.base, dimensions: this.dimensions });
  }

  // =============================================================================
  // Iteration
  // =============================================================================

  /**
   * Sub-arrays obtained by fixing the `depth` leading coordinates, in row-major
   * order
   *
   * @throws {RankMismatchError} If `depth` is not in `[0, rank)`
   */
  elements(depth: number): ElementSequence<T> {
    if (!Number.isInteger(depth) || depth < 0 || depth >= this.rank) {
      throw new RankMismatchError(
        `Cannot iterate depth ${String(depth)} of rank ${this.rank.toString()} array`,
        { depth, rank: this.rank },
      );
    }
    return ElementSequence.create(this, depth);
  }

  /**
   * Every element as a rank-0 view, in row-major order
   */
  scalars(): ElementSequence<T> {
    return ElementSequence.create(this, this.rank);
  }

  /**
   * Sub-arrays along the first dimension
   *
   * @throws {RankMismatchError} On a rank-0 array
   */
  [Symbol.iterator](): Iterator<NdArray<T>> {
    return ElementSequence.create(this, 1)[Symbol.iterator]();
  }

  // =============================================================================
  // Transfers
  // =============================================================================

  /**
   * Copy every element into `dst`, which must have the same shape
   *
   * @throws {ShapeMismatchError} If the shapes differ
   * @throws {ReadOnlyViolationError} If `dst` is backed by a read-only buffer
   */
  copyTo(dst: NdArray<T>): this {
    if (!this.shape.equals(dst.shape)) {
      throw new ShapeMismatchError(
        `Cannot copy array of shape ${formatShape(this.shape)} to array of shape ${formatShape(dst.shape)}`,
        { source: this.shape.dims, destination: dst.shape.dims },
      );
    }
    dst.checkWritable();

    const source = this.contiguousBuffer();
    const target = dst.contiguousBuffer();
    if (source !== undefined && target !== undefined) {
      source.copyTo(target, this.size);
      return this;
    }
    // values are read in full first, so overlapping views copy consistently
    const values = this.values();
    dst.positions().forEach((position, i) => {
      dst.buffer.set(values[i], position);
    });
    return this;
  }

  /**
   * Copy every element, in row-major order, into `destination` from `offset`
   *
   * @throws {InvalidOffsetError} If `offset` is outside the destination
   * @throws {BufferOverrunError} If the destination cannot hold `size` elements past `offset`
   */
  read(destination: DataBuffer<T> | WritableArrayLike<T>, offset = 0): this {
    const length = isDataBuffer(destination) ? destination.size : destination.length;
    checkTransferOffset(offset, length);
    if (length - offset < this.size) {
      throw new BufferOverrunError(
        `Cannot read ${this.size.toString()} elements into ${(length - offset).toString()} remaining slots`,
        { size: this.size, offset, length },
      );
    }

    if (isDataBuffer(destination)) {
      if (destination.isReadOnly()) {
        throw new ReadOnlyViolationError('Cannot read into a read-only buffer');
      }
      const source = this.contiguousBuffer();
      if (source !== undefined) {
        source.copyTo(destination.offset(offset), this.size);
      } else {
        this.values().forEach((value, i) => {
          destination.set(value, offset + i);
        });
      }
      return this;
    }

    this.values().forEach((value, i) => {
      destination[offset + i] = value;
    });
    return this;
  }

  /**
   * Overwrite every element, in row-major order, from `source` starting at `offset`
   *
   * @throws {InvalidOffsetError} If `offset` is outside the source
   * @throws {BufferUnderrunError} If the source holds fewer than `size` elements past `offset`
   */
  write(source: DataBuffer<T> | ArrayLike<T>, offset = 0): this {
    const length = isDataBuffer(source) ? source.size : source.length;
    checkTransferOffset(offset, length);
    if (length - offset < this.size) {
      throw new BufferUnderrunError(
        `Cannot write ${this.size.toString()} elements from ${(length - offset).toString()} remaining values`,
        { size: this.size, offset, length },
      );
    }
    this.checkWritable();

    const target = this.contiguousBuffer();
    if (isDataBuffer(source)) {
      if (target !== undefined) {
        source.offset(offset).copyTo(target, this.size);
        return this;
      }
      const values = source.offset(offset).narrow(this.size).toArray();
      this.positions().forEach((position, i) => {
        this.buffer.set(values[i], position);
      });
      return this;
    }

    if (target !== undefined) {
      target.write(source, offset, this.size);
      return this;
    }
    this.positions().forEach((position, i) => {
      this.buffer.set(source[offset + i], position);
    });
    return this;
  }

  // =============================================================================
  // Utilities
  // =============================================================================

  /**
   * Elements as nested JS arrays; the bare element for a rank-0 array
   */
  toArray(): NestedArray<T> {
    const values = this.values();
    const dims = this.shape.dims;
    let cursor = 0;
    const build = (axis: number): NestedArray<T> => {
      if (axis === dims.length) {
        return values[cursor++];
      }
      return Array.from({ length: dims[axis] }, () => build(axis + 1));
    };
    return build(0);
  }

  /**
   * Check that `other` has the same shape and equal elements
   */
  equals(other: NdArray<T>, compare: (a: T, b: T) => boolean = (a, b) => a === b): boolean {
    if (!this.shape.equals(other.shape)) {
      return false;
    }
    const mine = this.values();
    const theirs = other.values();
    return mine.every((value, i) => compare(value, theirs[i]));
  }

  fill(value: T): this {
    this.checkWritable();
    const target = this.contiguousBuffer();
    if (target !== undefined) {
      target.fill(value);
      return this;
    }
    this.positions().forEach((position) => {
      this.buffer.set(value, position);
    });
    return this;
  }

  /**
   * Readable dump of the elements, truncated past `maxElements`
   *
   * @example
   * NdArrays.fromNested([[1, 2], [3, 4]], DataBuffers.ofInts).format();
   * // ndarray([
   * //  [1, 2],
   * //  [3, 4]
   * // ])
   */
  format(options?: FormatOptions): string {
    return formatNdArray(this, options);
  }

  toString(): string {
    return `NdArray(shape=${formatShape(this.shape)}, size=${this.size.toString()})`;
  }

  // =============================================================================
  // Internals
  // =============================================================================

  private checkScalarCoords(coords: readonly number[]): void {
    if (coords.length !== this.rank) {
      throw new RankMismatchError(
        `Expected ${this.rank.toString()} coordinates to address a value, got ${coords.length.toString()}`,
        { rank: this.rank, coords },
      );
    }
  }

  private checkWritable(): void {
    if (this.buffer.isReadOnly()) {
      throw new ReadOnlyViolationError('Cannot modify an array backed by a read-only buffer', {
        shape: this.shape.dims,
      });
    }
  }

  private positionOf(coords: readonly number[]): number {
    let position = this.base;
    coords.forEach((coord, i) => {
      const size = this.shape.dims[i];
      if (!Number.isInteger(coord) || coord < 0 || coord >= size) {
        throw new IndexOutOfRangeError(
          `Coordinate ${String(coord)} out of bounds for dimension ${i.toString()} with size ${size.toString()}`,
          { dimension: i, coord, size },
        );
      }
      position += this.dimensions[i].positionOf(coord);
    });
    return position;
  }

  /**
   * Buffer positions of all elements in row-major order
   */
  private positions(): number[] {
    const size = this.size;
    const rank = this.rank;
    const dims = this.shape.dims;
    const positions = new Array<number>(size);
    const coords = new Array<number>(rank).fill(0);

    for (let index = 0; index < size; index++) {
      let position = this.base;
      for (let axis = 0; axis < rank; axis++) {
        position += this.dimensions[axis].positionOf(coords[axis]);
      }
      positions[index] = position;

      // odometer step, last axis fastest
      for (let axis = rank - 1; axis >= 0; axis--) {
        coords[axis] += 1;
        if (coords[axis] < dims[axis]) {
          break;
        }
        coords[axis] = 0;
      }
    }
    return positions;
  }

  private values(): T[] {
    const source = this.contiguousBuffer();
    if (source !== undefined) {
      return source.toArray();
    }
    return this.positions().map((position) => this.buffer.get(position));
  }

  /**
   * Buffer slice holding exactly this array's elements in row-major order, if
   * the mapping is dense
   */
  private contiguousBuffer(): DataBuffer<T> | undefined {
    const strides = this.shape.strides;
    const dense = this.dimensions.every(
      (dimension, i) =>
        dimension.stride !== undefined && (dimension.size <= 1 || dimension.stride === strides[i]),
    );
    if (!dense || this.size === 0) {
      return undefined;
    }
    return this.buffer.slice(this.base, this.size);
  }
}

function checkTransferOffset(offset: number, length: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset > length) {
    throw new InvalidOffsetError(
      `Offset ${String(offset)} out of bounds for ${length.toString()} elements`,
      { offset, length },
    );
  }
}
