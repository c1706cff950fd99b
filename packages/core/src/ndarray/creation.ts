/**
 * Array creation helpers
 */

import { ArrayDataBuffer } from '../buffer/array-buffer';
import { DataBuffers } from '../buffer/data-buffers';
import type { DataBuffer } from '../buffer/types';
import { InvalidArgumentError } from '../errors';
import type { Complex } from '../layout/types';
import { Shape } from '../shape/shape';
import type { Dims } from '../shape/types';
import { NdArray } from './ndarray';
import type { NestedArray } from './ndarray';

function toShape(shape: Shape | Dims): Shape {
  return shape instanceof Shape ? shape : new Shape(shape);
}

function allocate<T>(shape: Shape | Dims, create: (size: number) => DataBuffer<T>): NdArray<T> {
  const resolved = toShape(shape);
  return new NdArray(resolved, create(resolved.size));
}

function isNested<T>(value: NestedArray<T>): value is NestedArray<T>[] {
  return Array.isArray(value);
}

/**
 * Dimensions of a nested array, read along its first items
 */
function inferDims<T>(data: NestedArray<T>): number[] {
  const dims: number[] = [];
  let level: NestedArray<T> = data;
  while (isNested(level)) {
    dims.push(level.length);
    if (level.length === 0) {
      break;
    }
    level = level[0];
  }
  return dims;
}

function flatten<T>(data: NestedArray<T>, dims: Dims, axis: number, out: T[]): void {
  if (!isNested(data)) {
    if (axis !== dims.length) {
      throw new InvalidArgumentError(`Ragged nested array: expected a list at depth ${axis.toString()}`, {
        depth: axis,
      });
    }
    out.push(data);
    return;
  }
  if (axis === dims.length || data.length !== dims[axis]) {
    throw new InvalidArgumentError(
      `Ragged nested array: expected ${String(dims[axis])} items at depth ${axis.toString()}, got ${data.length.toString()}`,
      { depth: axis, length: data.length },
    );
  }
  data.forEach((item) => {
    flatten(item, dims, axis + 1, out);
  });
}

/**
 * Creation of arrays backed by freshly allocated or existing buffers
 *
 * @example
 * const matrix = NdArrays.ofInts([3, 4]);
 * const rows = NdArrays.fromNested([[1, 2], [3, 4]], DataBuffers.ofDoubles);
 * const view = NdArrays.wrap([2, 2], DataBuffers.wrap(new Float32Array(4)));
 */
export const NdArrays = Object.freeze({
  ofBytes: (shape: Shape | Dims): NdArray<number> => allocate(shape, DataBuffers.ofBytes),
  ofShorts: (shape: Shape | Dims): NdArray<number> => allocate(shape, DataBuffers.ofShorts),
  ofInts: (shape: Shape | Dims): NdArray<number> => allocate(shape, DataBuffers.ofInts),
  ofLongs: (shape: Shape | Dims): NdArray<bigint> => allocate(shape, DataBuffers.ofLongs),
  ofFloats: (shape: Shape | Dims): NdArray<number> => allocate(shape, DataBuffers.ofFloats),
  ofDoubles: (shape: Shape | Dims): NdArray<number> => allocate(shape, DataBuffers.ofDoubles),
  ofBooleans: (shape: Shape | Dims): NdArray<boolean> => allocate(shape, DataBuffers.ofBooleans),
  ofFloat16: (shape: Shape | Dims): NdArray<number> => allocate(shape, DataBuffers.ofFloat16),
  ofBFloat16: (shape: Shape | Dims): NdArray<number> => allocate(shape, DataBuffers.ofBFloat16),
  ofComplex64: (shape: Shape | Dims): NdArray<Complex> => allocate(shape, DataBuffers.ofComplex64),

  /**
   * Array of arbitrary elements, all set to `initial`
   */
  ofObjects: <T>(shape: Shape | Dims, initial: T): NdArray<T> =>
    allocate(shape, (size) => DataBuffers.ofObjects(size, initial)),

  /**
   * Dense row-major view of an existing buffer
   */
  wrap: <T>(shape: Shape | Dims, buffer: DataBuffer<T>): NdArray<T> => new NdArray(shape, buffer),

  scalarOf: <T>(value: T): NdArray<T> => new NdArray(Shape.scalar(), new ArrayDataBuffer([value])),

  vectorOf: <T>(...values: T[]): NdArray<T> =>
    new NdArray([values.length], new ArrayDataBuffer(values)),

  /**
   * Array shaped after a rectangular nested array, copied into a buffer from `create`
   *
   * @throws {InvalidArgumentError} If the nested array is ragged
   */
  fromNested: <T>(data: NestedArray<NoInfer<T>>, create: (size: number) => DataBuffer<T>): NdArray<T> => {
    const dims = inferDims(data);
    const values: T[] = [];
    flatten(data, dims, 0, values);
    const array = allocate(dims, create);
    array.write(values);
    return array;
  },
});
