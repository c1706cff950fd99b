/**
 * Factories for data buffers of every supported element type
 */

import { DataBufferAdapter } from '../layout/adapter';
import { BFLOAT16_LAYOUT, BOOL_LAYOUT, COMPLEX64_LAYOUT, FLOAT16_LAYOUT } from '../layout/layouts';
import type { Complex } from '../layout/types';
import { ArrayDataBuffer } from './array-buffer';
import { TypedArrayDataBuffer } from './typed-buffer';
import type { BigIntTypedArray, NumericTypedArray } from './typed-buffer';
import type { BufferOptions, DataBuffer } from './types';
import { checkAllocationSize } from './validate';

function wrap(array: NumericTypedArray, options?: BufferOptions): DataBuffer<number>;
function wrap(array: BigIntTypedArray, options?: BufferOptions): DataBuffer<bigint>;
function wrap<T>(array: T[], options?: BufferOptions): DataBuffer<T>;
function wrap<T>(
  array: T[] | NumericTypedArray | BigIntTypedArray,
  options?: BufferOptions,
): DataBuffer<T> | DataBuffer<number> | DataBuffer<bigint> {
  if (Array.isArray(array)) {
    return new ArrayDataBuffer(array, options);
  }
  if (array instanceof BigInt64Array || array instanceof BigUint64Array) {
    return new TypedArrayDataBuffer<bigint>(array, options);
  }
  return new TypedArrayDataBuffer<number>(array, options);
}

/**
 * Factory of `size`-element buffers that rejects invalid sizes before allocating
 */
function sized<T>(create: (size: number) => DataBuffer<T>): (size: number) => DataBuffer<T> {
  return (size) => {
    checkAllocationSize(size);
    return create(size);
  };
}

/**
 * Buffer allocation and wrapping
 *
 * Allocated buffers are zero-filled (false for booleans); `wrap` shares the
 * given array without copying. Negative or fractional sizes throw
 * `InvalidArgumentError`.
 *
 * @example
 * const ints = DataBuffers.ofInts(6);
 * const view = DataBuffers.wrap(new Float32Array([1, 2, 3]), { readOnly: true });
 */
export const DataBuffers = Object.freeze({
  ofBytes: sized<number>((size) => new TypedArrayDataBuffer<number>(new Int8Array(size))),
  ofUnsignedBytes: sized<number>((size) => new TypedArrayDataBuffer<number>(new Uint8Array(size))),
  ofShorts: sized<number>((size) => new TypedArrayDataBuffer<number>(new Int16Array(size))),
  ofInts: sized<number>((size) => new TypedArrayDataBuffer<number>(new Int32Array(size))),
  ofLongs: sized<bigint>((size) => new TypedArrayDataBuffer<bigint>(new BigInt64Array(size))),
  ofFloats: sized<number>((size) => new TypedArrayDataBuffer<number>(new Float32Array(size))),
  ofDoubles: sized<number>((size) => new TypedArrayDataBuffer<number>(new Float64Array(size))),
  ofBooleans: sized<boolean>(
    (size) => new DataBufferAdapter(new TypedArrayDataBuffer<number>(new Uint8Array(size)), BOOL_LAYOUT),
  ),
  ofFloat16: sized<number>(
    (size) => new DataBufferAdapter(new TypedArrayDataBuffer<number>(new Uint16Array(size)), FLOAT16_LAYOUT),
  ),
  ofBFloat16: sized<number>(
    (size) => new DataBufferAdapter(new TypedArrayDataBuffer<number>(new Uint16Array(size)), BFLOAT16_LAYOUT),
  ),
  ofComplex64: sized<Complex>(
    (size) =>
      new DataBufferAdapter(new TypedArrayDataBuffer<number>(new Float32Array(size * 2)), COMPLEX64_LAYOUT),
  ),
  ofObjects: <T>(size: number, initial: T): DataBuffer<T> => ArrayDataBuffer.allocate(size, initial),
  wrap,
});
