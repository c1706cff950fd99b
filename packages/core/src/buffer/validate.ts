/**
 * Argument validation shared by buffer implementations
 */

import {
  BufferOverrunError,
  BufferUnderrunError,
  IndexOutOfRangeError,
  InvalidArgumentError,
  InvalidOffsetError,
  ReadOnlyViolationError,
  ShapeMismatchError,
} from '../errors';
import type { DataBuffer } from './types';

function isIndexIn(index: number, upper: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < upper;
}

export function checkIndex(buffer: DataBuffer<unknown>, index: number): void {
  if (!isIndexIn(index, buffer.size)) {
    throw new IndexOutOfRangeError(
      `Index ${String(index)} out of bounds for buffer of size ${buffer.size.toString()}`,
      { index, size: buffer.size },
    );
  }
}

export function checkWritable(buffer: DataBuffer<unknown>): void {
  if (buffer.isReadOnly()) {
    throw new ReadOnlyViolationError('Cannot modify a read-only buffer', { size: buffer.size });
  }
}

/**
 * `index` may equal `size`, producing an empty view
 */
export function checkOffset(buffer: DataBuffer<unknown>, index: number): void {
  if (!isIndexIn(index, buffer.size + 1)) {
    throw new IndexOutOfRangeError(
      `Offset ${String(index)} out of bounds for buffer of size ${buffer.size.toString()}`,
      { index, size: buffer.size },
    );
  }
}

export function checkNarrow(buffer: DataBuffer<unknown>, size: number): void {
  if (!isIndexIn(size, buffer.size + 1)) {
    throw new IndexOutOfRangeError(
      `Cannot narrow buffer of size ${buffer.size.toString()} to ${String(size)} elements`,
      { requested: size, size: buffer.size },
    );
  }
}

export function checkCopy<T>(src: DataBuffer<T>, dst: DataBuffer<T>, size: number): void {
  checkWritable(dst);
  if (!isIndexIn(size, src.size + 1)) {
    throw new IndexOutOfRangeError(
      `Cannot copy ${String(size)} elements from buffer of size ${src.size.toString()}`,
      { requested: size, size: src.size },
    );
  }
  if (dst.size < size) {
    throw new ShapeMismatchError(
      `Destination buffer of size ${dst.size.toString()} cannot hold ${size.toString()} elements`,
      { requested: size, destination: dst.size },
    );
  }
}

/**
 * Validate `offset`/`length` against an array of `arrayLength` elements
 */
export function checkArrayRange(arrayLength: number, offset: number, length: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset > arrayLength) {
    throw new InvalidOffsetError(
      `Offset ${String(offset)} out of bounds for array of length ${arrayLength.toString()}`,
      { offset, length: arrayLength },
    );
  }
  if (!Number.isInteger(length) || length < 0 || length > arrayLength - offset) {
    throw new IndexOutOfRangeError(
      `Cannot transfer ${String(length)} elements from offset ${offset.toString()} of array of length ${arrayLength.toString()}`,
      { offset, requested: length, length: arrayLength },
    );
  }
}

/**
 * Reading `length` elements out of `buffer`
 */
export function checkRead(buffer: DataBuffer<unknown>, length: number): void {
  if (length > buffer.size) {
    throw new BufferUnderrunError(
      `Cannot read ${length.toString()} elements from buffer of size ${buffer.size.toString()}`,
      { requested: length, size: buffer.size },
    );
  }
}

/**
 * Writing `length` elements into `buffer`, already known to be writable
 */
export function checkWrite(buffer: DataBuffer<unknown>, length: number): void {
  if (length > buffer.size) {
    throw new BufferOverrunError(
      `Cannot write ${length.toString()} elements to buffer of size ${buffer.size.toString()}`,
      { requested: length, size: buffer.size },
    );
  }
}

/**
 * Window `[start, start + size)` of a backing array of `arrayLength` elements
 */
export function checkWindow(arrayLength: number, start: number, size: number): void {
  if (!Number.isInteger(start) || start < 0 || start > arrayLength) {
    throw new IndexOutOfRangeError(
      `Window start ${String(start)} out of bounds for array of length ${arrayLength.toString()}`,
      { start, length: arrayLength },
    );
  }
  if (!Number.isInteger(size) || size < 0 || size > arrayLength - start) {
    throw new IndexOutOfRangeError(
      `Window of ${String(size)} elements at ${start.toString()} exceeds array of length ${arrayLength.toString()}`,
      { start, size, length: arrayLength },
    );
  }
}

export function checkAllocationSize(size: number): void {
  if (!Number.isInteger(size) || size < 0) {
    throw new InvalidArgumentError(`Buffer size must be a non-negative integer, got ${String(size)}`, {
      size,
    });
  }
}
