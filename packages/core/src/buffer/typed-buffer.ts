/**
 * Data buffer over a JavaScript typed array
 */

import { AbstractDataBuffer } from './abstract-buffer';
import type { BufferOptions, DataBuffer } from './types';
import { checkWindow, checkWritable } from './validate';

/**
 * Structural view of the typed array methods used by `TypedArrayDataBuffer`,
 * satisfied by every `Int8Array` ... `BigUint64Array`
 */
export interface TypedArrayLike<T> {
  readonly length: number;
  [index: number]: T;
  subarray(begin?: number, end?: number): TypedArrayLike<T>;
  set(array: ArrayLike<T>, offset?: number): void;
  fill(value: T, start?: number, end?: number): unknown;
}

export type NumericTypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

export type BigIntTypedArray = BigInt64Array | BigUint64Array;

export type AnyTypedArray = NumericTypedArray | BigIntTypedArray;

/**
 * Buffer of numbers or bigints backed by a window `[start, start + size)` of a
 * typed array. Element conversions (wrap-around, rounding) are the typed
 * array's own.
 *
 * @throws {IndexOutOfRangeError} If the window does not fit in `array`
 */
export class TypedArrayDataBuffer<T extends number | bigint> extends AbstractDataBuffer<T> {
  readonly size: number;
  private readonly array: TypedArrayLike<T>;
  private readonly start: number;
  private readonly readOnly: boolean;

  constructor(
    array: TypedArrayLike<T>,
    options: BufferOptions = {},
    start = 0,
    size: number = array.length - start,
  ) {
    super();
    checkWindow(array.length, start, size);
    this.array = array;
    this.start = start;
    this.size = size;
    this.readOnly = options.readOnly ?? false;
  }

  isReadOnly(): boolean {
    return this.readOnly;
  }

  /**
   * Typed array window of this buffer, sharing its storage
   */
  subarray(): TypedArrayLike<T> {
    return this.array.subarray(this.start, this.start + this.size);
  }

  override fill(value: T): this {
    checkWritable(this);
    this.array.fill(value, this.start, this.start + this.size);
    return this;
  }

  protected getUnchecked(index: number): T {
    return this.array[this.start + index];
  }

  protected setUnchecked(value: T, index: number): void {
    this.array[this.start + index] = value;
  }

  protected view(index: number, size: number): DataBuffer<T> {
    return new TypedArrayDataBuffer(this.array, { readOnly: this.readOnly }, this.start + index, size);
  }

  protected override copyBulk(dst: DataBuffer<T>, size: number): boolean {
    if (!(dst instanceof TypedArrayDataBuffer) || dst.array.constructor !== this.array.constructor) {
      return false;
    }
    // TypedArray#set copies the source first when both share an ArrayBuffer
    dst.array.set(this.array.subarray(this.start, this.start + size), dst.start);
    return true;
  }
}
