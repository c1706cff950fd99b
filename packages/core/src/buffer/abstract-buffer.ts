/**
 * Shared behavior of data buffers
 *
 * Subclasses provide unchecked element access and view construction; bounds,
 * read-only and transfer checks all happen here, before any mutation.
 */

import { IndexOutOfRangeError } from '../errors';
import type { DataBuffer, WritableArrayLike } from './types';
import {
  checkArrayRange,
  checkCopy,
  checkIndex,
  checkNarrow,
  checkOffset,
  checkRead,
  checkWritable,
  checkWrite,
} from './validate';

export abstract class AbstractDataBuffer<T> implements DataBuffer<T> {
  abstract readonly size: number;

  abstract isReadOnly(): boolean;

  protected abstract getUnchecked(index: number): T;

  protected abstract setUnchecked(value: T, index: number): void;

  /**
   * View of `size` elements starting at `index`, both already validated
   */
  protected abstract view(index: number, size: number): DataBuffer<T>;

  get(index: number): T {
    checkIndex(this, index);
    return this.getUnchecked(index);
  }

  set(value: T, index: number): this {
    checkWritable(this);
    checkIndex(this, index);
    this.setUnchecked(value, index);
    return this;
  }

  offset(index: number): DataBuffer<T> {
    checkOffset(this, index);
    return this.view(index, this.size - index);
  }

  narrow(size: number): DataBuffer<T> {
    checkNarrow(this, size);
    return this.view(0, size);
  }

  slice(index: number, size: number): DataBuffer<T> {
    checkOffset(this, index);
    if (!Number.isInteger(size) || size < 0 || size > this.size - index) {
      throw new IndexOutOfRangeError(
        `Cannot slice ${String(size)} elements at ${index.toString()} from buffer of size ${this.size.toString()}`,
        { index, requested: size, size: this.size },
      );
    }
    return this.view(index, size);
  }

  copyTo(dst: DataBuffer<T>, size: number): this {
    checkCopy(this, dst, size);
    if (!this.copyBulk(dst, size)) {
      // staged through a temporary array so overlapping views copy like memmove
      const values = this.valuesUnchecked(size);
      values.forEach((value, i) => {
        dst.set(value, i);
      });
    }
    return this;
  }

  read(dst: WritableArrayLike<T>, offset = 0, length: number = dst.length - offset): this {
    checkArrayRange(dst.length, offset, length);
    checkRead(this, length);
    for (let i = 0; i < length; i++) {
      dst[offset + i] = this.getUnchecked(i);
    }
    return this;
  }

  write(src: ArrayLike<T>, offset = 0, length: number = src.length - offset): this {
    checkWritable(this);
    checkArrayRange(src.length, offset, length);
    checkWrite(this, length);
    for (let i = 0; i < length; i++) {
      this.setUnchecked(src[offset + i], i);
    }
    return this;
  }

  fill(value: T): this {
    checkWritable(this);
    for (let i = 0; i < this.size; i++) {
      this.setUnchecked(value, i);
    }
    return this;
  }

  toArray(): T[] {
    return this.valuesUnchecked(this.size);
  }

  /**
   * Copy without per-element dispatch when `dst` shares this buffer's storage
   * kind; returns false to fall back to the element-wise copy
   */
  protected copyBulk(_dst: DataBuffer<T>, _size: number): boolean {
    return false;
  }

  private valuesUnchecked(size: number): T[] {
    const values = new Array<T>(size);
    for (let i = 0; i < size; i++) {
      values[i] = this.getUnchecked(i);
    }
    return values;
  }
}
