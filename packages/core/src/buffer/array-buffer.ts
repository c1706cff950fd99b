/**
 * Data buffer over a plain JavaScript array
 */

import { AbstractDataBuffer } from './abstract-buffer';
import type { BufferOptions, DataBuffer } from './types';
import { checkAllocationSize, checkWindow } from './validate';

/**
 * Buffer of arbitrary elements (objects, strings, byte arrays...) backed by a
 * window `[start, start + size)` of a JS array
 *
 * @throws {IndexOutOfRangeError} If the window does not fit in `array`
 */
export class ArrayDataBuffer<T> extends AbstractDataBuffer<T> {
  readonly size: number;
  private readonly array: T[];
  private readonly start: number;
  private readonly readOnly: boolean;

  constructor(array: T[], options: BufferOptions = {}, start = 0, size: number = array.length - start) {
    super();
    checkWindow(array.length, start, size);
    this.array = array;
    this.start = start;
    this.size = size;
    this.readOnly = options.readOnly ?? false;
  }

  /**
   * Buffer of `size` elements, all set to `initial`
   */
  static allocate<T>(size: number, initial: T): ArrayDataBuffer<T> {
    checkAllocationSize(size);
    return new ArrayDataBuffer(new Array<T>(size).fill(initial));
  }

  isReadOnly(): boolean {
    return this.readOnly;
  }

  protected getUnchecked(index: number): T {
    return this.array[this.start + index];
  }

  protected setUnchecked(value: T, index: number): void {
    this.array[this.start + index] = value;
  }

  protected view(index: number, size: number): DataBuffer<T> {
    return new ArrayDataBuffer(this.array, { readOnly: this.readOnly }, this.start + index, size);
  }

  protected override copyBulk(dst: DataBuffer<T>, size: number): boolean {
    if (!(dst instanceof ArrayDataBuffer)) {
      return false;
    }
    const values = this.array.slice(this.start, this.start + size);
    values.forEach((value, i) => {
      dst.array[dst.start + i] = value;
    });
    return true;
  }
}
