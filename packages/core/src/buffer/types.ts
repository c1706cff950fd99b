/**
 * Flat data buffer contract
 *
 * A `DataBuffer<T>` is a bounded, random-access sequence of `size` elements.
 * `offset` and `narrow` return views sharing the same storage, so writes
 * through a view are visible through every other view of that storage.
 */

/**
 * Array-like target that can be written by index (JS arrays, typed arrays)
 */
export interface WritableArrayLike<T> {
  readonly length: number;
  [index: number]: T;
}

export interface BufferOptions {
  /** Reject every mutation with `ReadOnlyViolationError` */
  readonly readOnly?: boolean;
}

export interface DataBuffer<T> {
  /** Number of elements in this buffer or view */
  readonly size: number;

  isReadOnly(): boolean;

  /**
   * @throws {IndexOutOfRangeError} If `index` is not in `[0, size)`
   */
  get(index: number): T;

  /**
   * @throws {IndexOutOfRangeError} If `index` is not in `[0, size)`
   * @throws {ReadOnlyViolationError} If the buffer is read-only
   */
  set(value: T, index: number): this;

  /**
   * View starting at `index`, of `size - index` elements
   */
  offset(index: number): DataBuffer<T>;

  /**
   * View of the first `size` elements
   */
  narrow(size: number): DataBuffer<T>;

  /**
   * View of `size` elements starting at `index`
   */
  slice(index: number, size: number): DataBuffer<T>;

  /**
   * Copy the first `size` elements of this buffer into `dst`
   *
   * @throws {ShapeMismatchError} If `dst` holds fewer than `size` elements
   */
  copyTo(dst: DataBuffer<T>, size: number): this;

  /**
   * Copy `length` elements from the start of this buffer into `dst` at `offset`
   */
  read(dst: WritableArrayLike<T>, offset?: number, length?: number): this;

  /**
   * Copy `length` elements of `src`, starting at `offset`, to the start of this buffer
   */
  write(src: ArrayLike<T>, offset?: number, length?: number): this;

  fill(value: T): this;

  toArray(): T[];
}

/**
 * Distinguish a data buffer from a plain array-like source or destination
 */
export function isDataBuffer<T>(value: DataBuffer<T> | ArrayLike<T>): value is DataBuffer<T> {
  return 'narrow' in value && typeof value.narrow === 'function';
}
