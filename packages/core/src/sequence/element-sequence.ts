/**
 * Lazy enumeration of the sub-arrays of an array at a given depth
 */

import { RankMismatchError } from '../errors';
import type { NdArray } from '../ndarray/ndarray';

/**
 * Restartable sequence over the sub-arrays found by fixing the `depth`
 * leading coordinates of an array, in row-major order. Each iteration starts
 * from the first element; nothing is cached on the array.
 *
 * @example
 * for (const [coords, row] of matrix.elements(1).indexed()) {
 *   console.log(coords, row.toArray());
 * }
 */
export class ElementSequence<T> implements Iterable<NdArray<T>> {
  private constructor(
    private readonly array: NdArray<T>,
    readonly depth: number,
  ) {}

  /**
   * @throws {RankMismatchError} If `depth` is not in `[0, array.rank]`
   */
  static create<T>(array: NdArray<T>, depth: number): ElementSequence<T> {
    if (!Number.isInteger(depth) || depth < 0 || depth > array.rank) {
      throw new RankMismatchError(
        `Sequence depth ${String(depth)} out of range for rank ${array.rank.toString()} array`,
        { depth, rank: array.rank },
      );
    }
    return new ElementSequence(array, depth);
  }

  *[Symbol.iterator](): Iterator<NdArray<T>> {
    for (const [, element] of this.indexed()) {
      yield element;
    }
  }

  /**
   * Pairs of coordinates and sub-array; every step gets its own coordinate array
   */
  *indexed(): Generator<[number[], NdArray<T>], void, undefined> {
    const dims = this.array.shape.dims.slice(0, this.depth);
    if (dims.some((dim) => dim === 0)) {
      return;
    }

    const coords = new Array<number>(this.depth).fill(0);
    for (;;) {
      yield [[...coords], this.array.get(...coords)];

      let axis = this.depth - 1;
      for (; axis >= 0; axis--) {
        coords[axis] += 1;
        if (coords[axis] < dims[axis]) {
          break;
        }
        coords[axis] = 0;
      }
      if (axis < 0) {
        return;
      }
    }
  }

  forEach(callback: (element: NdArray<T>) => void): void {
    for (const element of this) {
      callback(element);
    }
  }

  forEachIndexed(callback: (coords: number[], element: NdArray<T>) => void): void {
    for (const [coords, element] of this.indexed()) {
      callback(coords, element);
    }
  }

  /**
   * Number of sub-arrays, without visiting them
   */
  count(): number {
    return this.array.shape.dims.slice(0, this.depth).reduce((total, dim) => total * dim, 1);
  }

  toArray(): NdArray<T>[] {
    return [...this];
  }
}
