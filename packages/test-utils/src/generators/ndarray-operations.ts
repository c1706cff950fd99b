/**
 * Test generators for NdArray operations
 *
 * These generators run the same scenarios against arrays of any element type:
 * - Element access by coordinates and sub-array views
 * - Iteration through element sequences
 * - Slicing with every kind of index
 * - Copies and bulk transfers to buffers and JS arrays
 */

import {
  all,
  at,
  BufferOverrunError,
  BufferUnderrunError,
  even,
  flip,
  from,
  IndexOutOfRangeError,
  InvalidArgumentError,
  InvalidOffsetError,
  NdArrays,
  odd,
  range,
  RankMismatchError,
  ReadOnlyViolationError,
  seq,
  Shape,
  ShapeMismatchError,
  simpleLayout,
  to,
  withLayout,
} from '@ndkit/core';
import type { Dims, NdArray } from '@ndkit/core';
import type { ElementFixture, TestFramework } from '../types';

/**
 * Generates tests for NdArray operations
 *
 * @param fixture - Element type to test
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateNdArrayTests<T>(fixture: ElementFixture<T>, testFramework: TestFramework) {
  const { describe, it, expect } = testFramework;
  const { valueOf } = fixture;

  const allocate = (dims: Dims): NdArray<T> =>
    NdArrays.wrap(dims, fixture.allocateBuffer(Shape.product(dims)));

  const sequential = (dims: Dims): NdArray<T> => {
    const array = allocate(dims);
    let next = 0;
    array.scalars().forEach((scalar) => {
      scalar.setValue(valueOf(next++));
    });
    return array;
  };

  describe(`NdArray Tests (${fixture.name})`, () => {
    describe('shape and sizes', () => {
      it('should create scalars', () => {
        const scalar = allocate([]);

        expect(scalar.shape.equals(Shape.scalar())).toBe(true);
        expect(scalar.rank).toBe(0);
        expect(scalar.size).toBe(1);
      });

      it('should create vectors and matrices', () => {
        const vector = allocate([10]);
        const matrix = allocate([3, 4]);

        expect(vector.rank).toBe(1);
        expect(vector.shape.dims).toEqual([10]);
        expect(matrix.rank).toBe(2);
        expect(matrix.size).toBe(12);
      });
    });

    describe('element access', () => {
      it('should set and get values by coordinates', () => {
        const matrix = allocate([5, 4]);
        expect(matrix.getValue(3, 3)).toEqual(valueOf(0));

        matrix.setValue(valueOf(10), 3, 3);
        expect(matrix.getValue(3, 3)).toEqual(valueOf(10));
      });

      it('should reject coordinates outside the shape', () => {
        const matrix = allocate([5, 4]);

        expect(() => matrix.setValue(valueOf(10), 3, 4)).toThrow(IndexOutOfRangeError);
        expect(() => matrix.setValue(valueOf(10), -1, 3)).toThrow(IndexOutOfRangeError);
        expect(() => matrix.get(5)).toThrow(IndexOutOfRangeError);
      });

      it('should require one coordinate per dimension to address a value', () => {
        const matrix = allocate([5, 4]);

        expect(() => matrix.getValue(3)).toThrow(RankMismatchError);
        expect(() => matrix.setValue(valueOf(10), 3)).toThrow(RankMismatchError);
        expect(() => matrix.getValue(1, 2, 3)).toThrow(RankMismatchError);
      });

      it('should return lower-rank views for partial coordinates', () => {
        const matrix = allocate([5, 4]);
        const row = matrix.get(3);

        expect(row.shape.dims).toEqual([4]);
        row.setValue(valueOf(7), 2);
        expect(matrix.getValue(3, 2)).toEqual(valueOf(7));

        expect(matrix.get(3, 2).rank).toBe(0);
        expect(matrix.get(3, 2).getValue()).toEqual(valueOf(7));
        expect(matrix.get()).toBe(matrix);
        expect(() => matrix.get(1, 2, 3)).toThrow(RankMismatchError);
      });

      it('should copy sub-arrays into place', () => {
        const matrix = allocate([3, 2])
          .set(NdArrays.vectorOf(valueOf(1), valueOf(2)), 0)
          .set(NdArrays.vectorOf(valueOf(3), valueOf(4)), 1)
          .setValue(valueOf(5), 2, 0)
          .setValue(valueOf(6), 2, 1);

        expect(matrix.getValue(0, 0)).toEqual(valueOf(1));
        expect(matrix.getValue(0, 1)).toEqual(valueOf(2));
        expect(matrix.getValue(1, 0)).toEqual(valueOf(3));
        expect(matrix.getValue(1, 1)).toEqual(valueOf(4));
        expect(matrix.getValue(2, 0)).toEqual(valueOf(5));
        expect(matrix.getValue(2, 1)).toEqual(valueOf(6));
      });
    });

    describe('iteration', () => {
      it('should visit every scalar with its coordinates', () => {
        const array = allocate([5, 4, 5]);
        array.scalars().forEachIndexed((coords, scalar) => {
          scalar.setValue(valueOf(coords[2]));
        });

        expect(array.getValue(0, 0, 0)).toEqual(valueOf(0));
        expect(array.getValue(0, 0, 1)).toEqual(valueOf(1));
        expect(array.getValue(0, 0, 4)).toEqual(valueOf(4));
        expect(array.getValue(0, 1, 2)).toEqual(valueOf(2));
      });

      it('should visit vectors when iterating two leading dimensions', () => {
        const array = allocate([5, 4, 5]);
        const row = NdArrays.vectorOf(...[5, 6, 7, 8, 9].map(valueOf));
        array.elements(2).forEach((vector) => {
          expect(vector.shape.dims).toEqual([5]);
          vector.set(row);
        });

        expect(array.getValue(0, 0, 0)).toEqual(valueOf(5));
        expect(array.getValue(0, 0, 1)).toEqual(valueOf(6));
        expect(array.getValue(0, 0, 4)).toEqual(valueOf(9));
        expect(array.getValue(4, 3, 2)).toEqual(valueOf(7));
      });

      it('should decompose level by level down to scalars', () => {
        const array = allocate([5, 4, 5]);
        let next = 0;

        array.elements(1).forEach((matrix) => {
          expect(matrix.shape.dims).toEqual([4, 5]);
          matrix.elements(1).forEach((vector) => {
            expect(vector.shape.dims).toEqual([5]);
            vector.scalars().forEach((scalar) => {
              expect(scalar.rank).toBe(0);
              scalar.setValue(valueOf(next++));
              expect(() => scalar.elements(0)).toThrow(InvalidArgumentError);
            });
          });
        });

        expect(array.getValue(0, 0, 0)).toEqual(valueOf(0));
        expect(array.getValue(0, 1, 0)).toEqual(valueOf(5));
        expect(array.getValue(0, 1, 4)).toEqual(valueOf(9));
        expect(array.getValue(1, 0, 0)).toEqual(valueOf(20));
        expect(array.getValue(1, 1, 0)).toEqual(valueOf(25));
        expect(array.getValue(4, 3, 4)).toEqual(valueOf(99));
      });

      it('should reject depths outside the rank', () => {
        const array = allocate([2, 3]);

        expect(() => array.elements(2)).toThrow(RankMismatchError);
        expect(() => array.elements(-1)).toThrow(InvalidArgumentError);
      });

      it('should iterate the first dimension with for...of', () => {
        const matrix = sequential([3, 2]);
        const rows: NdArray<T>[] = [];
        for (const row of matrix) {
          rows.push(row);
        }

        expect(rows).toHaveLength(3);
        expect(rows[2].getValue(1)).toEqual(valueOf(5));
      });
    });

    describe('slicing', () => {
      it('should alias the source through every kind of index', () => {
        const array = allocate([5, 4, 5]);
        const val100 = valueOf(100);
        const val101 = valueOf(101);
        const val102 = valueOf(102);
        const val200 = valueOf(200);
        array.setValue(val100, 1, 0, 0);
        array.setValue(val101, 1, 0, 1);

        // Vector (1, 0, *)
        const vector10X = array.get(1, 0);
        expect(vector10X.shape.dims).toEqual([5]);
        expect(vector10X.getValue(0)).toEqual(val100);
        expect(vector10X.getValue(1)).toEqual(val101);

        vector10X.setValue(val102, 2);
        expect(vector10X.getValue(2)).toEqual(val102);
        expect(array.getValue(1, 0, 2)).toEqual(val102);

        // Vector (*, 0, 0)
        const vectorX00 = array.slice(all(), at(0), at(0));
        expect(vectorX00.shape.dims).toEqual([5]);
        expect(vectorX00.getValue(1)).toEqual(val100);
        vectorX00.setValue(val200, 2);
        expect(vectorX00.getValue(2)).toEqual(val200);
        expect(array.getValue(2, 0, 0)).toEqual(val200);

        // Vector (1, 0, [2, 0])
        const vector10_20 = array.slice(at(1), at(0), seq(2, 0));
        expect(vector10_20.shape.dims).toEqual([2]);
        expect(vector10_20.getValue(0)).toEqual(val102);
        expect(vector10_20.getValue(1)).toEqual(val100);

        // Vector (1, 0, even)
        const vector10_even = array.slice(at(1), at(0), even());
        expect(vector10_even.shape.dims).toEqual([3]);
        expect(vector10_even.getValue(0)).toEqual(val100);
        expect(vector10_even.getValue(1)).toEqual(val102);

        // odd positions of the even positions
        const vector10_even_odd = vector10_even.slice(odd());
        expect(vector10_even_odd.shape.dims).toEqual([1]);
        expect(vector10_even_odd.getValue(0)).toEqual(val102);

        // Vector (1, 0, flip)
        const vector10_flip = array.slice(at(1), at(0), flip());
        expect(vector10_flip.shape.dims).toEqual([5]);
        expect(vector10_flip.getValue(4)).toEqual(val100);
        expect(vector10_flip.getValue(3)).toEqual(val101);

        const vector10_1toX = vector10X.slice(from(1));
        expect(vector10_1toX.shape.dims).toEqual([4]);
        expect(vector10_1toX.getValue(0)).toEqual(val101);
        expect(vector10_1toX.getValue(1)).toEqual(val102);

        const vector10_Xto2 = vector10X.slice(to(2));
        expect(vector10_Xto2.shape.dims).toEqual([2]);
        expect(vector10_Xto2.getValue(0)).toEqual(val100);
        expect(vector10_Xto2.getValue(1)).toEqual(val101);

        const vector10_1to3 = array.slice(at(1), at(0), range(1, 3));
        expect(vector10_1to3.shape.dims).toEqual([2]);
        expect(vector10_1to3.getValue(0)).toEqual(val101);
        expect(vector10_1to3.getValue(1)).toEqual(val102);

        // Scalar (1, 0, 0) from vector (1, 0, *)
        const scalar100 = vector10X.get(0);
        expect(scalar100.shape.dims).toEqual([]);
        expect(scalar100.getValue()).toEqual(val100);

        // Scalar (1, 0, z) with z read from a rank-0 array
        const z = NdArrays.scalarOf(2n);
        const scalar102 = array.slice(at(1), at(0), at(z));
        expect(scalar102.shape.dims).toEqual([]);
        expect(scalar102.getValue()).toEqual(val102);

        // Keep the first element of the second dimension only
        const matrixX0Z = array.slice(all(), at(0));
        expect(matrixX0Z.rank).toBe(2);
        expect(matrixX0Z.shape.dims).toEqual([5, 5]);
        expect(matrixX0Z.getValue(1, 0)).toEqual(val100);
        expect(matrixX0Z.getValue(1, 1)).toEqual(val101);
        expect(matrixX0Z.getValue(2, 0)).toEqual(val200);
      });

      it('should select strided ranges', () => {
        const vector = sequential([10]);
        const stepped = vector.slice(range(1, 8, 3));

        expect(stepped.shape.dims).toEqual([3]);
        expect(stepped.toArray()).toEqual([1, 4, 7].map(valueOf));
      });

      it('should compose slices of slices', () => {
        const matrix = sequential([4, 6]);
        const view = matrix.slice(flip(), seq(5, 1, 3)).slice(range(1, 3), flip());

        expect(view.shape.dims).toEqual([2, 3]);
        expect(view.toArray()).toEqual([
          [15, 13, 17].map(valueOf),
          [9, 7, 11].map(valueOf),
        ]);
      });

      it('should reject invalid index specifications', () => {
        const matrix = allocate([3, 4]);

        expect(() => matrix.slice(all(), all(), all())).toThrow(RankMismatchError);
        expect(() => matrix.slice(at(3))).toThrow(IndexOutOfRangeError);
        expect(() => matrix.slice(range(2, 5))).toThrow(IndexOutOfRangeError);
        expect(() => matrix.slice(seq(0, 4))).toThrow(IndexOutOfRangeError);
        expect(() => matrix.slice(range(0, 2, 0))).toThrow(InvalidArgumentError);
        expect(() => matrix.slice(at(NdArrays.vectorOf(1, 2)))).toThrow(InvalidArgumentError);
      });
    });

    describe('transfers', () => {
      it('should write from and read into buffers', () => {
        const buffer = fixture.allocateBuffer(15);
        for (let i = 0; i < buffer.size; i++) {
          buffer.set(valueOf(i), i);
        }
        const matrix = allocate([3, 5]);
        matrix.write(buffer);
        expect(matrix.getValue(0, 0)).toEqual(valueOf(0));
        expect(matrix.getValue(0, 4)).toEqual(valueOf(4));
        expect(matrix.getValue(1, 0)).toEqual(valueOf(5));
        expect(matrix.getValue(2, 0)).toEqual(valueOf(10));
        expect(matrix.getValue(2, 4)).toEqual(valueOf(14));

        matrix.setValue(valueOf(100), 1, 0);
        matrix.read(buffer);
        expect(buffer.get(0)).toEqual(valueOf(0));
        expect(buffer.get(4)).toEqual(valueOf(4));
        expect(buffer.get(5)).toEqual(valueOf(100));
        expect(buffer.get(10)).toEqual(valueOf(10));
        expect(buffer.get(14)).toEqual(valueOf(14));
      });

      it('should copy between arrays of the same shape', () => {
        const matrixA = sequential([3, 5]);
        const matrixB = allocate([3, 5]).setValue(valueOf(100), 1, 0);
        matrixA.copyTo(matrixB);

        expect(matrixB.getValue(0, 0)).toEqual(valueOf(0));
        expect(matrixB.getValue(0, 4)).toEqual(valueOf(4));
        expect(matrixB.getValue(1, 0)).toEqual(valueOf(5));
        expect(matrixB.getValue(2, 0)).toEqual(valueOf(10));
        expect(matrixB.getValue(2, 4)).toEqual(valueOf(14));

        matrixA.setValue(valueOf(50), 0, 0);
        expect(matrixB.getValue(0, 0)).toEqual(valueOf(0));
      });

      it('should reject copies between different shapes without writing', () => {
        const matrixA = sequential([3, 5]);
        const matrixC = allocate([3, 4]);

        expect(() => matrixA.copyTo(matrixC)).toThrow(ShapeMismatchError);
        expect(matrixC.getValue(0, 1)).toEqual(valueOf(0));
      });

      it('should copy through non-contiguous views', () => {
        const matrix = sequential([3, 4]);
        const target = allocate([3, 2]);
        matrix.slice(flip(), odd()).copyTo(target);

        expect(target.toArray()).toEqual([
          [9, 11].map(valueOf),
          [5, 7].map(valueOf),
          [1, 3].map(valueOf),
        ]);

        target.copyTo(matrix.slice(all(), even()));
        expect(matrix.get(0).toArray()).toEqual([9, 1, 11, 3].map(valueOf));
      });

      it('should not copy into read-only arrays', () => {
        const identity = simpleLayout<T, T>(
          (value) => value,
          (value) => value,
        );
        const frozen = NdArrays.wrap(
          [2, 2],
          withLayout(fixture.allocateBuffer(4), identity, { readOnly: true }),
        );

        expect(() => sequential([2, 2]).copyTo(frozen)).toThrow(ReadOnlyViolationError);
        expect(() => frozen.setValue(valueOf(1), 0, 0)).toThrow(ReadOnlyViolationError);
        expect(() => frozen.fill(valueOf(1))).toThrow(ReadOnlyViolationError);
      });

      it('should write from and read into JS arrays', () => {
        const values = Array.from({ length: 16 }, (_, i) => valueOf(i));

        const matrix = allocate([3, 4]);
        matrix.write(values);
        expect(matrix.getValue(0, 0)).toEqual(valueOf(0));
        expect(matrix.getValue(0, 3)).toEqual(valueOf(3));
        expect(matrix.getValue(1, 0)).toEqual(valueOf(4));
        expect(matrix.getValue(2, 3)).toEqual(valueOf(11));

        matrix.write(values, 4);
        expect(matrix.getValue(0, 0)).toEqual(valueOf(4));
        expect(matrix.getValue(0, 3)).toEqual(valueOf(7));
        expect(matrix.getValue(1, 0)).toEqual(valueOf(8));
        expect(matrix.getValue(2, 3)).toEqual(valueOf(15));

        matrix.setValue(valueOf(100), 1, 0);
        matrix.read(values, 2);
        expect(values[2]).toEqual(valueOf(4));
        expect(values[5]).toEqual(valueOf(7));
        expect(values[6]).toEqual(valueOf(100));
        expect(values[13]).toEqual(valueOf(15));
        expect(values[15]).toEqual(valueOf(15));

        matrix.read(values);
        expect(values[0]).toEqual(valueOf(4));
        expect(values[3]).toEqual(valueOf(7));
        expect(values[4]).toEqual(valueOf(100));
        expect(values[11]).toEqual(valueOf(15));
        expect(values[13]).toEqual(valueOf(15));
        expect(values[15]).toEqual(valueOf(15));
      });

      it('should reject transfers that run out of elements', () => {
        const values = Array.from({ length: 16 }, (_, i) => valueOf(i));
        const short = [0, 1, 2, 3].map(valueOf);
        const matrix = allocate([3, 4]);

        expect(() => matrix.write(short)).toThrow(BufferUnderrunError);
        expect(() => matrix.write(values, values.length)).toThrow(BufferUnderrunError);
        expect(() => matrix.write(values, -1)).toThrow(InvalidOffsetError);
        expect(() => matrix.write(values, values.length + 1)).toThrow(InvalidOffsetError);
        expect(() => matrix.read(short)).toThrow(BufferOverrunError);
        expect(() => matrix.read(values, values.length)).toThrow(BufferOverrunError);
        expect(() => matrix.read(values, -1)).toThrow(InvalidOffsetError);
        expect(() => matrix.read(values, values.length + 1)).toThrow(InvalidOffsetError);
      });

      it('should reject buffer transfers that run out of elements', () => {
        const short = fixture.allocateBuffer(4);
        const long = fixture.allocateBuffer(16);
        const matrix = sequential([3, 4]);

        expect(() => matrix.write(short)).toThrow(BufferUnderrunError);
        expect(() => matrix.write(long, 5)).toThrow(BufferUnderrunError);
        expect(() => matrix.write(long, -1)).toThrow(InvalidOffsetError);
        expect(() => matrix.write(long, 17)).toThrow(InvalidOffsetError);
        expect(() => matrix.read(short)).toThrow(BufferOverrunError);
        expect(() => matrix.read(long, 5)).toThrow(BufferOverrunError);
        expect(() => matrix.read(long, -1)).toThrow(InvalidOffsetError);
        expect(() => matrix.read(long, 17)).toThrow(InvalidOffsetError);

        expect(matrix.getValue(2, 3)).toEqual(valueOf(11));
        expect(long.get(15)).toEqual(valueOf(0));
      });
    });

    describe('utilities', () => {
      it('should convert to nested arrays', () => {
        expect(sequential([2, 3]).toArray()).toEqual([
          [0, 1, 2].map(valueOf),
          [3, 4, 5].map(valueOf),
        ]);
        expect(sequential([]).toArray()).toEqual(valueOf(0));
      });

      it('should fill strided views only', () => {
        const matrix = sequential([2, 4]);
        matrix.slice(all(), range(1, 4, 2)).fill(valueOf(50));

        expect(matrix.toArray()).toEqual([
          [0, 50, 2, 50].map(valueOf),
          [4, 50, 6, 50].map(valueOf),
        ]);
      });

      it('should compare shapes and elements', () => {
        const a = sequential([2, 2]);
        const b = sequential([2, 2]);

        expect(a.equals(b, fixture.equals)).toBe(true);
        expect(a.equals(sequential([4]), fixture.equals)).toBe(false);

        b.setValue(valueOf(4), 1, 1);
        expect(a.equals(b, fixture.equals)).toBe(false);
      });
    });
  });
}
