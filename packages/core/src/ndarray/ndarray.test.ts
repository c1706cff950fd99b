import { describe, it, expect } from 'vitest';
import {
  bfloat16Fixture,
  booleanFixture,
  complex64Fixture,
  float16Fixture,
  float32Fixture,
  float64Fixture,
  generateNdArrayTests,
  int16Fixture,
  int32Fixture,
  int64Fixture,
  stringFixture,
  vitestFramework,
} from '@ndkit/test-utils';
import { DataBuffers } from '../buffer/data-buffers';
import { InvalidArgumentError, RankMismatchError, ShapeMismatchError } from '../errors';
import { all, at } from '../indexing/indices';
import { Shape } from '../shape/shape';
import { NdArrays } from './creation';
import { NdArray } from './ndarray';

generateNdArrayTests(int16Fixture, vitestFramework);
generateNdArrayTests(int32Fixture, vitestFramework);
generateNdArrayTests(int64Fixture, vitestFramework);
generateNdArrayTests(float32Fixture, vitestFramework);
generateNdArrayTests(float64Fixture, vitestFramework);
generateNdArrayTests(booleanFixture, vitestFramework);
generateNdArrayTests(float16Fixture, vitestFramework);
generateNdArrayTests(bfloat16Fixture, vitestFramework);
generateNdArrayTests(complex64Fixture, vitestFramework);
generateNdArrayTests(stringFixture, vitestFramework);

function counting(dims: number[]): NdArray<number> {
  const array = NdArrays.ofInts(dims);
  array.write(Array.from({ length: array.size }, (_, i) => i));
  return array;
}

describe('NdArray', () => {
  it('should reject buffers too small for a dense shape', () => {
    expect(() => new NdArray([2, 3], DataBuffers.ofInts(5))).toThrow(InvalidArgumentError);
  });

  it('should accept a Shape instance', () => {
    const array = new NdArray(Shape.of(2, 2), DataBuffers.ofInts(4));

    expect(array.shape.dims).toEqual([2, 2]);
  });

  it('should round values to the element type of the buffer', () => {
    const halves = NdArrays.ofFloat16([2]).setValue(0.1, 0);

    expect(halves.getValue(0)).toBe(0.0999755859375);
  });

  it('should not iterate a scalar with for...of', () => {
    const scalar = NdArrays.scalarOf(1);

    expect(() => [...scalar]).toThrow(RankMismatchError);
  });

  describe('withBuffer', () => {
    it('should map the same positions over another buffer', () => {
      const column = counting([2, 3]).slice(all(), at(1));
      const other = DataBuffers.wrap(new Float64Array([10, 11, 12, 13, 14, 15]));

      expect(column.withBuffer(other).toArray()).toEqual([11, 14]);
    });

    it('should reject buffers of a different size', () => {
      expect(() => counting([2, 3]).withBuffer(DataBuffers.ofInts(5))).toThrow(ShapeMismatchError);
    });
  });

  describe('format', () => {
    it('should print scalars and empty arrays', () => {
      expect(NdArrays.scalarOf(7).format()).toBe('ndarray(7)');
      expect(NdArrays.ofInts([0, 3]).format()).toBe('ndarray([])');
    });

    it('should print vectors on one line', () => {
      const doubles = NdArrays.fromNested([0.25, 1 / 3, 2], DataBuffers.ofDoubles);

      expect(doubles.format()).toBe('ndarray([0.25, 0.3333, 2])');
      expect(NdArrays.vectorOf('a', 'b').format()).toBe('ndarray(["a", "b"])');
      expect(NdArrays.ofLongs([2]).format()).toBe('ndarray([0, 0])');
      expect(NdArrays.ofBooleans([1]).format()).toBe('ndarray([false])');
    });

    it('should print one row per line', () => {
      expect(counting([2, 2]).format()).toBe('ndarray([\n [0, 1],\n [2, 3]\n])');
    });

    it('should separate blocks of rank 3 and above with a blank line', () => {
      expect(counting([2, 2, 2]).format()).toBe(
        'ndarray([\n [\n  [0, 1],\n  [2, 3]\n ],\n\n [\n  [4, 5],\n  [6, 7]\n ]\n])',
      );
    });

    it('should elide the middle of large arrays', () => {
      expect(counting([10]).format({ maxElements: 5, edgeItems: 2 })).toBe(
        'ndarray([0, 1, ..., 8, 9])',
      );
      expect(counting([4, 4]).format({ maxElements: 10, edgeItems: 1 })).toBe(
        'ndarray([\n [0, ..., 3],\n ...,\n [12, ..., 15]\n])',
      );
    });

    it('should summarize the shape in toString', () => {
      expect(NdArrays.ofInts([2, 3]).toString()).toBe('NdArray(shape=[2, 3], size=6)');
      expect(NdArrays.scalarOf(1).toString()).toBe('NdArray(shape=scalar [], size=1)');
    });
  });
});

describe('NdArrays', () => {
  it('should allocate zero-filled arrays', () => {
    expect(NdArrays.ofDoubles([2]).toArray()).toEqual([0, 0]);
    expect(NdArrays.ofLongs([1]).toArray()).toEqual([0n]);
    expect(NdArrays.ofComplex64([1]).toArray()).toEqual([{ re: 0, im: 0 }]);
  });

  it('should fill object arrays with the initial value', () => {
    expect(NdArrays.ofObjects([2, 1], 'x').toArray()).toEqual([['x'], ['x']]);
  });

  it('should create scalars and vectors from values', () => {
    const scalar = NdArrays.scalarOf('a');
    const vector = NdArrays.vectorOf(1, 2, 3);

    expect(scalar.rank).toBe(0);
    expect(scalar.toArray()).toBe('a');
    expect(vector.shape.dims).toEqual([3]);
    expect(vector.toArray()).toEqual([1, 2, 3]);
  });

  it('should wrap existing buffers', () => {
    const buffer = DataBuffers.wrap(new Int16Array([1, 2, 3, 4]));
    const matrix = NdArrays.wrap([2, 2], buffer);
    matrix.setValue(9, 1, 0);

    expect(buffer.get(2)).toBe(9);
  });

  describe('fromNested', () => {
    it('should infer the shape of rectangular nested arrays', () => {
      const matrix = NdArrays.fromNested(
        [
          [1, 2, 3],
          [4, 5, 6],
        ],
        DataBuffers.ofInts,
      );

      expect(matrix.shape.dims).toEqual([2, 3]);
      expect(matrix.getValue(1, 2)).toBe(6);
    });

    it('should create scalars from bare values', () => {
      const scalar = NdArrays.fromNested(true, DataBuffers.ofBooleans);

      expect(scalar.rank).toBe(0);
      expect(scalar.getValue()).toBe(true);
    });

    it('should keep empty dimensions', () => {
      expect(NdArrays.fromNested([], DataBuffers.ofInts).shape.dims).toEqual([0]);
    });

    it('should reject ragged nested arrays', () => {
      expect(() => NdArrays.fromNested([[1, 2], [3]], DataBuffers.ofInts)).toThrow(
        InvalidArgumentError,
      );
      expect(() => NdArrays.fromNested([[1, 2], 3], DataBuffers.ofInts)).toThrow(
        InvalidArgumentError,
      );
      expect(() => NdArrays.fromNested([1, [2, 3]], DataBuffers.ofInts)).toThrow(
        InvalidArgumentError,
      );
    });
  });
});
