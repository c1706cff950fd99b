/**
 * Runtime tests for Shape and the shape helpers
 */

import { describe, it, expect } from 'vitest';
import { IndexOutOfRangeError, InvalidArgumentError, RankMismatchError } from '../errors';
import {
  assertValidShape,
  computeStrides,
  formatShape,
  isValidShape,
  MAX_RANK,
  Shape,
} from './shape';

describe('Shape', () => {
  describe('Construction and Basic Properties', () => {
    it('should create a shape from valid dimensions', () => {
      const shape = Shape.of(2, 3, 4);

      expect(shape.dims).toEqual([2, 3, 4]);
      expect(shape.rank).toBe(3);
      expect(shape.size).toBe(24);
      expect(shape.strides).toEqual([12, 4, 1]);
      expect(shape.isScalar).toBe(false);
    });

    it('should handle scalar shapes', () => {
      const scalar = Shape.scalar();

      expect(scalar.dims).toEqual([]);
      expect(scalar.rank).toBe(0);
      expect(scalar.size).toBe(1);
      expect(scalar.strides).toEqual([]);
      expect(scalar.isScalar).toBe(true);
    });

    it('should allow zero-sized dimensions', () => {
      const empty = Shape.of(3, 0, 2);

      expect(empty.size).toBe(0);
      expect(empty.strides).toEqual([0, 2, 1]);
    });

    it('should reject invalid dimensions', () => {
      expect(() => new Shape([2, -1])).toThrow(InvalidArgumentError);
      expect(() => new Shape([2.5])).toThrow(InvalidArgumentError);
      expect(() => new Shape(new Array<number>(MAX_RANK + 1).fill(1))).toThrow(InvalidArgumentError);
      expect(() => new Shape([2 ** 30, 2 ** 30])).toThrow(InvalidArgumentError);
    });
  });

  describe('Dimension access', () => {
    it('should support negative indexing', () => {
      const shape = Shape.of(2, 3, 4);

      expect(shape.dim(0)).toBe(2);
      expect(shape.dim(-1)).toBe(4);
      expect(shape.dim(-3)).toBe(2);
      expect(() => shape.dim(3)).toThrow(IndexOutOfRangeError);
      expect(() => shape.dim(-4)).toThrow(IndexOutOfRangeError);
    });

    it('should take sub-shapes and prepend dimensions', () => {
      const shape = Shape.of(5, 4, 3);

      expect(shape.subShape(1).dims).toEqual([4, 3]);
      expect(shape.subShape(0, 2).dims).toEqual([5, 4]);
      expect(shape.subShape(3).dims).toEqual([]);
      expect(shape.prepend(7).dims).toEqual([7, 5, 4, 3]);
      expect(() => shape.subShape(2, 1)).toThrow(IndexOutOfRangeError);
    });
  });

  describe('Comparison and formatting', () => {
    it('should compare dimensions', () => {
      expect(Shape.of(2, 3).equals(Shape.of(2, 3))).toBe(true);
      expect(Shape.of(2, 3).equals(Shape.of(3, 2))).toBe(false);
      expect(Shape.of().equals(Shape.scalar())).toBe(true);
      expect(Shape.equals([1, 2], [1, 2, 1])).toBe(false);
    });

    it('should format shapes', () => {
      expect(Shape.of(2, 3).toString()).toBe('Shape[2, 3]');
      expect(formatShape(Shape.scalar())).toBe('scalar []');
      expect(formatShape([4, 5])).toBe('[4, 5]');
    });
  });

  describe('Flat index conversion', () => {
    it('should ravel and unravel row-major coordinates', () => {
      const shape = Shape.of(2, 3, 4);

      expect(shape.ravel([1, 2, 3])).toBe(23);
      expect(shape.unravel(23)).toEqual([1, 2, 3]);
      expect(shape.unravel(0)).toEqual([0, 0, 0]);
      expect(shape.ravel(shape.unravel(13))).toBe(13);
    });

    it('should reject invalid coordinates and indices', () => {
      const shape = Shape.of(2, 3);

      expect(() => shape.ravel([1])).toThrow(RankMismatchError);
      expect(() => shape.ravel([2, 0])).toThrow(IndexOutOfRangeError);
      expect(() => shape.unravel(6)).toThrow(IndexOutOfRangeError);
    });
  });
});

describe('Shape helpers', () => {
  it('should compute row-major strides', () => {
    expect(computeStrides([2, 3, 4])).toEqual([12, 4, 1]);
    expect(computeStrides([7])).toEqual([1]);
    expect(computeStrides([])).toEqual([]);
  });

  it('should validate untyped shapes', () => {
    expect(isValidShape([2, 3])).toBe(true);
    expect(isValidShape([])).toBe(true);
    expect(isValidShape([2, -3])).toBe(false);
    expect(isValidShape('2x3')).toBe(false);
    expect(() => assertValidShape([1.5])).toThrow(InvalidArgumentError);
    expect(() => assertValidShape([1, 2])).not.toThrow();
  });
});
