import { describe, it, expect } from 'vitest';
import { RankMismatchError } from '../errors';
import { NdArrays } from '../ndarray/creation';
import { ElementSequence } from './element-sequence';

function counting(dims: number[]) {
  const array = NdArrays.ofInts(dims);
  array.write(Array.from({ length: array.size }, (_, i) => i));
  return array;
}

describe('ElementSequence', () => {
  it('should enumerate vectors of a rank 3 array in row-major order', () => {
    const array = counting([2, 3, 2]);
    const coords: number[][] = [];
    ElementSequence.create(array, 2).forEachIndexed((position, vector) => {
      coords.push(position);
      expect(vector.shape.dims).toEqual([2]);
    });

    expect(coords).toEqual([
      [0, 0],
      [0, 1],
      [0, 2],
      [1, 0],
      [1, 1],
      [1, 2],
    ]);
  });

  it('should enumerate every scalar at full depth', () => {
    const array = counting([2, 3, 2]);
    const values: number[] = [];
    const coords: number[][] = [];
    for (const [position, scalar] of ElementSequence.create(array, 3).indexed()) {
      coords.push(position);
      values.push(scalar.getValue());
    }

    expect(coords).toHaveLength(12);
    expect(coords[0]).toEqual([0, 0, 0]);
    expect(coords[11]).toEqual([1, 2, 1]);
    expect(values).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
  });

  it('should return views of the source array', () => {
    const array = counting([2, 3, 2]);
    const last = ElementSequence.create(array, 2).toArray()[5];

    expect(last.toArray()).toEqual([10, 11]);
    last.setValue(-1, 0);
    expect(array.getValue(1, 2, 0)).toBe(-1);
  });

  it('should yield the array itself at depth 0', () => {
    const array = counting([2, 2]);
    const entries = [...ElementSequence.create(array, 0).indexed()];

    expect(entries).toHaveLength(1);
    expect(entries[0][0]).toEqual([]);
    expect(entries[0][1]).toBe(array);
  });

  it('should count elements without visiting them', () => {
    const array = counting([2, 3, 2]);

    expect(ElementSequence.create(array, 0).count()).toBe(1);
    expect(ElementSequence.create(array, 2).count()).toBe(6);
    expect(ElementSequence.create(array, 3).count()).toBe(12);
  });

  it('should be empty when a leading dimension is empty', () => {
    const array = NdArrays.ofInts([2, 0, 3]);
    const sequence = ElementSequence.create(array, 2);

    expect(sequence.count()).toBe(0);
    expect(sequence.toArray()).toEqual([]);
    expect(ElementSequence.create(array, 1).count()).toBe(2);
  });

  it('should restart on every iteration', () => {
    const sequence = ElementSequence.create(counting([3, 2]), 1);
    const first = sequence.toArray().map((row) => row.toArray());
    const second = sequence.toArray().map((row) => row.toArray());

    expect(first).toEqual([
      [0, 1],
      [2, 3],
      [4, 5],
    ]);
    expect(second).toEqual(first);
  });

  it('should hand out a fresh coordinate array at every step', () => {
    const coords = [...ElementSequence.create(counting([2, 2]), 2).indexed()].map(
      ([position]) => position,
    );

    expect(coords).toEqual([
      [0, 0],
      [0, 1],
      [1, 0],
      [1, 1],
    ]);
    expect(coords[0]).not.toBe(coords[1]);
  });

  it('should visit elements with forEach', () => {
    let visited = 0;
    ElementSequence.create(counting([4, 1]), 1).forEach(() => {
      visited++;
    });

    expect(visited).toBe(4);
  });

  it('should reject depths beyond the rank', () => {
    const array = counting([2, 2]);

    expect(() => ElementSequence.create(array, 3)).toThrow(RankMismatchError);
    expect(() => ElementSequence.create(array, -1)).toThrow(RankMismatchError);
  });
});
