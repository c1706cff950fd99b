import { describe, it, expect } from 'vitest';
import {
  IndexOutOfRangeError,
  InvalidArgumentError,
  NdArrayError,
  RankMismatchError,
  ShapeMismatchError,
} from './errors';

describe('NdArrayError', () => {
  it('should carry code, category and context', () => {
    const error = new ShapeMismatchError('shapes differ', { source: [2, 3], destination: [3, 2] });

    expect(error).toBeInstanceOf(NdArrayError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ShapeMismatchError');
    expect(error.code).toBe('SHAPE_MISMATCH');
    expect(error.category).toBe('shape');
    expect(error.message).toBe('shapes differ');
  });

  it('should format context lines', () => {
    const error = new IndexOutOfRangeError('Index 7 out of bounds', { index: 7, dims: [2, 3] });

    expect(error.getFormattedMessage()).toBe(
      'IndexOutOfRangeError: Index 7 out of bounds\nContext:\n  index: 7\n  dims: [2, 3]\n',
    );
  });

  it('should format errors without context as a single line', () => {
    expect(new InvalidArgumentError('bad step').getFormattedMessage()).toBe(
      'InvalidArgumentError: bad step',
    );
  });

  it('should treat rank mismatches as invalid arguments', () => {
    const error = new RankMismatchError('depth 3 on rank 2');

    expect(error).toBeInstanceOf(InvalidArgumentError);
    expect(error.code).toBe('RANK_MISMATCH');
    expect(error.category).toBe('rank');
    expect(error.name).toBe('RankMismatchError');
  });
});
