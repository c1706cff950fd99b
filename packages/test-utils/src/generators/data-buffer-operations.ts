/**
 * Test generators for the DataBuffer contract
 *
 * These generators cover, for one element type:
 * - Bounds-checked element access
 * - Views (offset, narrow, slice) sharing storage with their parent
 * - Buffer-to-buffer copies, including overlapping ones
 * - Bulk transfers to and from JS arrays
 * - Read-only enforcement
 */

import {
  BufferOverrunError,
  BufferUnderrunError,
  IndexOutOfRangeError,
  InvalidOffsetError,
  ReadOnlyViolationError,
  ShapeMismatchError,
  simpleLayout,
  withLayout,
} from '@ndkit/core';
import type { DataBuffer } from '@ndkit/core';
import type { ElementFixture, TestFramework } from '../types';

/**
 * Generates tests for the DataBuffer contract
 *
 * @param fixture - Element type to test
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateDataBufferTests<T>(fixture: ElementFixture<T>, testFramework: TestFramework) {
  const { describe, it, expect } = testFramework;
  const { valueOf } = fixture;

  const filled = (size: number): DataBuffer<T> => {
    const buffer = fixture.allocateBuffer(size);
    for (let i = 0; i < size; i++) {
      buffer.set(valueOf(i), i);
    }
    return buffer;
  };

  const readOnly = (buffer: DataBuffer<T>): DataBuffer<T> =>
    withLayout(
      buffer,
      simpleLayout<T, T>(
        (value) => value,
        (value) => value,
      ),
      { readOnly: true },
    );

  describe(`DataBuffer Tests (${fixture.name})`, () => {
    describe('element access', () => {
      it('should allocate buffers of the requested size', () => {
        const buffer = fixture.allocateBuffer(10);

        expect(buffer.size).toBe(10);
        expect(buffer.isReadOnly()).toBe(false);
        expect(buffer.get(9)).toEqual(valueOf(0));
      });

      it('should read back written values', () => {
        const buffer = fixture.allocateBuffer(10);
        buffer.set(valueOf(42), 0).set(valueOf(43), 9);

        expect(buffer.get(0)).toEqual(valueOf(42));
        expect(buffer.get(9)).toEqual(valueOf(43));
      });

      it('should reject indices outside the buffer', () => {
        const buffer = fixture.allocateBuffer(10);

        expect(() => buffer.get(10)).toThrow(IndexOutOfRangeError);
        expect(() => buffer.get(-1)).toThrow(IndexOutOfRangeError);
        expect(() => buffer.set(valueOf(1), 10)).toThrow(IndexOutOfRangeError);
        expect(() => buffer.set(valueOf(1), -1)).toThrow(IndexOutOfRangeError);
      });
    });

    describe('views', () => {
      it('should share storage between a buffer and its offset view', () => {
        const buffer = filled(10);
        const view = buffer.offset(3);

        expect(view.size).toBe(7);
        expect(view.get(0)).toEqual(valueOf(3));

        view.set(valueOf(100), 1);
        expect(buffer.get(4)).toEqual(valueOf(100));
      });

      it('should compose offset and narrow', () => {
        const buffer = filled(10);
        const view = buffer.offset(2).narrow(5);

        expect(view.size).toBe(5);
        expect(view.toArray()).toEqual([2, 3, 4, 5, 6].map(valueOf));
        expect(() => view.get(5)).toThrow(IndexOutOfRangeError);

        const nested = view.offset(1).narrow(2);
        expect(nested.toArray()).toEqual([valueOf(3), valueOf(4)]);
      });

      it('should slice windows of the buffer', () => {
        const buffer = filled(10);
        const window = buffer.slice(4, 3);

        expect(window.toArray()).toEqual([4, 5, 6].map(valueOf));
        expect(() => buffer.slice(8, 3)).toThrow(IndexOutOfRangeError);
      });

      it('should allow empty views at the end of the buffer', () => {
        const buffer = filled(4);

        expect(buffer.offset(4).size).toBe(0);
        expect(buffer.narrow(0).size).toBe(0);
        expect(() => buffer.offset(5)).toThrow(IndexOutOfRangeError);
        expect(() => buffer.narrow(5)).toThrow(IndexOutOfRangeError);
      });
    });

    describe('copies', () => {
      it('should copy the requested number of elements', () => {
        const source = filled(6);
        const target = fixture.allocateBuffer(8);
        source.copyTo(target, 4);

        expect(target.toArray()).toEqual([0, 1, 2, 3, 0, 0, 0, 0].map(valueOf));
      });

      it('should keep copies independent from the source', () => {
        const source = filled(4);
        const target = fixture.allocateBuffer(4);
        source.copyTo(target, 4);
        source.set(valueOf(11), 0);

        expect(target.get(0)).toEqual(valueOf(0));
      });

      it('should copy overlapping views like memmove', () => {
        const forward = filled(10);
        forward.copyTo(forward.offset(2), 8);
        expect(forward.toArray()).toEqual([0, 1, 0, 1, 2, 3, 4, 5, 6, 7].map(valueOf));

        const backward = filled(10);
        backward.offset(2).copyTo(backward, 8);
        expect(backward.toArray()).toEqual([2, 3, 4, 5, 6, 7, 8, 9, 8, 9].map(valueOf));
      });

      it('should reject copies that do not fit', () => {
        const source = filled(6);

        expect(() => source.copyTo(fixture.allocateBuffer(3), 4)).toThrow(ShapeMismatchError);
        expect(() => source.copyTo(fixture.allocateBuffer(10), 7)).toThrow(IndexOutOfRangeError);
      });

      it('should not copy into read-only buffers', () => {
        const target = fixture.allocateBuffer(4);

        expect(() => filled(4).copyTo(readOnly(target), 4)).toThrow(ReadOnlyViolationError);
        expect(target.get(0)).toEqual(valueOf(0));
        expect(target.get(1)).toEqual(valueOf(0));
      });
    });

    describe('array transfers', () => {
      it('should write from and read into JS arrays', () => {
        const values = [5, 6, 7, 8, 9].map(valueOf);
        const buffer = fixture.allocateBuffer(5).write(values);

        expect(buffer.toArray()).toEqual(values);

        const out = [0, 0, 0, 0, 0, 0].map(valueOf);
        buffer.read(out, 1, 3);
        expect(out).toEqual([0, 5, 6, 7, 0, 0].map(valueOf));
      });

      it('should write a window of the source array', () => {
        const values = [1, 2, 3, 4, 5].map(valueOf);
        const buffer = fixture.allocateBuffer(4).write(values, 2, 2);

        expect(buffer.toArray()).toEqual([3, 4, 0, 0].map(valueOf));
      });

      it('should reject transfers past the end of the buffer', () => {
        const buffer = fixture.allocateBuffer(3);
        const values = [1, 2, 3, 4].map(valueOf);

        expect(() => buffer.write(values)).toThrow(BufferOverrunError);
        expect(() => buffer.read(values)).toThrow(BufferUnderrunError);
      });

      it('should reject offsets outside the array', () => {
        const buffer = fixture.allocateBuffer(3);
        const values = [1, 2].map(valueOf);

        expect(() => buffer.write(values, 3)).toThrow(InvalidOffsetError);
        expect(() => buffer.read(values, -1)).toThrow(InvalidOffsetError);
        expect(() => buffer.write(values, 1, 2)).toThrow(IndexOutOfRangeError);
      });
    });

    describe('read-only buffers', () => {
      it('should reject every mutation', () => {
        const buffer = readOnly(filled(3));

        expect(buffer.isReadOnly()).toBe(true);
        expect(() => buffer.set(valueOf(1), 0)).toThrow(ReadOnlyViolationError);
        expect(() => buffer.fill(valueOf(1))).toThrow(ReadOnlyViolationError);
        expect(() => buffer.write([valueOf(1)])).toThrow(ReadOnlyViolationError);
        expect(buffer.toArray()).toEqual([0, 1, 2].map(valueOf));
      });

      it('should report read-only before checking indices and offsets', () => {
        const buffer = readOnly(filled(3));

        expect(() => buffer.set(valueOf(1), 3)).toThrow(ReadOnlyViolationError);
        expect(() => buffer.write([valueOf(1)], 5)).toThrow(ReadOnlyViolationError);
        expect(() => filled(2).copyTo(readOnly(filled(1)), 2)).toThrow(ReadOnlyViolationError);
      });

      it('should keep views of read-only buffers read-only', () => {
        const buffer = readOnly(filled(3));

        expect(buffer.offset(1).isReadOnly()).toBe(true);
        expect(() => buffer.narrow(2).set(valueOf(1), 0)).toThrow(ReadOnlyViolationError);
      });
    });

    it('should fill every element', () => {
      const buffer = filled(4);
      buffer.offset(1).narrow(2).fill(valueOf(9));

      expect(buffer.toArray()).toEqual([0, 9, 9, 3].map(valueOf));
    });
  });
}
