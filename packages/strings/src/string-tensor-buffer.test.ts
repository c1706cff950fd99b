import { describe, it, expect } from 'vitest';
import {
  BufferOverrunError,
  InvalidArgumentError,
  NdArrays,
  ReadOnlyViolationError,
  ShapeMismatchError,
} from '@ndkit/core';
import { UTF_8 } from './charsets';
import { StringTensorBuffer } from './string-tensor-buffer';

function bufferOf(...values: string[]): StringTensorBuffer {
  const data = NdArrays.vectorOf(...values);
  const buffer = StringTensorBuffer.allocate(
    values.length,
    StringTensorBuffer.computeSize(data, UTF_8.encode),
  );
  return buffer.init(data, UTF_8.encode);
}

function text(bytes: Uint8Array): string {
  return UTF_8.decode(bytes);
}

describe('StringTensorBuffer', () => {
  it('should count offsets, length prefixes and bytes', () => {
    const data = NdArrays.vectorOf('a', 'bb', 'ccc');

    expect(StringTensorBuffer.computeSize(data, UTF_8.encode)).toBe(33);
    expect(StringTensorBuffer.computeSize(NdArrays.vectorOf('a'.repeat(200)), UTF_8.encode)).toBe(210);
  });

  it('should read back initialized records', () => {
    const buffer = bufferOf('a', 'bb', 'ccc');

    expect(buffer.isInitialized).toBe(true);
    expect(buffer.size).toBe(3);
    expect(buffer.byteLength).toBe(33);
    expect(buffer.toArray().map(text)).toEqual(['a', 'bb', 'ccc']);
  });

  it('should pack length-prefixed records after the offset table', () => {
    const bytes = bufferOf('a', 'bb', 'ccc').toUint8Array();

    expect(Array.from(bytes.subarray(24))).toEqual([1, 0x61, 2, 0x62, 0x62, 3, 0x63, 0x63, 0x63]);
  });

  it('should store long and empty records', () => {
    const buffer = bufferOf('', 'x'.repeat(200));

    expect(buffer.get(0)).toHaveLength(0);
    expect(text(buffer.get(1))).toBe('x'.repeat(200));
    expect(Array.from(buffer.toUint8Array().subarray(16, 19))).toEqual([0x00, 0xc8, 0x01]);
  });

  it('should be read-only', () => {
    const buffer = bufferOf('a');

    expect(buffer.isReadOnly()).toBe(true);
    expect(() => buffer.set(Uint8Array.of(0x62), 0)).toThrow(ReadOnlyViolationError);
  });

  it('should reject mutations as read-only whatever their position', () => {
    const buffer = bufferOf('a', 'bb', 'ccc');

    expect(() => buffer.set(Uint8Array.of(1), 3)).toThrow(ReadOnlyViolationError);
    expect(() => buffer.set(Uint8Array.of(1), -1)).toThrow(ReadOnlyViolationError);
    expect(() => buffer.write([Uint8Array.of(1)], 5)).toThrow(ReadOnlyViolationError);
    expect(() => buffer.fill(Uint8Array.of(1))).toThrow(ReadOnlyViolationError);
    expect(buffer.toArray().map(text)).toEqual(['a', 'bb', 'ccc']);
  });

  it('should be initialized only once', () => {
    const buffer = bufferOf('a');

    expect(() => buffer.init(NdArrays.vectorOf('b'), UTF_8.encode)).toThrow(ReadOnlyViolationError);
  });

  it('should start uninitialized', () => {
    expect(StringTensorBuffer.allocate(2, 32).isInitialized).toBe(false);
  });

  it('should reject byte sizes smaller than the offset table', () => {
    expect(() => StringTensorBuffer.allocate(2, 15)).toThrow(InvalidArgumentError);
  });

  it('should require one value per record', () => {
    const buffer = StringTensorBuffer.allocate(2, 100);

    expect(() => buffer.init(NdArrays.vectorOf('a', 'b', 'c'), UTF_8.encode)).toThrow(
      ShapeMismatchError,
    );
    expect(buffer.isInitialized).toBe(false);
  });

  it('should reject records that do not fit the payload', () => {
    const buffer = StringTensorBuffer.allocate(2, 19);

    expect(() => buffer.init(NdArrays.vectorOf('ab', 'c'), UTF_8.encode)).toThrow(
      BufferOverrunError,
    );
    expect(buffer.isInitialized).toBe(false);
  });

  it('should only initialize whole buffers', () => {
    const buffer = StringTensorBuffer.allocate(2, 32);

    expect(() => {
      const tail = buffer.offset(1);
      if (tail instanceof StringTensorBuffer) {
        tail.init(NdArrays.vectorOf('a'), UTF_8.encode);
      }
    }).toThrow(InvalidArgumentError);
  });

  it('should expose views over a range of records', () => {
    const buffer = bufferOf('a', 'bb', 'ccc', 'dddd');

    expect(buffer.offset(1).toArray().map(text)).toEqual(['bb', 'ccc', 'dddd']);
    expect(buffer.slice(1, 2).toArray().map(text)).toEqual(['bb', 'ccc']);
    expect(text(buffer.narrow(1).get(0))).toBe('a');
  });

  describe('copyTo', () => {
    it('should copy whole buffers in bulk', () => {
      const source = bufferOf('a', 'bb', 'ccc');
      const target = StringTensorBuffer.allocate(3, 33);
      source.copyTo(target, 3);

      expect(target.isInitialized).toBe(true);
      expect(target.toArray().map(text)).toEqual(['a', 'bb', 'ccc']);
      expect(Array.from(target.toUint8Array())).toEqual(Array.from(source.toUint8Array()));
    });

    it('should rebase the offsets of a trailing view', () => {
      const view = bufferOf('a', 'bb', 'ccc').offset(1);
      const target = StringTensorBuffer.allocate(2, 16 + 7);
      view.copyTo(target, 2);

      expect(target.toArray().map(text)).toEqual(['bb', 'ccc']);
      expect(Array.from(target.toUint8Array().subarray(0, 16))).toEqual([
        0, 0, 0, 0, 0, 0, 0, 0, 3, 0, 0, 0, 0, 0, 0, 0,
      ]);
    });

    it('should copy only the payload of a leading view', () => {
      const view = bufferOf('a', 'bb', 'ccc').narrow(2);
      const target = StringTensorBuffer.allocate(2, 16 + 5);
      view.copyTo(target, 2);

      expect(target.toArray().map(text)).toEqual(['a', 'bb']);
    });

    it('should reject initialized targets', () => {
      const target = bufferOf('x', 'y');

      expect(() => bufferOf('a', 'b').copyTo(target, 2)).toThrow(ReadOnlyViolationError);
    });

    it('should reject targets with a different record count', () => {
      const target = StringTensorBuffer.allocate(3, 64);

      expect(() => bufferOf('a', 'b').copyTo(target, 2)).toThrow(ShapeMismatchError);
    });

    it('should reject targets with too small a payload', () => {
      const target = StringTensorBuffer.allocate(2, 18);

      expect(() => bufferOf('ab', 'c').copyTo(target, 2)).toThrow(ShapeMismatchError);
    });
  });

  describe('fromBytes', () => {
    it('should restore a buffer from its bytes', () => {
      const restored = StringTensorBuffer.fromBytes(bufferOf('a', 'bb', 'ccc').toUint8Array(), 3);

      expect(restored.isInitialized).toBe(true);
      expect(restored.toArray().map(text)).toEqual(['a', 'bb', 'ccc']);
    });

    it('should copy the source bytes', () => {
      const bytes = bufferOf('a').toUint8Array();
      const restored = StringTensorBuffer.fromBytes(bytes, 1);
      bytes[9] = 0x7a;

      expect(text(restored.get(0))).toBe('a');
    });

    it('should reject offsets outside the payload', () => {
      const bytes = bufferOf('a').toUint8Array();
      bytes[0] = 9;

      expect(() => StringTensorBuffer.fromBytes(bytes, 1)).toThrow(InvalidArgumentError);
    });

    it('should reject records running past the payload', () => {
      const bytes = bufferOf('a').toUint8Array();
      bytes[8] = 5;

      expect(() => StringTensorBuffer.fromBytes(bytes, 1)).toThrow(InvalidArgumentError);
    });
  });
});
