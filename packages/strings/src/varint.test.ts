import { describe, it, expect } from 'vitest';
import { BufferUnderrunError, InvalidArgumentError } from '@ndkit/core';
import { readVarint, varintLength, writeVarint } from './varint';

function encode(value: number): number[] {
  const bytes = new Uint8Array(5);
  const length = writeVarint(bytes, 0, value);
  return Array.from(bytes.subarray(0, length));
}

describe('varint', () => {
  it('should encode seven bits per byte, low groups first', () => {
    expect(encode(0)).toEqual([0x00]);
    expect(encode(127)).toEqual([0x7f]);
    expect(encode(128)).toEqual([0x80, 0x01]);
    expect(encode(300)).toEqual([0xac, 0x02]);
    expect(encode(0xffffffff)).toEqual([0xff, 0xff, 0xff, 0xff, 0x0f]);
  });

  it('should compute encoded lengths', () => {
    expect(varintLength(127)).toBe(1);
    expect(varintLength(128)).toBe(2);
    expect(varintLength(16383)).toBe(2);
    expect(varintLength(16384)).toBe(3);
    expect(varintLength(0xffffffff)).toBe(5);
  });

  it('should reject values outside the unsigned 32-bit range', () => {
    expect(() => varintLength(-1)).toThrow(InvalidArgumentError);
    expect(() => varintLength(2 ** 32)).toThrow(InvalidArgumentError);
    expect(() => varintLength(1.5)).toThrow(InvalidArgumentError);
  });

  it('should reject writes past the end of the target', () => {
    expect(() => writeVarint(new Uint8Array(1), 0, 128)).toThrow(InvalidArgumentError);
  });

  it('should decode values and report the bytes consumed', () => {
    expect(readVarint(Uint8Array.of(0x00, 0xac, 0x02), 1)).toEqual({ value: 300, length: 2 });
    expect(readVarint(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0x0f), 0)).toEqual({
      value: 0xffffffff,
      length: 5,
    });
  });

  it('should reject truncated encodings', () => {
    expect(() => readVarint(Uint8Array.of(0x80), 0)).toThrow(BufferUnderrunError);
  });

  it('should reject encodings longer than five bytes', () => {
    expect(() => readVarint(Uint8Array.of(0x80, 0x80, 0x80, 0x80, 0x80, 0x01), 0)).toThrow(
      InvalidArgumentError,
    );
  });
});
