import { describe, it, expect } from 'vitest';
import { at, NdArrays, ReadOnlyViolationError } from '@ndkit/core';
import { UTF_16LE, UTF_8 } from './charsets';
import { asBytes, bytesTensorOf, decodeStrings, stringLayout, stringTensorOf } from './string-arrays';
import { StringTensorBuffer } from './string-tensor-buffer';

describe('stringTensorOf', () => {
  it('should store scalars', () => {
    const scalar = stringTensorOf(NdArrays.scalarOf('Pretty vacant'));

    expect(scalar.rank).toBe(0);
    expect(scalar.getValue()).toBe('Pretty vacant');
  });

  it('should store vectors', () => {
    const words = stringTensorOf(NdArrays.vectorOf('Pretty', 'vacant'));

    expect(words.shape.dims).toEqual([2]);
    expect(words.getValue(1)).toBe('vacant');
  });

  it('should copy matrices in row-major order', () => {
    const matrix = NdArrays.ofObjects([2, 2], '');
    matrix.write(['north', 'east', 'south', 'west']);
    const strings = stringTensorOf(matrix);

    expect(strings.toArray()).toEqual([
      ['north', 'east'],
      ['south', 'west'],
    ]);
    expect(strings.buffer.isReadOnly()).toBe(true);
    expect(() => strings.setValue('up', 0, 0)).toThrow(ReadOnlyViolationError);
  });

  it('should encode with UTF-8 by default', () => {
    const strings = stringTensorOf(NdArrays.vectorOf('🐥', 'é'));
    const bytes = asBytes(strings);

    expect(bytes?.getValue(0)).toEqual(Uint8Array.of(0xf0, 0x9f, 0x90, 0xa5));
    expect(bytes?.getValue(1)).toEqual(Uint8Array.of(0xc3, 0xa9));
    expect(strings.getValue(0)).toBe('🐥');
  });

  it('should encode with the given charset', () => {
    const strings = stringTensorOf(NdArrays.vectorOf('🐥'), UTF_16LE);

    expect(asBytes(strings)?.getValue(0)).toEqual(Uint8Array.of(0x3d, 0xd8, 0x25, 0xdc));
    expect(strings.getValue(0)).toBe('🐥');
  });
});

describe('decodeStrings', () => {
  it('should view an initialized buffer as strings', () => {
    const data = NdArrays.vectorOf('one', 'two', 'three', 'four');
    const buffer = StringTensorBuffer.allocate(4, StringTensorBuffer.computeSize(data, UTF_8.encode));
    buffer.init(data, UTF_8.encode);
    const strings = decodeStrings(buffer, [2, 2]);

    expect(strings.getValue(1, 0)).toBe('three');
  });

  it('should decode the same bytes with another charset', () => {
    const data = NdArrays.vectorOf('AB');
    const buffer = StringTensorBuffer.allocate(1, StringTensorBuffer.computeSize(data, UTF_8.encode));
    buffer.init(data, UTF_8.encode);

    expect(decodeStrings(buffer, [1], UTF_16LE).getValue(0)).toBe(String.fromCharCode(0x4241));
  });
});

describe('asBytes', () => {
  it('should follow slices of string arrays', () => {
    const strings = stringTensorOf(NdArrays.vectorOf('left', 'right'));
    const bytes = asBytes(strings.slice(at(1)));

    expect(bytes?.rank).toBe(0);
    expect(bytes?.getValue()).toEqual(UTF_8.encode('right'));
  });

  it('should return undefined for arrays not backed by string buffers', () => {
    expect(asBytes(NdArrays.vectorOf('plain'))).toBeUndefined();
  });
});

describe('bytesTensorOf', () => {
  it('should store raw byte records', () => {
    const words = ['alpha', 'beta', 'gamma', 'delta', '!'].map((word) => UTF_8.encode(word));
    const bytes = bytesTensorOf(NdArrays.vectorOf(...words));

    expect(bytes.buffer).toBeInstanceOf(StringTensorBuffer);
    expect(bytes.size).toBe(5);
    expect(bytes.getValue(2)).toEqual(UTF_8.encode('gamma'));
    expect(UTF_8.decode(bytes.getValue(4))).toBe('!');
  });
});

describe('stringLayout', () => {
  it('should share one layout per charset', () => {
    expect(stringLayout()).toBe(stringLayout(UTF_8));
    expect(stringLayout(UTF_16LE)).not.toBe(stringLayout(UTF_8));
  });
});
