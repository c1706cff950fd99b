/**
 * Built-in data layouts
 */

import type { DataBuffer } from '../buffer/types';
import { fromBFloat16Bits, fromFloat16Bits, toBFloat16Bits, toFloat16Bits } from './float16';
import type { Complex, DataLayout } from './types';

/**
 * Layout mapping each user element to exactly one physical element
 *
 * @example
 * const celsius = simpleLayout<number, number>((k) => k - 273.15, (c) => c + 273.15);
 */
export function simpleLayout<S, T>(
  decode: (physical: S) => T,
  encode: (value: T) => S,
): DataLayout<S, T> {
  return Object.freeze({
    scale: 1,
    readValue: (buffer: DataBuffer<S>, index: number): T => decode(buffer.get(index)),
    writeValue: (buffer: DataBuffer<S>, value: T, index: number): void => {
      buffer.set(encode(value), index);
    },
  });
}

/**
 * Booleans stored as one byte each (0 or 1); any non-zero byte reads as true
 */
export const BOOL_LAYOUT: DataLayout<number, boolean> = simpleLayout(
  (byte) => byte !== 0,
  (value) => (value ? 1 : 0),
);

/**
 * IEEE 754 half precision stored as 16-bit unsigned integers
 */
export const FLOAT16_LAYOUT: DataLayout<number, number> = simpleLayout(
  fromFloat16Bits,
  toFloat16Bits,
);

/**
 * Brain floating point (upper 16 bits of a float32) stored as 16-bit unsigned integers
 */
export const BFLOAT16_LAYOUT: DataLayout<number, number> = simpleLayout(
  fromBFloat16Bits,
  toBFloat16Bits,
);

/**
 * Single precision complex numbers stored as interleaved (re, im) pairs
 */
export const COMPLEX64_LAYOUT: DataLayout<number, Complex> = Object.freeze({
  scale: 2,
  readValue: (buffer: DataBuffer<number>, index: number): Complex => ({
    re: buffer.get(index),
    im: buffer.get(index + 1),
  }),
  writeValue: (buffer: DataBuffer<number>, value: Complex, index: number): void => {
    buffer.set(value.re, index).set(value.im, index + 1);
  },
});
