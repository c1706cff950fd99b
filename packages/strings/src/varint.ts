/**
 * Little-endian base-128 varints (protobuf style) for unsigned 32-bit lengths
 */

import { BufferUnderrunError, InvalidArgumentError } from '@ndkit/core';

/** Longest encoding of a 32-bit unsigned value */
export const MAX_VARINT_BYTES = 5;

const MAX_VARINT_VALUE = 0xffffffff;

function checkValue(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_VARINT_VALUE) {
    throw new InvalidArgumentError(`Varint value must be an unsigned 32-bit integer, got ${String(value)}`, {
      value,
    });
  }
}

/**
 * Number of bytes needed to encode `value`
 *
 * @example
 * varintLength(127); // 1
 * varintLength(128); // 2
 */
export function varintLength(value: number): number {
  checkValue(value);
  let length = 1;
  let remaining = value;
  while (remaining >= 0x80) {
    remaining = Math.floor(remaining / 0x80);
    length++;
  }
  return length;
}

/**
 * Encode `value` into `target` at `position`
 *
 * @returns Number of bytes written
 */
export function writeVarint(target: Uint8Array, position: number, value: number): number {
  const length = varintLength(value);
  if (position < 0 || position + length > target.length) {
    throw new InvalidArgumentError(
      `Cannot write ${length.toString()}-byte varint at ${position.toString()} into ${target.length.toString()} bytes`,
      { position, length, capacity: target.length },
    );
  }
  let remaining = value;
  let cursor = position;
  while (remaining >= 0x80) {
    target[cursor++] = (remaining % 0x80) | 0x80;
    remaining = Math.floor(remaining / 0x80);
  }
  target[cursor] = remaining;
  return length;
}

export interface DecodedVarint {
  readonly value: number;
  /** Bytes consumed */
  readonly length: number;
}

/**
 * Decode the varint starting at `position` of `source`
 *
 * @throws {BufferUnderrunError} If `source` ends inside the varint
 * @throws {InvalidArgumentError} If the encoding is longer than five bytes
 */
export function readVarint(source: Uint8Array, position: number): DecodedVarint {
  let value = 0;
  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const cursor = position + i;
    if (cursor >= source.length) {
      throw new BufferUnderrunError(`Varint at ${position.toString()} runs past the end of the data`, {
        position,
        length: source.length,
      });
    }
    const byte = source[cursor];
    value += (byte & 0x7f) * 2 ** (7 * i);
    if ((byte & 0x80) === 0) {
      return { value, length: i + 1 };
    }
  }
  throw new InvalidArgumentError(
    `Varint at ${position.toString()} is longer than ${MAX_VARINT_BYTES.toString()} bytes`,
    { position },
  );
}
