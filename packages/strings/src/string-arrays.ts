/**
 * String and byte arrays backed by string tensor buffers
 */

import { DataBufferAdapter, NdArray, simpleLayout } from '@ndkit/core';
import type { DataLayout, Dims, Shape } from '@ndkit/core';
import { UTF_8 } from './charsets';
import type { Charset } from './charsets';
import { StringTensorBuffer } from './string-tensor-buffer';

const layouts = new Map<Charset, DataLayout<Uint8Array, string>>();

/**
 * Layout decoding byte records as strings in `charset`; one instance per charset
 */
export function stringLayout(charset: Charset = UTF_8): DataLayout<Uint8Array, string> {
  let layout = layouts.get(charset);
  if (layout === undefined) {
    layout = simpleLayout<Uint8Array, string>(
      (bytes) => charset.decode(bytes),
      (value) => charset.encode(value),
    );
    layouts.set(charset, layout);
  }
  return layout;
}

function encodeAll<T>(data: NdArray<T>, toBytes: (value: T) => Uint8Array): StringTensorBuffer {
  const buffer = StringTensorBuffer.allocate(data.size, StringTensorBuffer.computeSize(data, toBytes));
  return buffer.init(data, toBytes);
}

/**
 * Copy `data` into a new string tensor buffer, encoded with `charset`
 *
 * @example
 * const words = stringTensorOf(NdArrays.vectorOf('Pretty', 'vacant'));
 * words.getValue(1); // 'vacant'
 */
export function stringTensorOf(data: NdArray<string>, charset: Charset = UTF_8): NdArray<string> {
  const buffer = encodeAll(data, (value) => charset.encode(value));
  return decodeStrings(buffer, data.shape, charset);
}

/**
 * Copy raw byte records into a new string tensor buffer
 */
export function bytesTensorOf(data: NdArray<Uint8Array>): NdArray<Uint8Array> {
  return new NdArray(data.shape, encodeAll(data, (value) => value));
}

/**
 * View an existing buffer as strings decoded with `charset`
 */
export function decodeStrings(
  buffer: StringTensorBuffer,
  shape: Shape | Dims,
  charset: Charset = UTF_8,
): NdArray<string> {
  return new NdArray(shape, new DataBufferAdapter(buffer, stringLayout(charset)));
}

/**
 * Byte records underneath a string array built by `stringTensorOf` or
 * `decodeStrings`, or any view of one
 *
 * @returns `undefined` when `strings` is not backed by a string tensor buffer
 */
export function asBytes(strings: NdArray<string>): NdArray<Uint8Array> | undefined {
  const buffer = strings.buffer;
  if (!(buffer instanceof DataBufferAdapter)) {
    return undefined;
  }
  const physical: unknown = buffer.physicalBuffer;
  if (!(physical instanceof StringTensorBuffer)) {
    return undefined;
  }
  return strings.withBuffer(physical);
}
