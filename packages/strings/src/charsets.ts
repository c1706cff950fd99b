/**
 * Conversions between strings and bytes
 */

export interface Charset {
  readonly name: string;
  encode(value: string): Uint8Array;
  decode(bytes: Uint8Array): string;
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8');
const utf16Decoder = new TextDecoder('utf-16le');

export const UTF_8: Charset = Object.freeze({
  name: 'UTF-8',
  encode: (value: string): Uint8Array => utf8Encoder.encode(value),
  decode: (bytes: Uint8Array): string => utf8Decoder.decode(bytes),
});

/**
 * UTF-16 code units in little-endian order, without byte order mark
 */
export const UTF_16LE: Charset = Object.freeze({
  name: 'UTF-16LE',
  encode: (value: string): Uint8Array => {
    const bytes = new Uint8Array(value.length * 2);
    const view = new DataView(bytes.buffer);
    for (let i = 0; i < value.length; i++) {
      view.setUint16(i * 2, value.charCodeAt(i), true);
    }
    return bytes;
  },
  decode: (bytes: Uint8Array): string => utf16Decoder.decode(bytes),
});
