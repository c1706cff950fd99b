export { StringTensorBuffer } from './string-tensor-buffer';
export { MAX_VARINT_BYTES, readVarint, varintLength, writeVarint } from './varint';
export type { DecodedVarint } from './varint';
export { UTF_16LE, UTF_8 } from './charsets';
export type { Charset } from './charsets';
export { asBytes, bytesTensorOf, decodeStrings, stringLayout, stringTensorOf } from './string-arrays';
