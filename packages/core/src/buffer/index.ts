export type { BufferOptions, DataBuffer, WritableArrayLike } from './types';
export { isDataBuffer } from './types';
export { AbstractDataBuffer } from './abstract-buffer';
export { ArrayDataBuffer } from './array-buffer';
export { TypedArrayDataBuffer } from './typed-buffer';
export type { AnyTypedArray, BigIntTypedArray, NumericTypedArray, TypedArrayLike } from './typed-buffer';
export { DataBuffers } from './data-buffers';
