export { NdArray } from './ndarray';
export type { NestedArray } from './ndarray';
export { NdArrays } from './creation';
export type { FormatOptions } from './format';
export type { ArrayMapping, Dimension } from './dimension';
export { MappedDimension, StridedDimension } from './dimension';
