export type { Complex, DataLayout } from './types';
export { BFLOAT16_LAYOUT, BOOL_LAYOUT, COMPLEX64_LAYOUT, FLOAT16_LAYOUT, simpleLayout } from './layouts';
export { DataBufferAdapter, withLayout } from './adapter';
export { fromBFloat16Bits, fromFloat16Bits, toBFloat16Bits, toFloat16Bits } from './float16';
