/**
 * Shape module exports
 *
 * @module shape
 */

export type { Dims, Product, Rank } from './types';
export {
  assertValidShape,
  computeStrides,
  formatShape,
  isValidShape,
  MAX_RANK,
  MAX_SIZE,
  Shape,
} from './shape';
