/**
 * Data layouts
 *
 * A layout converts between the elements of a physical buffer (`S`) and the
 * user-facing element type (`T`). One user element spans `scale` consecutive
 * physical elements.
 */

import type { DataBuffer } from '../buffer/types';

export interface DataLayout<S, T> {
  /** Physical elements per user element */
  readonly scale: number;

  /**
   * Decode the user element whose first physical element is at `index`
   */
  readValue(buffer: DataBuffer<S>, index: number): T;

  /**
   * Encode `value` into the physical elements starting at `index`
   */
  writeValue(buffer: DataBuffer<S>, value: T, index: number): void;
}

export interface Complex {
  readonly re: number;
  readonly im: number;
}
