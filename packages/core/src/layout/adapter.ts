/**
 * Buffer adapter exposing a physical buffer through a data layout
 */

import { AbstractDataBuffer } from '../buffer/abstract-buffer';
import type { BufferOptions, DataBuffer } from '../buffer/types';
import type { DataLayout } from './types';

/**
 * View of a `DataBuffer<S>` as a `DataBuffer<T>`, converting each element on
 * access. Trailing physical elements that do not fill a whole user element are
 * ignored.
 */
export class DataBufferAdapter<S, T> extends AbstractDataBuffer<T> {
  readonly size: number;
  readonly layout: DataLayout<S, T>;
  private readonly physical: DataBuffer<S>;
  private readonly readOnly: boolean;

  constructor(physical: DataBuffer<S>, layout: DataLayout<S, T>, options: BufferOptions = {}) {
    super();
    this.physical = physical;
    this.layout = layout;
    this.size = Math.floor(physical.size / layout.scale);
    this.readOnly = (options.readOnly ?? false) || physical.isReadOnly();
  }

  /**
   * Underlying buffer, in physical elements
   */
  get physicalBuffer(): DataBuffer<S> {
    return this.physical;
  }

  isReadOnly(): boolean {
    return this.readOnly;
  }

  protected getUnchecked(index: number): T {
    return this.layout.readValue(this.physical, index * this.layout.scale);
  }

  protected setUnchecked(value: T, index: number): void {
    this.layout.writeValue(this.physical, value, index * this.layout.scale);
  }

  protected view(index: number, size: number): DataBuffer<T> {
    const scale = this.layout.scale;
    return new DataBufferAdapter(this.physical.slice(index * scale, size * scale), this.layout, {
      readOnly: this.readOnly,
    });
  }

  protected override copyBulk(dst: DataBuffer<T>, size: number): boolean {
    if (!(dst instanceof DataBufferAdapter) || dst.layout !== this.layout) {
      return false;
    }
    // same encoding on both sides: copy the physical elements as they are
    this.physical.copyTo(dst.physical, size * this.layout.scale);
    return true;
  }
}

/**
 * Adapt `buffer` to `layout`
 *
 * @example
 * const flags = withLayout(DataBuffers.wrap(new Uint8Array(8)), BOOL_LAYOUT);
 */
export function withLayout<S, T>(
  buffer: DataBuffer<S>,
  layout: DataLayout<S, T>,
  options?: BufferOptions,
): DataBuffer<T> {
  return new DataBufferAdapter(buffer, layout, options);
}
