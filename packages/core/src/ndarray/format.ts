/**
 * Text rendering of array contents, in the style of PyTorch tensor printing
 */

import type { NdArray } from './ndarray';

export interface FormatOptions {
  /** Arrays with more elements than this are truncated (default 1000) */
  readonly maxElements?: number;
  /** Items kept at each end of a truncated dimension (default 3) */
  readonly edgeItems?: number;
}

export function formatNdArray<T>(array: NdArray<T>, options: FormatOptions = {}): string {
  const maxElements = options.maxElements ?? 1000;
  const edgeItems = options.edgeItems ?? 3;

  if (array.rank === 0) {
    return `ndarray(${formatValue(array.getValue())})`;
  }
  if (array.size === 0) {
    return 'ndarray([])';
  }

  const truncate = array.size > maxElements;
  return `ndarray(${formatBlock(array, 0, truncate, edgeItems)})`;
}

function formatBlock<T>(array: NdArray<T>, depth: number, truncate: boolean, edgeItems: number): string {
  const indices = visibleIndices(array.shape.dim(0), truncate, edgeItems);

  if (array.rank === 1) {
    const items = indices.map((i) => (i === null ? '...' : formatValue(array.getValue(i))));
    return `[${items.join(', ')}]`;
  }

  const rows = indices.map((i) =>
    i === null ? '...' : formatBlock(array.get(i), depth + 1, truncate, edgeItems),
  );
  // blank line between blocks of rank 2 and above
  const separator = array.rank > 2 ? ',\n\n' : ',\n';
  const indent = ' '.repeat(depth + 1);
  return `[\n${indent}${rows.join(separator + indent)}\n${' '.repeat(depth)}]`;
}

/**
 * Indices to print along a dimension of `size`; `null` marks the elision
 */
function visibleIndices(size: number, truncate: boolean, edgeItems: number): (number | null)[] {
  const all = Array.from({ length: size }, (_, i) => i);
  if (!truncate || size <= 2 * edgeItems) {
    return all;
  }
  return [...all.slice(0, edgeItems), null, ...all.slice(size - edgeItems)];
}

function formatValue(value: unknown): string {
  if (typeof value === 'number') {
    if (Number.isInteger(value)) {
      return value.toString();
    }
    // Format floats to 4 decimal places
    return value.toFixed(4).replace(/\.?0+$/, '');
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  return String(value);
}
