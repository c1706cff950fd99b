/**
 * Factory functions for index specifications
 *
 * @example
 * array.slice(at(1), all(), range(0, 4, 2));
 * array.slice(flip(), even());
 */

import type {
  AllIndex,
  AtIndex,
  EvenIndex,
  FlipIndex,
  FromIndex,
  IndexSource,
  OddIndex,
  RangeIndex,
  SequenceIndex,
  ToIndex,
} from './types';

const ALL: AllIndex = Object.freeze({ kind: 'all' });
const EVEN: EvenIndex = Object.freeze({ kind: 'even' });
const ODD: OddIndex = Object.freeze({ kind: 'odd' });
const FLIP: FlipIndex = Object.freeze({ kind: 'flip' });

export function all(): AllIndex {
  return ALL;
}

/**
 * Fix a dimension to `position`, either a number or a rank-0 array whose value
 * is read when the slice is built
 */
export function at(position: number | IndexSource): AtIndex {
  return { kind: 'at', position };
}

export function range(begin: number, end: number, step = 1): RangeIndex {
  return { kind: 'range', begin, end, step };
}

export function seq(...positions: number[]): SequenceIndex {
  return { kind: 'sequence', positions: Object.freeze([...positions]) };
}

export function even(): EvenIndex {
  return EVEN;
}

export function odd(): OddIndex {
  return ODD;
}

export function flip(): FlipIndex {
  return FLIP;
}

export function from(begin: number): FromIndex {
  return { kind: 'from', begin };
}

export function to(end: number): ToIndex {
  return { kind: 'to', end };
}

/**
 * All index factories under one namespace
 */
export const Indices = Object.freeze({
  all,
  at,
  range,
  seq,
  even,
  odd,
  flip,
  from,
  to,
});
