export type {
  IndexSpec,
  IndexKind,
  IndexSource,
  AllIndex,
  AtIndex,
  RangeIndex,
  SequenceIndex,
  EvenIndex,
  OddIndex,
  FlipIndex,
  FromIndex,
  ToIndex,
  ResolvedIndex,
  AffineMapping,
} from './types';
export { all, at, range, seq, even, odd, flip, from, to, Indices } from './indices';
export { resolveIndex } from './resolve';
