/**
 * Resolution of index specifications against dimension sizes
 */

import {
  assertExhaustiveSwitch,
  IndexOutOfRangeError,
  InvalidArgumentError,
} from '../errors';
import type { IndexSource, IndexSpec, ResolvedIndex } from './types';

/**
 * Resolve `spec` against a dimension of `dimSize` elements
 *
 * @throws {IndexOutOfRangeError} If a position or bound falls outside the dimension
 * @throws {InvalidArgumentError} If a range step is not a positive integer or a
 * dynamic position is not a rank-0 array
 */
export function resolveIndex(spec: IndexSpec, dimSize: number): ResolvedIndex {
  switch (spec.kind) {
    case 'all':
      return affine(dimSize, 0, 1);

    case 'at': {
      const position = resolvePosition(spec.position);
      checkPosition(position, dimSize);
      return {
        size: 0,
        collapsed: true,
        map: () => position,
        affine: { start: position, step: 0 },
      };
    }

    case 'range':
      return resolveRange(spec.begin, spec.end, spec.step, dimSize);

    case 'from':
      return resolveRange(spec.begin, dimSize, 1, dimSize);

    case 'to':
      return resolveRange(0, spec.end, 1, dimSize);

    case 'sequence': {
      const positions = spec.positions;
      positions.forEach((position) => {
        checkPosition(position, dimSize);
      });
      return {
        size: positions.length,
        collapsed: false,
        map: (index) => {
          const position = positions[index];
          if (position === undefined) {
            throw new IndexOutOfRangeError(
              `Index ${index.toString()} out of bounds for sequence of ${positions.length.toString()} positions`,
            );
          }
          return position;
        },
      };
    }

    case 'even':
      return affine(Math.ceil(dimSize / 2), 0, 2);

    case 'odd':
      return affine(Math.floor(dimSize / 2), 1, 2);

    case 'flip':
      return affine(dimSize, dimSize - 1, -1);

    default:
      return assertExhaustiveSwitch(spec);
  }
}

function affine(size: number, start: number, step: number): ResolvedIndex {
  return {
    size,
    collapsed: false,
    map: (index) => start + index * step,
    affine: { start, step },
  };
}

function resolveRange(begin: number, end: number, step: number, dimSize: number): ResolvedIndex {
  if (!Number.isInteger(step) || step <= 0) {
    throw new InvalidArgumentError(`Range step must be a positive integer, got ${String(step)}`, {
      step,
    });
  }
  if (
    !Number.isInteger(begin) ||
    !Number.isInteger(end) ||
    begin < 0 ||
    begin > end ||
    end > dimSize
  ) {
    throw new IndexOutOfRangeError(
      `Range [${String(begin)}, ${String(end)}) out of bounds for dimension of size ${dimSize.toString()}`,
      { begin, end, size: dimSize },
    );
  }
  return affine(Math.ceil((end - begin) / step), begin, step);
}

function resolvePosition(position: number | IndexSource): number {
  if (typeof position === 'number') {
    return position;
  }
  if (position.rank !== 0) {
    throw new InvalidArgumentError(
      `Dynamic index source must be a rank-0 array, got rank ${position.rank.toString()}`,
      { rank: position.rank },
    );
  }
  return Number(position.getValue());
}

function checkPosition(position: number, dimSize: number): void {
  if (!Number.isInteger(position) || position < 0 || position >= dimSize) {
    throw new IndexOutOfRangeError(
      `Position ${String(position)} out of bounds for dimension of size ${dimSize.toString()}`,
      { position, size: dimSize },
    );
  }
}
