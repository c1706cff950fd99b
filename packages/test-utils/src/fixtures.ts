/**
 * Element fixtures for every buffer flavour shipped by @ndkit/core
 */

import { DataBuffers } from '@ndkit/core';
import type { Complex } from '@ndkit/core';
import type { ElementFixture } from './types';

export const int32Fixture: ElementFixture<number> = {
  name: 'int32',
  allocateBuffer: DataBuffers.ofInts,
  valueOf: (n) => n,
};

export const int16Fixture: ElementFixture<number> = {
  name: 'int16',
  allocateBuffer: DataBuffers.ofShorts,
  valueOf: (n) => n,
};

export const float32Fixture: ElementFixture<number> = {
  name: 'float32',
  allocateBuffer: DataBuffers.ofFloats,
  valueOf: (n) => n / 4,
};

export const float64Fixture: ElementFixture<number> = {
  name: 'float64',
  allocateBuffer: DataBuffers.ofDoubles,
  valueOf: (n) => n / 8,
};

export const int64Fixture: ElementFixture<bigint> = {
  name: 'int64',
  allocateBuffer: DataBuffers.ofLongs,
  valueOf: (n) => BigInt(n),
};

export const booleanFixture: ElementFixture<boolean> = {
  name: 'boolean',
  allocateBuffer: DataBuffers.ofBooleans,
  valueOf: (n) => n % 2 === 1,
};

export const float16Fixture: ElementFixture<number> = {
  name: 'float16',
  allocateBuffer: DataBuffers.ofFloat16,
  valueOf: (n) => n,
};

export const bfloat16Fixture: ElementFixture<number> = {
  name: 'bfloat16',
  allocateBuffer: DataBuffers.ofBFloat16,
  valueOf: (n) => n,
};

export const complex64Fixture: ElementFixture<Complex> = {
  name: 'complex64',
  allocateBuffer: DataBuffers.ofComplex64,
  valueOf: (n) => ({ re: n, im: n / 2 }),
  equals: (a, b) => a.re === b.re && a.im === b.im,
};

export const stringFixture: ElementFixture<string> = {
  name: 'string',
  allocateBuffer: (size) => DataBuffers.ofObjects(size, '0'),
  valueOf: (n) => n.toString(),
};
