/**
 * Contracts shared by the test generators
 */

import type { DataBuffer, NdArrayErrorClass } from '@ndkit/core';

export interface Matchers {
  toBe(expected: unknown): void;
  toEqual(expected: unknown): void;
  toThrow(error?: NdArrayErrorClass | string | RegExp): void;
  toBeTruthy(): void;
  toBeFalsy(): void;
  toHaveLength(length: number): void;
  not: {
    toThrow(): void;
    toBe(expected: unknown): void;
  };
}

/**
 * Test framework object with describe/it/expect functions
 */
export interface TestFramework {
  describe: (name: string, fn: () => void) => void;
  it: (name: string, fn: () => void) => void;
  expect: (actual: unknown) => Matchers;
}

/**
 * One element type under test
 */
export interface ElementFixture<T> {
  readonly name: string;
  /**
   * Fresh writable buffer whose elements all equal `valueOf(0)`
   */
  allocateBuffer(size: number): DataBuffer<T>;
  /**
   * Element derived from `n` in `[0, 256)`; consecutive `n` give different elements
   */
  valueOf(n: number): T;
  /**
   * Element equality, when `===` does not apply (elements read as fresh objects)
   */
  readonly equals?: (a: T, b: T) => boolean;
}
