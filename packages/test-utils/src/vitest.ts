/**
 * Test framework adapter for vitest
 */

import { describe, expect, it } from 'vitest';
import type { TestFramework } from './types';

export const vitestFramework: TestFramework = {
  describe: (name, fn) => {
    describe(name, fn);
  },
  it: (name, fn) => {
    it(name, fn);
  },
  expect: (actual) => ({
    toBe: (expected) => {
      expect(actual).toBe(expected);
    },
    toEqual: (expected) => {
      expect(actual).toEqual(expected);
    },
    toThrow: (error) => {
      expect(actual).toThrow(error);
    },
    toBeTruthy: () => {
      expect(actual).toBeTruthy();
    },
    toBeFalsy: () => {
      expect(actual).toBeFalsy();
    },
    toHaveLength: (length) => {
      expect(actual).toHaveLength(length);
    },
    not: {
      toThrow: () => {
        expect(actual).not.toThrow();
      },
      toBe: (expected) => {
        expect(actual).not.toBe(expected);
      },
    },
  }),
};
