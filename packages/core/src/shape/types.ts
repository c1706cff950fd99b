/**
 * Type-level shape utilities
 *
 * Static shapes (`readonly [2, 3, 4]`) flow through `Shape.of` so that rank and
 * element counts of literal shapes are visible to the compiler.
 */

import type { Multiply } from 'ts-arithmetic';

/**
 * Ordered dimension sizes, outermost first
 */
export type Dims = readonly number[];

/**
 * Number of dimensions of a shape
 *
 * @example
 * type R = Rank<readonly [2, 3, 4]> // 3
 */
export type Rank<S extends Dims> = S['length'];

/**
 * Total element count of a static shape (1 for a scalar)
 *
 * @example
 * type N = Product<readonly [2, 3, 4]> // 24
 */
export type Product<S extends Dims> = S extends readonly []
  ? 1
  : S extends readonly [infer Head extends number, ...infer Tail extends Dims]
    ? Head extends 0
      ? 0
      : Multiply<Head, Product<Tail>>
    : number;
