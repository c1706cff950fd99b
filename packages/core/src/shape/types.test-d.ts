/**
 * Type tests for the shape system
 */

import { expectTypeOf } from 'expect-type';
import { Shape } from './shape';
import type { Dims, Product, Rank } from './types';

expectTypeOf<Rank<readonly []>>().toEqualTypeOf<0>();
expectTypeOf<Rank<readonly [2, 3, 4]>>().toEqualTypeOf<3>();
expectTypeOf<Rank<Dims>>().toEqualTypeOf<number>();

expectTypeOf<Product<readonly []>>().toEqualTypeOf<1>();
expectTypeOf<Product<readonly [2, 3, 4]>>().toEqualTypeOf<24>();
expectTypeOf<Product<readonly [5, 0, 7]>>().toEqualTypeOf<0>();
expectTypeOf<Product<readonly number[]>>().toEqualTypeOf<number>();

// Literal dimensions survive Shape.of
const matrix = Shape.of(2, 3);
expectTypeOf(matrix.dims).toEqualTypeOf<readonly [2, 3]>();
expectTypeOf(Shape.scalar().dims).toEqualTypeOf<readonly []>();
