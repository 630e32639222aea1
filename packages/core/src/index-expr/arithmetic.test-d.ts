/**
 * Type tests for literal folding
 *
 * These tests validate that folding two literal types carries the folded
 * value in the result type, and widens otherwise.
 */

import { describe, it } from 'vitest';
import { expectTypeOf } from 'expect-type';
import { add, mul, sub, type Folded, type FoldedAdd } from './arithmetic.js';
import { literal } from './index-expr.js';
import type { IndexExpr, LiteralIndexExpr } from './types.js';

describe('Literal folding types', () => {
  it('should fold literal operand types', () => {
    expectTypeOf(literal(4)).toEqualTypeOf<LiteralIndexExpr<4>>();
    expectTypeOf<FoldedAdd<2, 3>>().toEqualTypeOf<5>();
    expectTypeOf(add(literal(2), literal(3)).value).toEqualTypeOf<5>();
    expectTypeOf(sub(literal(2), literal(3)).value).toEqualTypeOf<-1>();
    expectTypeOf(mul(literal(4), literal(3)).value).toEqualTypeOf<12>();
  });

  it('should widen when an operand type is not a literal', () => {
    expectTypeOf<Folded<number, 3, 7>>().toEqualTypeOf<number>();
    expectTypeOf<Folded<3, number, 7>>().toEqualTypeOf<number>();

    const width: number = 8;
    expectTypeOf(add(literal(width), literal(1)).value).toEqualTypeOf<number>();
  });

  it('should return IndexExpr for general operands', () => {
    const addGeneral = (a: IndexExpr) => add(a, literal(2));
    expectTypeOf(addGeneral).returns.toEqualTypeOf<IndexExpr>();
  });
});
