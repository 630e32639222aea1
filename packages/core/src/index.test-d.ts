/**
 * Type tests for the public builder surface
 */

import { describe, it } from 'vitest';
import { expectTypeOf } from 'expect-type';
import {
  IndexExprBuilder,
  IndexExprList,
  IntArrayAttr,
  analysisAccessors,
  type DefinedIndexExpr,
  type IndexExpr,
  type IndexExprAccessors,
} from './index.js';

describe('IndexExprBuilder types', () => {
  const builder = new IndexExprBuilder(analysisAccessors);
  const attr = new IntArrayAttr([1]);

  it('should exclude undefined once a default is given', () => {
    expectTypeOf(builder.getIntArrayAttrAsLiteral(attr, 0)).toEqualTypeOf<IndexExpr>();
    expectTypeOf(builder.getIntArrayAttrAsLiteral(attr, 0, 1)).toEqualTypeOf<DefinedIndexExpr>();
  });

  it('should return the filled list', () => {
    expectTypeOf(builder.getShapeAsDims).returns.toEqualTypeOf<IndexExprList>();
  });

  it('should accept plain objects as accessors', () => {
    expectTypeOf({
      getConst: () => undefined,
      getVal: () => undefined,
      getShapeVal: () => undefined,
    }).toExtend<IndexExprAccessors>();
  });
});
