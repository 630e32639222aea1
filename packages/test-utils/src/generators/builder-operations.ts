/**
 * Test generators for the index-expression builder
 *
 * These generators check the behavior every IR-backed accessor set must give
 * the builder: constants and static extents come out as literals, unknowns
 * come out as handles or questionmarks, and contract violations throw.
 */

import type { IndexExprAccessors } from '@dimexpr/core';
import {
  DYNAMIC_EXTENT,
  IndexExprBuilder,
  IndexExprList,
  IntArrayAttr,
  formatIndexExpr,
  formatIndexExprList,
  hasHandle,
  isContractViolation,
  isQuestionmark,
  rankedTensor,
  unrankedTensor,
  Block,
} from '@dimexpr/core';
import { constantArray, shapedArgument } from '../fixtures.js';

/**
 * Generates builder tests for an accessor set
 *
 * @param name - Label of the accessor set under test
 * @param createAccessors - Fresh accessors per test
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateBuilderOperationTests(
  name: string,
  createAccessors: () => IndexExprAccessors,
  testFramework: {
    describe: (name: string, fn: () => void) => void;
    it: (name: string, fn: () => void) => void;
    expect: (actual: unknown) => {
      toBe: (expected: unknown) => void;
      toEqual: (expected: unknown) => void;
    };
  },
): void {
  const { describe, it, expect } = testFramework;

  const builder = (): IndexExprBuilder => new IndexExprBuilder(createAccessors());

  const violationCode = (fn: () => unknown): string | undefined => {
    try {
      fn();
    } catch (error) {
      return isContractViolation(error) ? error.code : 'not a contract violation';
    }
    return undefined;
  };

  describe(`IndexExprBuilder operations (${name})`, () => {
    describe('attributes', () => {
      it('should read attribute elements as literals', () => {
        const attr = new IntArrayAttr([1, 2, 3]);
        expect(formatIndexExpr(builder().getIntArrayAttrAsLiteral(attr, 2))).toBe('3');
        expect(formatIndexExpr(builder().getIntArrayAttrAsLiteral(attr, 3))).toBe('undef');
        expect(formatIndexExpr(builder().getIntArrayAttrAsLiteral(attr, 3, 7))).toBe('7');
      });
    });

    describe('constant arrays', () => {
      it('should read through constants as literals', () => {
        const strides = constantArray([2, 1], { name: 'strides' });
        expect(formatIndexExprList(builder().getIntArrayAsSymbols(strides))).toBe('[2, 1]');
      });

      it('should read a constant scalar as a single literal', () => {
        const axis = constantArray([3], { name: 'axis', scalar: true });
        expect(builder().getIntArraySize(axis)).toBe(1);
        expect(formatIndexExpr(builder().getIntArrayAsSymbol(axis, 0))).toBe('3');
      });

      it('should report positions past the end as undefined', () => {
        const pads = constantArray([0, 1], { name: 'pads' });
        expect(formatIndexExpr(builder().getIntArrayAsSymbol(pads, 2))).toBe('undef');
        expect(formatIndexExpr(builder().getIntArrayAsSymbol(pads, 2, 0))).toBe('0');
      });
    });

    describe('shapes', () => {
      it('should return static extents as literals', () => {
        const x = shapedArgument([2, 3, 4], 'x');
        const list = new IndexExprList();
        builder().getShapeAsSymbols(x, list);
        expect(formatIndexExprList(list)).toBe('[2, 3, 4]');
        builder().getShapeAsDims(x, list);
        expect(formatIndexExprList(list)).toBe('[2, 3, 4]');
      });

      it('should return a handle or a located questionmark for a dynamic extent', () => {
        const x = shapedArgument([2, DYNAMIC_EXTENT], 'x');
        const expr = builder().getShapeAsSymbol(x, 1);
        if (isQuestionmark(expr)) {
          expect(expr.provenance?.source).toBe(x);
          expect(expr.provenance?.index).toBe(1);
        } else {
          expect(hasHandle(expr)).toBe(true);
        }
      });
    });

    describe('contract violations', () => {
      it('should reject unranked values', () => {
        const x = new Block().addArgument(unrankedTensor(), 'x');
        expect(violationCode(() => builder().getTypeRank(x))).toBe('UNRANKED_TYPE');
      });

      it('should reject dimension indices past the rank', () => {
        const x = shapedArgument([2, 3, 4], 'x');
        expect(violationCode(() => builder().getShapeAsLiteral(x, 5))).toBe('DIM_INDEX_OUT_OF_RANGE');
      });

      it('should reject arrays of rank 2 or more', () => {
        const m = new Block().addArgument(rankedTensor([2, 2]), 'm');
        expect(violationCode(() => builder().getIntArraySize(m))).toBe('RANK_OUT_OF_RANGE');
      });
    });
  });
}
