/**
 * Runtime tests for index expression constructors, predicates and queries
 */

import { describe, it, expect } from 'vitest';
import {
  asDim,
  asSymbol,
  dim,
  formatIndexExpr,
  getHandle,
  getLiteral,
  hasHandle,
  isAffineUsable,
  isDefined,
  isDim,
  isLiteral,
  isQuestionmark,
  isSymbol,
  isUndefined,
  literal,
  orDefault,
  questionmark,
  sameIndexExpr,
  symbol,
  undefinedExpr,
} from './index-expr.js';
import type { IndexExpr } from './types.js';
import { ContractViolationError } from '../errors.js';
import { Block } from '../ir/block.js';
import { indexType, rankedTensor } from '../ir/types.js';

const block = new Block();
const n = block.addArgument(indexType, 'n');
const m = block.addArgument(indexType, 'm');
const x = block.addArgument(rankedTensor([2, -1]), 'x');

const samples: [string, IndexExpr][] = [
  ['literal', literal(4)],
  ['symbol', symbol(n)],
  ['dim', dim(n)],
  ['questionmark', questionmark()],
  ['undefined', undefinedExpr()],
];

describe('Index expression predicates', () => {
  it('should have exactly one variant predicate true', () => {
    for (const [, expr] of samples) {
      const hits = [isLiteral, isSymbol, isDim, isQuestionmark, isUndefined].filter((p) => p(expr));
      expect(hits.length).toBe(1);
    }
  });

  it('should match each predicate to its variant', () => {
    expect(isLiteral(literal(0))).toBe(true);
    expect(isSymbol(symbol(n))).toBe(true);
    expect(isDim(dim(n))).toBe(true);
    expect(isQuestionmark(questionmark({ source: x, index: 1 }))).toBe(true);
    expect(isUndefined(undefinedExpr())).toBe(true);
  });

  it('should classify derived properties', () => {
    expect(samples.map(([, e]) => isDefined(e))).toEqual([true, true, true, true, false]);
    expect(samples.map(([, e]) => hasHandle(e))).toEqual([false, true, true, false, false]);
    expect(samples.map(([, e]) => isAffineUsable(e))).toEqual([true, true, true, false, false]);
  });
});

describe('Index expression constructors', () => {
  it('should reject non-integer literals', () => {
    expect(() => literal(1.5)).toThrow(ContractViolationError);
    expect(() => literal(Number.NaN)).toThrow('Literal index expression requires a safe integer, got NaN');
    expect(() => literal(2 ** 53)).toThrow(ContractViolationError);
  });

  it('should keep questionmarks free of handles', () => {
    expect(questionmark()).toEqual({ kind: 'questionmark' });
    expect('provenance' in questionmark()).toBe(false);
    expect(questionmark({ source: x, index: 1 })).toEqual({
      kind: 'questionmark',
      provenance: { source: x, index: 1 },
    });
  });
});

describe('Index expression queries', () => {
  it('should return the literal value', () => {
    expect(getLiteral(literal(-3))).toBe(-3);
    expect(() => getLiteral(questionmark())).toThrow('Expected a literal index expression, got ?');
  });

  it('should return the handle of symbols and dims', () => {
    expect(getHandle(symbol(n))).toBe(n);
    expect(getHandle(dim(m))).toBe(m);
    expect(() => getHandle(literal(1))).toThrow('Expected a symbol or dim index expression, got 1');
  });
});

describe('Index expression coercions', () => {
  it('should convert between symbol and dim over the same handle', () => {
    expect(asSymbol(dim(n))).toEqual(symbol(n));
    expect(asDim(symbol(n))).toEqual(dim(n));
  });

  it('should pass other variants through', () => {
    const q = questionmark({ source: x, index: 1 });
    expect(asSymbol(q)).toBe(q);
    expect(asDim(literal(2))).toEqual(literal(2));
    expect(asDim(dim(n))).toEqual(dim(n));
  });

  it('should substitute a default for undefined only', () => {
    expect(orDefault(undefinedExpr(), 1)).toEqual(literal(1));
    expect(orDefault(literal(5), 1)).toEqual(literal(5));
    expect(orDefault(questionmark(), 1)).toEqual(questionmark());
  });
});

describe('sameIndexExpr', () => {
  it('should compare payloads', () => {
    expect(sameIndexExpr(literal(2), literal(2))).toBe(true);
    expect(sameIndexExpr(literal(2), literal(3))).toBe(false);
    expect(sameIndexExpr(symbol(n), symbol(n))).toBe(true);
    expect(sameIndexExpr(symbol(n), symbol(m))).toBe(false);
    expect(sameIndexExpr(symbol(n), dim(n))).toBe(false);
    expect(sameIndexExpr(undefinedExpr(), undefinedExpr())).toBe(true);
  });

  it('should compare questionmark provenance', () => {
    expect(sameIndexExpr(questionmark(), questionmark())).toBe(true);
    expect(sameIndexExpr(questionmark(), questionmark({ source: x, index: 1 }))).toBe(false);
    expect(
      sameIndexExpr(questionmark({ source: x, index: 1 }), questionmark({ source: x, index: 1 })),
    ).toBe(true);
    expect(
      sameIndexExpr(questionmark({ source: x, index: 0 }), questionmark({ source: x, index: 1 })),
    ).toBe(false);
  });
});

describe('formatIndexExpr', () => {
  it('should render every variant', () => {
    expect(samples.map(([, e]) => formatIndexExpr(e))).toEqual(['4', 'sym(%n)', 'dim(%n)', '?', 'undef']);
    expect(formatIndexExpr(questionmark({ source: x, index: 1 }))).toBe('?(%x[1])');
  });
});
