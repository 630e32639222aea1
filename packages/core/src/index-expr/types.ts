/**
 * Index expression variants
 *
 * An index expression is a scalar used in shape and loop-bound computations.
 * It is a closed tagged union; code branches on `kind`, never on classes.
 */

import type { Value } from '../ir/value.js';

/**
 * Value known at compile time
 */
export interface LiteralIndexExpr<N extends number = number> {
  readonly kind: 'literal';
  readonly value: N;
}

/**
 * Unknown at compile time; the handle may be used in any expression context
 */
export interface SymbolIndexExpr {
  readonly kind: 'symbol';
  readonly handle: Value;
}

/**
 * Unknown at compile time; the handle may only be used as a dimension or
 * loop bound
 */
export interface DimIndexExpr {
  readonly kind: 'dim';
  readonly handle: Value;
}

/**
 * Where a questionmark came from: a shaped value and one of its dimensions
 */
export interface Provenance {
  readonly source: Value;
  readonly index: number;
}

/**
 * Unknown at compile time with no usable handle
 */
export interface QuestionmarkIndexExpr {
  readonly kind: 'questionmark';
  readonly provenance?: Provenance;
}

/**
 * No such element
 */
export interface UndefinedIndexExpr {
  readonly kind: 'undefined';
}

export type IndexExpr =
  | LiteralIndexExpr
  | SymbolIndexExpr
  | DimIndexExpr
  | QuestionmarkIndexExpr
  | UndefinedIndexExpr;

export type IndexExprKind = IndexExpr['kind'];

/**
 * Index expressions backed by a runtime handle
 */
export type HandleIndexExpr = SymbolIndexExpr | DimIndexExpr;

/**
 * Every variant except undefined
 */
export type DefinedIndexExpr = Exclude<IndexExpr, UndefinedIndexExpr>;
