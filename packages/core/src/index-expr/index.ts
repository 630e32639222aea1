/**
 * Index expression module exports
 *
 * @module index-expr
 *
 * An index expression is one of five variants:
 * - literal: value known at compile time
 * - symbol: runtime handle usable in any expression context
 * - dim: runtime handle usable only as a dimension or loop bound
 * - questionmark: unknown, no handle (optionally with a provenance hint)
 * - undefined: no such element
 *
 * ## Common Patterns
 * ```typescript
 * // Optional trailing attribute entries
 * orDefault(undefinedExpr(), 1) // literal(1)
 *
 * // Folding
 * add(literal(2), literal(3)) // literal(5)
 * add(literal(2), symbol(n))  // questionmark()
 * ```
 */

export type {
  LiteralIndexExpr,
  SymbolIndexExpr,
  DimIndexExpr,
  QuestionmarkIndexExpr,
  UndefinedIndexExpr,
  IndexExpr,
  IndexExprKind,
  HandleIndexExpr,
  DefinedIndexExpr,
  Provenance,
} from './types.js';

export {
  literal,
  symbol,
  dim,
  questionmark,
  undefinedExpr,
  isLiteral,
  isSymbol,
  isDim,
  isQuestionmark,
  isUndefined,
  isDefined,
  hasHandle,
  isAffineUsable,
  getLiteral,
  getHandle,
  asSymbol,
  asDim,
  orDefault,
  sameIndexExpr,
  formatIndexExpr,
} from './index-expr.js';

export type {
  Folded,
  FoldedAdd,
  FoldedSub,
  FoldedMul,
  IndexExprBinaryOp,
} from './arithmetic.js';

export {
  foldLiterals,
  combine,
  add,
  sub,
  mul,
  floorDiv,
  ceilDiv,
  mod,
  min,
  max,
} from './arithmetic.js';

export { IndexExprList, isLiteralList, literalsOf, formatIndexExprList } from './list.js';
