/**
 * Literal folding over index expressions
 *
 * Two literals fold to a literal. Anything else becomes a questionmark:
 * nothing here emits code, so a combination involving a runtime handle has
 * no handle of its own. There is no further simplification.
 */

import type { Add, Multiply, Subtract } from 'ts-arithmetic';
import { assertExhaustiveSwitch, ContractViolationError } from '../errors.js';
import { formatIndexExpr, isLiteral, isUndefined, literal, questionmark } from './index-expr.js';
import type { IndexExpr, LiteralIndexExpr } from './types.js';

// =============================================================================
// Type-level Folding
// =============================================================================

/**
 * Folded literal type, widened to number unless both operands are literal types
 */
export type Folded<A extends number, B extends number, R> = number extends A
  ? number
  : number extends B
    ? number
    : R extends number
      ? R
      : number;

export type FoldedAdd<A extends number, B extends number> = Folded<A, B, Add<A, B>>;
export type FoldedSub<A extends number, B extends number> = Folded<A, B, Subtract<A, B>>;
export type FoldedMul<A extends number, B extends number> = Folded<A, B, Multiply<A, B>>;

export type IndexExprBinaryOp =
  | 'add'
  | 'sub'
  | 'mul'
  | 'floorDiv'
  | 'ceilDiv'
  | 'mod'
  | 'min'
  | 'max';

// =============================================================================
// Runtime Folding
// =============================================================================

/**
 * Fold two integers; division and modulo round toward negative infinity
 */
export function foldLiterals(op: IndexExprBinaryOp, a: number, b: number): number {
  if ((op === 'floorDiv' || op === 'ceilDiv' || op === 'mod') && b === 0) {
    throw new ContractViolationError(`${op}: division by zero`, 'INVALID_ARGUMENT', { lhs: a });
  }

  let result: number;
  switch (op) {
    case 'add':
      result = a + b;
      break;
    case 'sub':
      result = a - b;
      break;
    case 'mul':
      result = a * b;
      break;
    case 'floorDiv':
      result = Math.floor(a / b);
      break;
    case 'ceilDiv':
      result = Math.ceil(a / b);
      break;
    case 'mod':
      result = a - b * Math.floor(a / b);
      break;
    case 'min':
      result = Math.min(a, b);
      break;
    case 'max':
      result = Math.max(a, b);
      break;
    default:
      return assertExhaustiveSwitch(op);
  }

  if (!Number.isSafeInteger(result)) {
    throw new ContractViolationError(
      `${op}: result of ${a.toString()} and ${b.toString()} is not a safe integer`,
      'INVALID_ARGUMENT',
      { lhs: a, rhs: b },
    );
  }
  // -0 from mul or mod prints and compares as 0
  return result === 0 ? 0 : result;
}

/**
 * Combine two index expressions by literal folding
 */
export function combine(op: IndexExprBinaryOp, a: IndexExpr, b: IndexExpr): IndexExpr {
  if (isUndefined(a) || isUndefined(b)) {
    throw new ContractViolationError(
      `${op}: undefined operand in ${formatIndexExpr(a)}, ${formatIndexExpr(b)}`,
      'INVALID_ARGUMENT',
    );
  }
  if (isLiteral(a) && isLiteral(b)) {
    return literal(foldLiterals(op, a.value, b.value));
  }
  return questionmark();
}

export function add<A extends number, B extends number>(
  a: LiteralIndexExpr<A>,
  b: LiteralIndexExpr<B>,
): LiteralIndexExpr<FoldedAdd<A, B>>;
export function add(a: IndexExpr, b: IndexExpr): IndexExpr;
export function add(a: IndexExpr, b: IndexExpr): IndexExpr {
  return combine('add', a, b);
}

export function sub<A extends number, B extends number>(
  a: LiteralIndexExpr<A>,
  b: LiteralIndexExpr<B>,
): LiteralIndexExpr<FoldedSub<A, B>>;
export function sub(a: IndexExpr, b: IndexExpr): IndexExpr;
export function sub(a: IndexExpr, b: IndexExpr): IndexExpr {
  return combine('sub', a, b);
}

export function mul<A extends number, B extends number>(
  a: LiteralIndexExpr<A>,
  b: LiteralIndexExpr<B>,
): LiteralIndexExpr<FoldedMul<A, B>>;
export function mul(a: IndexExpr, b: IndexExpr): IndexExpr;
export function mul(a: IndexExpr, b: IndexExpr): IndexExpr {
  return combine('mul', a, b);
}

export function floorDiv(a: IndexExpr, b: IndexExpr): IndexExpr {
  return combine('floorDiv', a, b);
}

export function ceilDiv(a: IndexExpr, b: IndexExpr): IndexExpr {
  return combine('ceilDiv', a, b);
}

export function mod(a: IndexExpr, b: IndexExpr): IndexExpr {
  return combine('mod', a, b);
}

export function min(a: IndexExpr, b: IndexExpr): IndexExpr {
  return combine('min', a, b);
}

export function max(a: IndexExpr, b: IndexExpr): IndexExpr {
  return combine('max', a, b);
}
