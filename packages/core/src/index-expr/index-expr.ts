/**
 * Constructors, predicates and queries for index expressions
 */

import { ContractViolationError } from '../errors.js';
import { formatValue, type Value } from '../ir/value.js';
import type {
  DefinedIndexExpr,
  DimIndexExpr,
  HandleIndexExpr,
  IndexExpr,
  LiteralIndexExpr,
  Provenance,
  QuestionmarkIndexExpr,
  SymbolIndexExpr,
  UndefinedIndexExpr,
} from './types.js';

// =============================================================================
// Constructors
// =============================================================================

/**
 * Create a literal index expression
 *
 * @example
 * const four = literal(4); // LiteralIndexExpr<4>
 */
export function literal<N extends number>(value: N): LiteralIndexExpr<N> {
  if (!Number.isSafeInteger(value)) {
    throw new ContractViolationError(
      `Literal index expression requires a safe integer, got ${String(value)}`,
      'INVALID_ARGUMENT',
      { value },
    );
  }
  return { kind: 'literal', value };
}

export function symbol(handle: Value): SymbolIndexExpr {
  return { kind: 'symbol', handle };
}

export function dim(handle: Value): DimIndexExpr {
  return { kind: 'dim', handle };
}

export function questionmark(provenance?: Provenance): QuestionmarkIndexExpr {
  if (provenance !== undefined) {
    return {
      kind: 'questionmark',
      provenance: { source: provenance.source, index: provenance.index },
    };
  } else {
    return { kind: 'questionmark' };
  }
}

const UNDEFINED: UndefinedIndexExpr = { kind: 'undefined' };

export function undefinedExpr(): UndefinedIndexExpr {
  return UNDEFINED;
}

// =============================================================================
// Predicates
// =============================================================================

export function isLiteral(expr: IndexExpr): expr is LiteralIndexExpr {
  return expr.kind === 'literal';
}

export function isSymbol(expr: IndexExpr): expr is SymbolIndexExpr {
  return expr.kind === 'symbol';
}

export function isDim(expr: IndexExpr): expr is DimIndexExpr {
  return expr.kind === 'dim';
}

export function isQuestionmark(expr: IndexExpr): expr is QuestionmarkIndexExpr {
  return expr.kind === 'questionmark';
}

export function isUndefined(expr: IndexExpr): expr is UndefinedIndexExpr {
  return expr.kind === 'undefined';
}

export function isDefined(expr: IndexExpr): expr is DefinedIndexExpr {
  return expr.kind !== 'undefined';
}

export function hasHandle(expr: IndexExpr): expr is HandleIndexExpr {
  return expr.kind === 'symbol' || expr.kind === 'dim';
}

/**
 * Whether an affine-expression builder can consume the expression directly
 */
export function isAffineUsable(expr: IndexExpr): expr is LiteralIndexExpr | HandleIndexExpr {
  return isLiteral(expr) || hasHandle(expr);
}

// =============================================================================
// Queries
// =============================================================================

export function getLiteral(expr: IndexExpr): number {
  if (!isLiteral(expr)) {
    throw new ContractViolationError(
      `Expected a literal index expression, got ${formatIndexExpr(expr)}`,
      'INVALID_ARGUMENT',
      { kind: expr.kind },
    );
  }
  return expr.value;
}

export function getHandle(expr: IndexExpr): Value {
  if (!hasHandle(expr)) {
    throw new ContractViolationError(
      `Expected a symbol or dim index expression, got ${formatIndexExpr(expr)}`,
      'INVALID_ARGUMENT',
      { kind: expr.kind },
    );
  }
  return expr.handle;
}

// =============================================================================
// Coercions
// =============================================================================

/**
 * Widen a dim to a symbol over the same handle; other variants pass through
 */
export function asSymbol(expr: IndexExpr): IndexExpr {
  return isDim(expr) ? symbol(expr.handle) : expr;
}

/**
 * Narrow a symbol to a dim over the same handle; other variants pass through
 */
export function asDim(expr: IndexExpr): IndexExpr {
  return isSymbol(expr) ? dim(expr.handle) : expr;
}

/**
 * Replace an undefined expression by a literal default
 */
export function orDefault(expr: IndexExpr, defaultValue: number): DefinedIndexExpr {
  return isUndefined(expr) ? literal(defaultValue) : expr;
}

// =============================================================================
// Comparison and Formatting
// =============================================================================

/**
 * Structural equality: same variant and same payload, handles by identity
 */
export function sameIndexExpr(a: IndexExpr, b: IndexExpr): boolean {
  switch (a.kind) {
    case 'literal':
      return b.kind === 'literal' && a.value === b.value;
    case 'symbol':
      return b.kind === 'symbol' && a.handle === b.handle;
    case 'dim':
      return b.kind === 'dim' && a.handle === b.handle;
    case 'questionmark': {
      if (b.kind !== 'questionmark') {
        return false;
      }
      if (a.provenance === undefined || b.provenance === undefined) {
        return a.provenance === b.provenance;
      }
      return a.provenance.source === b.provenance.source && a.provenance.index === b.provenance.index;
    }
    case 'undefined':
      return b.kind === 'undefined';
  }
}

/**
 * Render an index expression for diagnostics
 *
 * @example
 * formatIndexExpr(literal(4)); // '4'
 * formatIndexExpr(questionmark({ source: x, index: 1 })); // '?(%x[1])'
 */
export function formatIndexExpr(expr: IndexExpr): string {
  switch (expr.kind) {
    case 'literal':
      return expr.value.toString();
    case 'symbol':
      return `sym(${formatValue(expr.handle)})`;
    case 'dim':
      return `dim(${formatValue(expr.handle)})`;
    case 'questionmark':
      return expr.provenance === undefined
        ? '?'
        : `?(${formatValue(expr.provenance.source)}[${expr.provenance.index.toString()}])`;
    case 'undefined':
      return 'undef';
  }
}
