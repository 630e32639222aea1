/**
 * Index-expression builder
 *
 * Turns integer array attributes, scalar or 1-D integer array values, and the
 * shapes of tensors and memrefs into index expressions, always choosing the
 * most informative representation the IR supports:
 *
 * 1. a literal when the quantity is a compile-time constant,
 * 2. otherwise a symbol or dim wrapping a runtime handle from the accessors,
 * 3. otherwise a questionmark.
 *
 * Asking past the end of an array or attribute returns an undefined
 * expression. Rank and index mismatches are contract violations and throw.
 */

import {
  assertIndex,
  ContractViolationError,
  DimensionIndexError,
  DynamicExtentError,
  ElementCountError,
  InvariantError,
  RankError,
  UnrankedTypeError,
} from '../errors.js';
import {
  dim,
  formatIndexExpr,
  isUndefined,
  literal,
  orDefault,
  questionmark,
  symbol,
  undefinedExpr,
} from '../index-expr/index-expr.js';
import { IndexExprList } from '../index-expr/list.js';
import type { DefinedIndexExpr, IndexExpr } from '../index-expr/types.js';
import type { IntArrayAttr } from '../ir/attributes.js';
import {
  formatType,
  hasRank,
  isDynamicExtent,
  isShapedType,
  type RankedShapedType,
} from '../ir/types.js';
import { formatValue, type Value } from '../ir/value.js';
import type { IndexExprAccessors } from './accessors.js';
import {
  resolveBuilderOptions,
  type IndexExprBuilderOptions,
  type ResolvedBuilderOptions,
} from './options.js';

/**
 * Pass as `len` to take every element of an array
 */
export const ALL_ELEMENTS = -1;

export class IndexExprBuilder {
  readonly options: ResolvedBuilderOptions;

  constructor(
    private readonly accessors: IndexExprAccessors,
    options: IndexExprBuilderOptions = {},
  ) {
    this.options = resolveBuilderOptions(options);
  }

  // ===========================================================================
  // Integer array attributes
  // ===========================================================================

  getIntArrayAttrSize(attr: IntArrayAttr): number {
    return attr.size;
  }

  /**
   * Element `i` as a literal; undefined past the end, or the literal
   * `defaultValue` when one is given
   */
  getIntArrayAttrAsLiteral(attr: IntArrayAttr, i: number): IndexExpr;
  getIntArrayAttrAsLiteral(attr: IntArrayAttr, i: number, defaultValue: number): DefinedIndexExpr;
  getIntArrayAttrAsLiteral(attr: IntArrayAttr, i: number, defaultValue?: number): IndexExpr {
    assertIndex('getIntArrayAttrAsLiteral', i);
    const value = attr.at(i);
    const expr = value === undefined ? undefinedExpr() : literal(value);
    return defaultValue === undefined ? expr : orDefault(expr, defaultValue);
  }

  // ===========================================================================
  // Rank
  // ===========================================================================

  /**
   * Rank of a ranked shaped value; 0 for a scalar
   */
  getTypeRank(value: Value): number {
    return this.rankedType(value, 'getTypeRank').shape.length;
  }

  // ===========================================================================
  // Scalar or 1-D integer array values
  // ===========================================================================

  /**
   * Number of elements of a scalar (1) or of a 1-D array with static length
   */
  getIntArraySize(value: Value): number {
    const type = this.rankedType(value, 'getIntArraySize');
    const rank = type.shape.length;
    if (rank >= 2) {
      throw new RankError('getIntArraySize', rank, 'a scalar or a 1 dimension array of int values');
    }
    if (rank === 0) {
      return 1;
    }
    const length = type.shape[0];
    if (length === undefined || isDynamicExtent(length)) {
      throw new DynamicExtentError('getIntArraySize', 0);
    }
    return length;
  }

  /**
   * Element `i` as a literal if the array is constant, else as a symbol if a
   * handle can be had, else as a questionmark; undefined past the end, or the
   * literal `defaultValue` when one is given
   */
  getIntArrayAsSymbol(value: Value, i: number): IndexExpr;
  getIntArrayAsSymbol(value: Value, i: number, defaultValue: number): DefinedIndexExpr;
  getIntArrayAsSymbol(value: Value, i: number, defaultValue?: number): IndexExpr {
    const expr = this.intArrayElement(value, i);
    return defaultValue === undefined ? expr : orDefault(expr, defaultValue);
  }

  /**
   * Fill `list` with the first `len` elements, or all of them for ALL_ELEMENTS
   */
  getIntArrayAsSymbols(value: Value, list = new IndexExprList(), len: number = ALL_ELEMENTS): IndexExprList {
    list.clear();
    const size = this.getIntArraySize(value);
    let count = size;
    if (len !== ALL_ELEMENTS) {
      if (!Number.isSafeInteger(len) || len < 0) {
        throw new ContractViolationError(
          `getIntArrayAsSymbols: length ${String(len)} must be a non-negative integer or ${ALL_ELEMENTS.toString()}`,
          'INVALID_ARGUMENT',
          { len },
        );
      }
      if (len > size) {
        throw new ElementCountError('getIntArrayAsSymbols', len, size);
      }
      count = len;
    }

    for (let i = 0; i < count; i++) {
      const expr = this.intArrayElement(value, i);
      if (isUndefined(expr)) {
        throw new InvariantError(
          `getIntArrayAsSymbols: expected defined index expr at position ${i.toString()}`,
          { value: formatValue(value), position: i, size },
        );
      }
      list.push(expr);
    }
    return list;
  }

  // ===========================================================================
  // Shapes of tensors and memrefs
  // ===========================================================================

  /**
   * Whether dimension `i`, or every dimension when `i` is omitted, has a
   * static extent
   */
  isLiteralShape(value: Value, i?: number): boolean {
    if (i !== undefined) {
      return !isDynamicExtent(this.getShape(value, i));
    }
    const rank = this.getTypeRank(value);
    for (let d = 0; d < rank; d++) {
      if (!this.isLiteralShape(value, d)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Static extent of dimension `i`, or DYNAMIC_EXTENT
   */
  getShape(value: Value, i: number): number {
    assertIndex('getShape', i);
    const type = this.rankedType(value, 'getShape');
    const extent = type.shape[i];
    if (extent === undefined) {
      throw new DimensionIndexError('getShape', i, type.shape.length);
    }
    return extent;
  }

  getShapeAsLiteral(value: Value, i: number): IndexExpr {
    const extent = this.getShape(value, i);
    if (isDynamicExtent(extent)) {
      throw new DynamicExtentError('getShapeAsLiteral', i);
    }
    return literal(extent);
  }

  /**
   * Extent of dimension `i` as a literal, else a symbol, else a questionmark
   * pointing back at the dimension
   */
  getShapeAsSymbol(value: Value, i: number): IndexExpr {
    return this.shapeElement(value, i, symbol, 'getShapeAsSymbol');
  }

  /**
   * Extent of dimension `i` as a literal, else a dim, else a questionmark
   * pointing back at the dimension
   */
  getShapeAsDim(value: Value, i: number): IndexExpr {
    return this.shapeElement(value, i, dim, 'getShapeAsDim');
  }

  getShapeAsLiterals(value: Value, list = new IndexExprList()): IndexExprList {
    return this.fillShape(value, list, (d) => this.getShapeAsLiteral(value, d));
  }

  getShapeAsSymbols(value: Value, list = new IndexExprList()): IndexExprList {
    return this.fillShape(value, list, (d) => this.getShapeAsSymbol(value, d));
  }

  getShapeAsDims(value: Value, list = new IndexExprList()): IndexExprList {
    return this.fillShape(value, list, (d) => this.getShapeAsDim(value, d));
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private rankedType(value: Value, operation: string): RankedShapedType {
    const type = value.type;
    if (!isShapedType(type)) {
      throw new ContractViolationError(
        `${operation}: expected shaped type, got ${formatType(type)}`,
        'INVALID_ARGUMENT',
        { value: formatValue(value), type: formatType(type) },
      );
    }
    if (!hasRank(type)) {
      throw new UnrankedTypeError(operation, { value: formatValue(value), type: formatType(type) });
    }
    const rank = type.shape.length;
    if (rank > this.options.maxRank) {
      throw new RankError(operation, rank, `at most ${this.options.maxRank.toString()}`);
    }
    return type;
  }

  private intArrayElement(value: Value, i: number): IndexExpr {
    assertIndex('getIntArrayAsSymbol', i);
    const size = this.getIntArraySize(value);
    if (i >= size) {
      return undefinedExpr();
    }

    const table = this.accessors.getConst(value);
    if (table !== undefined) {
      const expr = literal(table.at(i));
      this.debug(`${formatValue(value)}[${i.toString()}]: constant ${formatIndexExpr(expr)}`, {
        value: formatValue(value),
        index: i,
      });
      return expr;
    }

    const handle = this.accessors.getVal(value, i);
    if (handle !== undefined) {
      this.debug(`${formatValue(value)}[${i.toString()}]: handle ${formatValue(handle)}`, {
        value: formatValue(value),
        index: i,
      });
      return symbol(handle);
    }

    this.debug(`${formatValue(value)}[${i.toString()}]: no handle, questionmark`, {
      value: formatValue(value),
      index: i,
    });
    return questionmark();
  }

  private shapeElement(
    value: Value,
    i: number,
    wrap: (handle: Value) => IndexExpr,
    operation: string,
  ): IndexExpr {
    if (this.isLiteralShape(value, i)) {
      return this.getShapeAsLiteral(value, i);
    }

    const handle = this.accessors.getShapeVal(value, i);
    if (handle !== undefined) {
      const expr = wrap(handle);
      this.debug(`${operation} ${formatValue(value)} dim ${i.toString()}: ${formatIndexExpr(expr)}`, {
        value: formatValue(value),
        index: i,
      });
      return expr;
    }

    this.debug(`${operation} ${formatValue(value)} dim ${i.toString()}: no handle, questionmark`, {
      value: formatValue(value),
      index: i,
    });
    return questionmark({ source: value, index: i });
  }

  private fillShape(
    value: Value,
    list: IndexExprList,
    extract: (d: number) => IndexExpr,
  ): IndexExprList {
    list.clear();
    const rank = this.getTypeRank(value);
    for (let d = 0; d < rank; d++) {
      list.push(extract(d));
    }
    return list;
  }

  private debug(message: string, context: Record<string, unknown>): void {
    if (this.options.debug) {
      this.options.logger(message, context);
    }
  }
}
