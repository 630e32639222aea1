/**
 * Ordered sequences of index expressions
 *
 * Position i always describes array element i or tensor dimension i, so the
 * list offers appends and a full reset but no way to reorder or splice.
 */

import { ContractViolationError } from '../errors.js';
import { formatIndexExpr, isLiteral } from './index-expr.js';
import type { IndexExpr } from './types.js';

export class IndexExprList implements Iterable<IndexExpr> {
  private items: IndexExpr[] = [];

  constructor(items: Iterable<IndexExpr> = []) {
    this.fill(items);
  }

  get length(): number {
    return this.items.length;
  }

  at(i: number): IndexExpr | undefined {
    return this.items[i];
  }

  push(expr: IndexExpr): void {
    this.items.push(expr);
  }

  clear(): void {
    this.items = [];
  }

  /**
   * Replace the contents; prior entries are discarded first
   */
  fill(items: Iterable<IndexExpr>): void {
    // read `items` in full first: it may be this list
    this.items = [...items];
  }

  toArray(): IndexExpr[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<IndexExpr> {
    return this.items[Symbol.iterator]();
  }

  toString(): string {
    return formatIndexExprList(this);
  }
}

export function isLiteralList(list: Iterable<IndexExpr>): boolean {
  for (const expr of list) {
    if (!isLiteral(expr)) {
      return false;
    }
  }
  return true;
}

/**
 * Integer values of an all-literal list
 */
export function literalsOf(list: Iterable<IndexExpr>): number[] {
  const values: number[] = [];
  let position = 0;
  for (const expr of list) {
    if (!isLiteral(expr)) {
      throw new ContractViolationError(
        `Expected literal at position ${position.toString()}, got ${formatIndexExpr(expr)}`,
        'INVALID_ARGUMENT',
        { position },
      );
    }
    values.push(expr.value);
    position++;
  }
  return values;
}

/**
 * @example
 * formatIndexExprList(list); // '[2, sym(%n), 4]'
 */
export function formatIndexExprList(list: Iterable<IndexExpr>): string {
  return `[${Array.from(list, formatIndexExpr).join(', ')}]`;
}
