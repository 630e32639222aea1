/**
 * SSA values and the operations that define them
 */

import type { DenseIntElements } from './attributes.js';
import type { Type } from './types.js';

/**
 * Operations the builder knows how to look through or materialize
 */
export type Operation =
  | { readonly kind: 'constant'; readonly value: DenseIntElements }
  | { readonly kind: 'extract_element'; readonly source: Value; readonly indices: readonly number[] }
  | { readonly kind: 'dim'; readonly source: Value; readonly index: number };

export type OperationKind = Operation['kind'];

export interface ValueOptions {
  readonly name?: string;
  readonly definingOp?: Operation;
}

let nextValueId = 0;

/**
 * Opaque handle to a runtime value of the host IR
 *
 * Values are compared by identity. A value without a defining operation is a
 * block argument.
 */
export class Value {
  readonly id: number;
  readonly type: Type;
  readonly name: string | undefined;
  readonly definingOp: Operation | undefined;

  constructor(type: Type, options: ValueOptions = {}) {
    this.id = nextValueId++;
    this.type = type;
    this.name = options.name;
    this.definingOp = options.definingOp;
  }

  get isBlockArgument(): boolean {
    return this.definingOp === undefined;
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * Print a value reference as `%name`, or `%id` when it has no name
 */
export function formatValue(value: Value): string {
  return `%${value.name ?? value.id.toString()}`;
}

/**
 * Dense table of a value defined by a constant operation, if it is one
 */
export function getDefiningConstant(value: Value): DenseIntElements | undefined {
  const op = value.definingOp;
  return op?.kind === 'constant' ? op.value : undefined;
}
