/**
 * Append-only operation list
 *
 * Lowering passes materialize element and dimension extractions here; shape
 * analysis never touches a block.
 */

import type { DenseIntElements } from './attributes.js';
import { ContractViolationError } from '../errors.js';
import { formatType, hasRank, indexType, isShapedType, type Type } from './types.js';
import { Value, type Operation } from './value.js';

export class Block {
  private readonly args: Value[] = [];
  private readonly results: Value[] = [];

  get arguments(): readonly Value[] {
    return this.args;
  }

  get operations(): readonly Operation[] {
    return this.results.flatMap((value) => (value.definingOp ? [value.definingOp] : []));
  }

  /**
   * Values produced by operations, in program order
   */
  get values(): readonly Value[] {
    return this.results;
  }

  addArgument(type: Type, name?: string): Value {
    const value = name === undefined ? new Value(type) : new Value(type, { name });
    this.args.push(value);
    return value;
  }

  /**
   * Constant scalar or 1-D array; the table holds one entry per element, or a
   * single splat entry
   */
  constant(table: DenseIntElements, type: Type, name?: string): Value {
    if (!hasRank(type) || type.shape.length > 1) {
      throw new ContractViolationError(
        `constant: expected a scalar or 1-D array type, got ${formatType(type)}`,
        'INVALID_SHAPE',
        { type: formatType(type) },
      );
    }
    // a scalar holds one element
    const length = type.shape[0] ?? 1;
    if (table.size !== 1 && table.size !== length) {
      throw new ContractViolationError(
        `constant: table of ${table.size.toString()} elements does not fit ${formatType(type)}`,
        'INVALID_SHAPE',
        { size: table.size, type: formatType(type) },
      );
    }
    return this.append(type, { kind: 'constant', value: table }, name);
  }

  /**
   * Extract one element of a scalar or 1-D array; a scalar takes no index
   */
  extractElement(source: Value, indices: readonly number[]): Value {
    const type = source.type;
    if (!hasRank(type)) {
      throw new ContractViolationError(
        'extract_element: expected ranked source',
        'UNRANKED_TYPE',
        { source: source.toString() },
      );
    }
    if (indices.length !== type.shape.length) {
      throw new ContractViolationError(
        `extract_element: expected ${type.shape.length.toString()} indices, got ${indices.length.toString()}`,
        'INVALID_ARGUMENT',
      );
    }
    return this.append(type.elementType, { kind: 'extract_element', source, indices: [...indices] });
  }

  /**
   * Runtime extent of dimension `index` of a shaped value
   */
  dimOf(source: Value, index: number): Value {
    if (!isShapedType(source.type)) {
      throw new ContractViolationError('dim: expected shaped source', 'INVALID_ARGUMENT', {
        source: source.toString(),
      });
    }
    return this.append(indexType, { kind: 'dim', source, index });
  }

  private append(type: Type, op: Operation, name?: string): Value {
    const value =
      name === undefined ? new Value(type, { definingOp: op }) : new Value(type, { name, definingOp: op });
    this.results.push(value);
    return value;
  }
}
