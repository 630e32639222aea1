/**
 * IR fixtures and scripted accessors shared by the test suites
 */

import type { DynamicShape, IndexExprAccessors, Value } from '@dimexpr/core';
import { Block, DenseIntElements, indexType, memref, rankedTensor } from '@dimexpr/core';

/**
 * Block argument of tensor (default) or memref type
 */
export function shapedArgument(
  shape: DynamicShape,
  name?: string,
  kind: 'tensor' | 'memref' = 'tensor',
): Value {
  const type = kind === 'tensor' ? rankedTensor(shape) : memref(shape);
  return new Block().addArgument(type, name);
}

/**
 * Value defined by a constant operation: a 1-D array, or a rank-0 scalar
 * when `scalar` is set (then `values` must hold one element)
 */
export function constantArray(
  values: readonly number[],
  options: { name?: string; scalar?: boolean } = {},
): Value {
  const shape = options.scalar === true ? [] : [values.length];
  return new Block().constant(new DenseIntElements(values), rankedTensor(shape), options.name);
}

/**
 * Fresh index-typed value standing in for a materialized handle
 */
export function handle(name: string): Value {
  return new Block().addArgument(indexType, name);
}

export interface ScriptedAccessorsConfig {
  constants?: ReadonlyMap<Value, DenseIntElements>;
  elements?: (arrayValue: Value, i: number) => Value | undefined;
  extents?: (shapedValue: Value, i: number) => Value | undefined;
}

export interface AccessorCallLog {
  getConst: Value[];
  getVal: [Value, number][];
  getShapeVal: [Value, number][];
}

/**
 * Accessors answering from a script and recording every call
 *
 * @example
 * const n = handle('n');
 * const { accessors, calls } = scriptedAccessors({ extents: () => n });
 */
export function scriptedAccessors(config: ScriptedAccessorsConfig = {}): {
  accessors: IndexExprAccessors;
  calls: AccessorCallLog;
} {
  const calls: AccessorCallLog = { getConst: [], getVal: [], getShapeVal: [] };
  const accessors: IndexExprAccessors = {
    getConst(arrayValue) {
      calls.getConst.push(arrayValue);
      return config.constants?.get(arrayValue);
    },
    getVal(arrayValue, i) {
      calls.getVal.push([arrayValue, i]);
      return config.elements?.(arrayValue, i);
    },
    getShapeVal(shapedValue, i) {
      calls.getShapeVal.push([shapedValue, i]);
      return config.extents?.(shapedValue, i);
    },
  };
  return { accessors, calls };
}
