/**
 * Capabilities through which the builder reads the surrounding IR
 *
 * Each accessor may decline by returning undefined. The builder turns a
 * declined constant into a handle lookup, and a declined handle into a
 * questionmark.
 */

import type { DenseIntElements } from '../ir/attributes.js';
import type { Block } from '../ir/block.js';
import { hasRank } from '../ir/types.js';
import { getDefiningConstant, type Value } from '../ir/value.js';

export interface IndexExprAccessors {
  /** Full literal table of an array value, if the IR proves it constant */
  getConst(arrayValue: Value): DenseIntElements | undefined;
  /** Handle to element `i` of a scalar or 1-D array value */
  getVal(arrayValue: Value, i: number): Value | undefined;
  /** Handle to the runtime extent of dimension `i` of a shaped value */
  getShapeVal(shapedValue: Value, i: number): Value | undefined;
}

/**
 * Accessors for shape analysis: constants are read, nothing is materialized
 */
export const analysisAccessors: IndexExprAccessors = {
  getConst: getDefiningConstant,
  getVal: () => undefined,
  getShapeVal: () => undefined,
};

/**
 * Accessors for lowering: unknown elements and extents become
 * `extract_element` and `dim` operations appended to `block`
 */
export function createMaterializingAccessors(block: Block): IndexExprAccessors {
  return {
    getConst: getDefiningConstant,
    getVal(arrayValue, i) {
      const type = arrayValue.type;
      if (!hasRank(type)) {
        return undefined;
      }
      return block.extractElement(arrayValue, type.shape.length === 0 ? [] : [i]);
    },
    getShapeVal(shapedValue, i) {
      return block.dimOf(shapedValue, i);
    },
  };
}
