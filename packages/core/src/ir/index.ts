/**
 * Host IR module exports
 *
 * @module ir
 *
 * A read-only view of the compiler IR the builder inspects: shaped types with
 * possibly dynamic extents, SSA values, integer array attributes and dense
 * constant tables, plus a block that lowering appends extraction ops to.
 */

export type {
  DynamicShape,
  IntegerType,
  IndexType,
  ElementType,
  RankedTensorType,
  MemRefType,
  UnrankedTensorType,
  RankedShapedType,
  ShapedType,
  Type,
} from './types.js';

export {
  DYNAMIC_EXTENT,
  MAX_TENSOR_RANK,
  i64,
  i32,
  indexType,
  rankedTensor,
  memref,
  unrankedTensor,
  isShapedType,
  hasRank,
  isDynamicExtent,
  formatType,
} from './types.js';

export type { Operation, OperationKind, ValueOptions } from './value.js';
export { Value, formatValue, getDefiningConstant } from './value.js';

export { IntArrayAttr, DenseIntElements } from './attributes.js';

export { Block } from './block.js';
