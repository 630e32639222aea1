/**
 * Type system of the host IR
 *
 * Only the parts the index-expression builder reads are modeled: integer
 * and index element types, and shaped types whose per-dimension extents are
 * either known or the dynamic sentinel.
 */

import { ContractViolationError } from '../errors.js';

// =============================================================================
// Configuration and Constants
// =============================================================================

/**
 * Extent marker for a dimension whose size is not known at compile time
 */
export const DYNAMIC_EXTENT = -1;

/**
 * Maximum rank (number of dimensions) of a shaped type
 */
export const MAX_TENSOR_RANK = 8;

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * Shape with possibly dynamic dimensions, -1 marking an unknown extent
 */
export type DynamicShape = readonly number[];

export interface IntegerType {
  readonly kind: 'integer';
  readonly width: number;
}

export interface IndexType {
  readonly kind: 'index';
}

export type ElementType = IntegerType | IndexType;

export interface RankedTensorType {
  readonly kind: 'tensor';
  readonly shape: DynamicShape;
  readonly elementType: ElementType;
}

export interface MemRefType {
  readonly kind: 'memref';
  readonly shape: DynamicShape;
  readonly elementType: ElementType;
}

export interface UnrankedTensorType {
  readonly kind: 'unranked_tensor';
  readonly elementType: ElementType;
}

export type RankedShapedType = RankedTensorType | MemRefType;

export type ShapedType = RankedShapedType | UnrankedTensorType;

export type Type = ElementType | ShapedType;

// =============================================================================
// Constructors
// =============================================================================

export const i64: IntegerType = { kind: 'integer', width: 64 };

export const i32: IntegerType = { kind: 'integer', width: 32 };

export const indexType: IndexType = { kind: 'index' };

/**
 * Create a ranked tensor type
 *
 * @example
 * const t = rankedTensor([2, DYNAMIC_EXTENT, 4]); // tensor<2x?x4xi64>
 */
export function rankedTensor(shape: DynamicShape, elementType: ElementType = i64): RankedTensorType {
  validateShape(shape);
  return { kind: 'tensor', shape: [...shape], elementType };
}

/**
 * Create a memref type
 */
export function memref(shape: DynamicShape, elementType: ElementType = i64): MemRefType {
  validateShape(shape);
  return { kind: 'memref', shape: [...shape], elementType };
}

export function unrankedTensor(elementType: ElementType = i64): UnrankedTensorType {
  return { kind: 'unranked_tensor', elementType };
}

// =============================================================================
// Type Queries
// =============================================================================

export function isShapedType(type: Type): type is ShapedType {
  return type.kind === 'tensor' || type.kind === 'memref' || type.kind === 'unranked_tensor';
}

export function hasRank(type: Type): type is RankedShapedType {
  return type.kind === 'tensor' || type.kind === 'memref';
}

export function isDynamicExtent(extent: number): boolean {
  return extent === DYNAMIC_EXTENT;
}

/**
 * Render a type in the usual textual IR notation
 *
 * @example
 * formatType(rankedTensor([2, -1])); // 'tensor<2x?xi64>'
 */
export function formatType(type: Type): string {
  switch (type.kind) {
    case 'integer':
      return `i${type.width.toString()}`;
    case 'index':
      return 'index';
    case 'unranked_tensor':
      return `tensor<*x${formatType(type.elementType)}>`;
    case 'tensor':
    case 'memref': {
      const dims = type.shape.map((extent) => (isDynamicExtent(extent) ? '?' : extent.toString()));
      return `${type.kind}<${[...dims, formatType(type.elementType)].join('x')}>`;
    }
  }
}

/**
 * Validate a shape: bounded rank, each extent a non-negative integer or dynamic
 */
function validateShape(shape: DynamicShape): void {
  if (shape.length > MAX_TENSOR_RANK) {
    throw new ContractViolationError(
      `Tensor rank ${shape.length.toString()} exceeds maximum supported rank of ${MAX_TENSOR_RANK.toString()}`,
      'INVALID_SHAPE',
      { rank: shape.length },
    );
  }

  for (let i = 0; i < shape.length; i++) {
    const extent = shape[i];
    if (extent === undefined) {
      throw new ContractViolationError(`Dimension at index ${i.toString()} is undefined`, 'INVALID_SHAPE');
    }
    if (!Number.isSafeInteger(extent) || (extent < 0 && !isDynamicExtent(extent))) {
      throw new ContractViolationError(
        `Invalid extent ${extent.toString()} at index ${i.toString()}: extents must be non-negative integers or ${DYNAMIC_EXTENT.toString()}`,
        'INVALID_SHAPE',
        { index: i, extent },
      );
    }
  }
}
