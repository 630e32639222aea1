import { describe, it, expect } from 'vitest';
import {
  ContractViolationError,
  DimensionIndexError,
  DynamicExtentError,
  ElementCountError,
  InvariantError,
  RankError,
  UnrankedTypeError,
  assertIndex,
  isContractViolation,
} from './errors.js';

describe('ContractViolationError', () => {
  it('should carry code and context', () => {
    const error = new ContractViolationError('bad input', 'INVALID_ARGUMENT', { index: -1 });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ContractViolationError');
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.context).toEqual({ index: -1 });
  });

  it('should format message and context', () => {
    const error = new DimensionIndexError('getShape', 5, 3);
    expect(error.getFormattedMessage()).toBe(
      'DimensionIndexError [DIM_INDEX_OUT_OF_RANGE]: getShape: dimension index 5 out of bounds for rank 3\n' +
        'Context:\n' +
        '  index: 5\n' +
        '  rank: 3\n',
    );
  });

  it('should omit an empty context', () => {
    expect(new InvariantError('broken').getFormattedMessage()).toBe(
      'InvariantError [INVARIANT_VIOLATED]: broken',
    );
  });
});

describe('Contract violation subclasses', () => {
  it('should assign a code to each violated precondition', () => {
    const errors: ContractViolationError[] = [
      new UnrankedTypeError('getTypeRank'),
      new RankError('getIntArraySize', 2, '0 or 1'),
      new DimensionIndexError('getShape', 3, 3),
      new DynamicExtentError('getShapeAsLiteral', 1),
      new ElementCountError('getIntArrayAsSymbols', 4, 2),
      new InvariantError('broken'),
    ];
    expect(errors.map((e) => e.code)).toEqual([
      'UNRANKED_TYPE',
      'RANK_OUT_OF_RANGE',
      'DIM_INDEX_OUT_OF_RANGE',
      'DYNAMIC_EXTENT',
      'TOO_MANY_ELEMENTS',
      'INVARIANT_VIOLATED',
    ]);
    expect(errors.every(isContractViolation)).toBe(true);
  });

  it('should describe the request in the message', () => {
    expect(new ElementCountError('getIntArrayAsSymbols', 4, 2).message).toBe(
      'getIntArrayAsSymbols: requesting 4 elements from an array of size 2',
    );
  });
});

describe('isContractViolation', () => {
  it('should reject other errors and values', () => {
    expect(isContractViolation(new Error('x'))).toBe(false);
    expect(isContractViolation('x')).toBe(false);
  });
});

describe('assertIndex', () => {
  it('should accept non-negative integers', () => {
    expect(() => assertIndex('op', 0)).not.toThrow();
    expect(() => assertIndex('op', 7)).not.toThrow();
  });

  it('should reject negative and fractional indices', () => {
    expect(() => assertIndex('op', -1)).toThrow('op: index -1 must be a non-negative integer');
    expect(() => assertIndex('op', 0.5)).toThrow(ContractViolationError);
  });
});
