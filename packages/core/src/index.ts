export * from './index-expr/index.js';
export * from './ir/index.js';
export * from './builder/index.js';
export {
  ContractViolationError,
  UnrankedTypeError,
  RankError,
  DimensionIndexError,
  DynamicExtentError,
  ElementCountError,
  InvariantError,
  isContractViolation,
  assertIndex,
  assertExhaustiveSwitch,
} from './errors.js';
export type { ContractViolationCode } from './errors.js';
