/**
 * Contract-violation errors for the index-expression builder
 *
 * These are internal compiler errors: they signal that a caller asked for
 * something its own preconditions rule out (an unranked type, an index past
 * the rank, a static extent that is dynamic). Missing static information is
 * never reported through these classes; it is modeled by the Questionmark and
 * Undefined index expressions instead.
 */

/**
 * Machine-readable codes carried by every contract violation
 */
export type ContractViolationCode =
  | 'UNRANKED_TYPE'
  | 'RANK_OUT_OF_RANGE'
  | 'DIM_INDEX_OUT_OF_RANGE'
  | 'DYNAMIC_EXTENT'
  | 'TOO_MANY_ELEMENTS'
  | 'INVARIANT_VIOLATED'
  | 'INVALID_SHAPE'
  | 'INVALID_ARGUMENT';

/**
 * Base class for all contract violations
 */
export class ContractViolationError extends Error {
  public readonly code: ContractViolationCode;

  constructor(
    message: string,
    code: ContractViolationCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ContractViolationError';
    this.code = code;
  }

  getFormattedMessage(): string {
    let formatted = `${this.name} [${this.code}]: ${this.message}`;
    if (this.context && Object.keys(this.context).length > 0) {
      formatted += '\nContext:\n';
      for (const [key, value] of Object.entries(this.context)) {
        formatted += `  ${key}: ${String(value)}\n`;
      }
    }
    return formatted;
  }
}

/**
 * A rank-known shaped type was required
 */
export class UnrankedTypeError extends ContractViolationError {
  constructor(operation: string, context?: Record<string, unknown>) {
    super(`${operation}: expected shaped type with rank`, 'UNRANKED_TYPE', context);
    this.name = 'UnrankedTypeError';
  }
}

/**
 * The rank falls outside what the operation supports
 */
export class RankError extends ContractViolationError {
  constructor(operation: string, rank: number, expected: string) {
    super(
      `${operation}: rank ${rank.toString()} not supported, expected ${expected}`,
      'RANK_OUT_OF_RANGE',
      { rank, expected },
    );
    this.name = 'RankError';
  }
}

/**
 * A dimension index at or past the rank
 */
export class DimensionIndexError extends ContractViolationError {
  constructor(operation: string, index: number, rank: number) {
    super(
      `${operation}: dimension index ${index.toString()} out of bounds for rank ${rank.toString()}`,
      'DIM_INDEX_OUT_OF_RANGE',
      { index, rank },
    );
    this.name = 'DimensionIndexError';
  }
}

/**
 * A compile-time constant extent was required but the extent is dynamic
 */
export class DynamicExtentError extends ContractViolationError {
  constructor(operation: string, index: number) {
    super(
      `${operation}: expected compile time constant extent at dimension ${index.toString()}`,
      'DYNAMIC_EXTENT',
      { index },
    );
    this.name = 'DynamicExtentError';
  }
}

/**
 * More elements requested than the array holds
 */
export class ElementCountError extends ContractViolationError {
  constructor(operation: string, requested: number, size: number) {
    super(
      `${operation}: requesting ${requested.toString()} elements from an array of size ${size.toString()}`,
      'TOO_MANY_ELEMENTS',
      { requested, size },
    );
    this.name = 'ElementCountError';
  }
}

/**
 * A post-condition that holds by construction did not hold
 */
export class InvariantError extends ContractViolationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVARIANT_VIOLATED', context);
    this.name = 'InvariantError';
  }
}

/**
 * Check whether a caught value is a contract violation
 */
export function isContractViolation(error: unknown): error is ContractViolationError {
  return error instanceof ContractViolationError;
}

/**
 * Throw an INVALID_ARGUMENT violation unless `index` is a non-negative integer
 */
export function assertIndex(operation: string, index: number): void {
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new ContractViolationError(
      `${operation}: index ${String(index)} must be a non-negative integer`,
      'INVALID_ARGUMENT',
      { index },
    );
  }
}

/**
 * Exhaustiveness check for switches over closed unions
 *
 * @example
 * switch (op) {
 *   case 'add': ...
 *   default:
 *     return assertExhaustiveSwitch(op); // TypeScript error if cases missing
 * }
 */
export function assertExhaustiveSwitch(value: never): never {
  throw new InvariantError(`Unhandled case: ${String(value)}`);
}
