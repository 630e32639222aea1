/**
 * Compile-time integer data: array attributes and dense constant tables
 */

import { ContractViolationError } from '../errors.js';

function validateIntegers(owner: string, values: readonly number[]): void {
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (value === undefined || !Number.isSafeInteger(value)) {
      throw new ContractViolationError(
        `${owner}: element ${String(value)} at index ${i.toString()} is not a safe integer`,
        'INVALID_ARGUMENT',
        { index: i },
      );
    }
  }
}

/**
 * Read-only compile-time array of integers, e.g. the `strides` or `pads`
 * attribute of a convolution
 */
export class IntArrayAttr {
  readonly values: readonly number[];

  constructor(values: readonly number[]) {
    validateIntegers('IntArrayAttr', values);
    this.values = [...values];
  }

  get size(): number {
    return this.values.length;
  }

  /**
   * Element at `i`, or undefined past the end
   */
  at(i: number): number | undefined {
    return this.values[i];
  }

  toString(): string {
    return `[${this.values.join(', ')}]`;
  }
}

/**
 * Dense literal table of a constant scalar or 1-D integer array
 *
 * A table holding exactly one value is a splat: every position reads it. An
 * empty table describes a zero-length array.
 */
export class DenseIntElements {
  readonly values: readonly number[];

  constructor(values: readonly number[]) {
    validateIntegers('DenseIntElements', values);
    this.values = [...values];
  }

  get isSplat(): boolean {
    return this.values.length === 1;
  }

  get size(): number {
    return this.values.length;
  }

  at(i: number): number {
    const value = this.isSplat ? this.values[0] : this.values[i];
    if (value === undefined) {
      throw new ContractViolationError(
        `DenseIntElements: index ${i.toString()} out of bounds for ${this.values.length.toString()} elements`,
        'INVALID_ARGUMENT',
        { index: i, size: this.values.length },
      );
    }
    return value;
  }
}
