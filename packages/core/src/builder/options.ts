/**
 * Builder configuration and debug logging
 */

import { ContractViolationError } from '../errors.js';
import { MAX_TENSOR_RANK } from '../ir/types.js';

export type DebugLogger = (message: string, context?: Record<string, unknown>) => void;

export interface IndexExprBuilderOptions {
  /** Log each representation decision the builder makes */
  debug?: boolean;
  logger?: DebugLogger;
  /** Largest rank the builder accepts; defaults to MAX_TENSOR_RANK */
  maxRank?: number;
}

export interface ResolvedBuilderOptions {
  readonly debug: boolean;
  readonly logger: DebugLogger;
  readonly maxRank: number;
}

export const consoleDebugLogger: DebugLogger = (message, context) => {
  if (context === undefined) {
    console.debug(`[DEBUG] ${message}`);
  } else {
    console.debug(`[DEBUG] ${message}`, context);
  }
};

/**
 * Fill in defaults and validate builder options
 */
export function resolveBuilderOptions(options: IndexExprBuilderOptions = {}): ResolvedBuilderOptions {
  const maxRank = options.maxRank ?? MAX_TENSOR_RANK;
  if (!Number.isSafeInteger(maxRank) || maxRank < 1 || maxRank > MAX_TENSOR_RANK) {
    throw new ContractViolationError(
      `maxRank must be an integer between 1 and ${MAX_TENSOR_RANK.toString()}, got ${String(maxRank)}`,
      'INVALID_ARGUMENT',
      { maxRank },
    );
  }

  return {
    debug: options.debug ?? false,
    logger: options.logger ?? consoleDebugLogger,
    maxRank,
  };
}
