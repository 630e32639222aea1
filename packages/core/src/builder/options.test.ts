import { afterEach, describe, it, expect, vi } from 'vitest';
import { consoleDebugLogger, resolveBuilderOptions } from './options.js';
import { MAX_TENSOR_RANK } from '../ir/types.js';

describe('resolveBuilderOptions', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fill defaults', () => {
    const options = resolveBuilderOptions();
    expect(options.debug).toBe(false);
    expect(options.maxRank).toBe(MAX_TENSOR_RANK);
    expect(options.logger).toBe(consoleDebugLogger);
  });

  it('should keep given values', () => {
    const logger = vi.fn();
    const options = resolveBuilderOptions({ debug: true, maxRank: 3, logger });
    expect(options).toEqual({ debug: true, maxRank: 3, logger });
  });

  it('should reject out-of-range maxRank', () => {
    expect(() => resolveBuilderOptions({ maxRank: 0 })).toThrow(
      'maxRank must be an integer between 1 and 8, got 0',
    );
    expect(() => resolveBuilderOptions({ maxRank: 9 })).toThrow('got 9');
    expect(() => resolveBuilderOptions({ maxRank: 2.5 })).toThrow('got 2.5');
  });

  it('should print debug lines through console.debug', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    consoleDebugLogger('folded');
    consoleDebugLogger('declined', { index: 1 });
    expect(spy.mock.calls).toEqual([['[DEBUG] folded'], ['[DEBUG] declined', { index: 1 }]]);
  });
});
