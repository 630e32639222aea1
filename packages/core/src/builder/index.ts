/**
 * Builder module exports
 *
 * @module builder
 */

export { IndexExprBuilder, ALL_ELEMENTS } from './index-expr-builder.js';

export type { IndexExprAccessors } from './accessors.js';
export { analysisAccessors, createMaterializingAccessors } from './accessors.js';

export type { DebugLogger, IndexExprBuilderOptions, ResolvedBuilderOptions } from './options.js';
export { consoleDebugLogger, resolveBuilderOptions } from './options.js';
