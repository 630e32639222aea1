export {
  shapedArgument,
  constantArray,
  handle,
  scriptedAccessors,
} from './fixtures.js';
export type { ScriptedAccessorsConfig, AccessorCallLog } from './fixtures.js';

export { generateBuilderOperationTests } from './generators/builder-operations.js';
