/**
 * lua-facade
 * Checked, typed handle over an embedded Lua interpreter
 */

export * from './state/index.js';
export { createModule, doFile, doString, evaluate } from './operations.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  CATEGORY_PREFIX,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  CompileError,
  createError,
  errorFromStatus,
  FileNotFoundError,
  LogicError,
  LuaError,
  LuaRuntimeError,
  ResourceError,
  type LuaErrorData,
} from './error-classes.js';
