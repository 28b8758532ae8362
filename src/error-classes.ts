/**
 * Lua Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { lua } from 'fengari';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LuaErrorData {
  readonly errorId: string;
  readonly message: string;
  /** Wrapped runtime entry point that reported the failure */
  readonly apiFunction?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all errors raised by the façade.
 * The message is used as-is: runtime diagnostics are never reformatted.
 */
export class LuaError extends Error {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly apiFunction: string | undefined;
  readonly context: Record<string, unknown> | undefined;

  constructor(data: LuaErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    const definition = ERROR_REGISTRY.get(data.errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'LuaError';
    this.errorId = data.errorId;
    this.category = definition.category;
    this.apiFunction = data.apiFunction;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LuaErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      apiFunction: this.apiFunction,
      context: this.context,
    };
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

function checkCategory(errorId: string, expected: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== expected) {
    throw new TypeError(`Expected ${expected} error ID, got: ${errorId}`);
  }
}

/** Source failed to compile */
export class CompileError extends LuaError {
  constructor(
    errorId: string,
    message: string,
    apiFunction?: string,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'compile');
    super({ errorId, message, apiFunction, context });
    this.name = 'CompileError';
  }
}

/** Script-level error raised during a protected call or API operation */
export class LuaRuntimeError extends LuaError {
  constructor(
    errorId: string,
    message: string,
    apiFunction?: string,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'runtime');
    super({ errorId, message, apiFunction, context });
    this.name = 'LuaRuntimeError';
  }
}

/** Allocation of a state, stack slots or memory failed */
export class ResourceError extends LuaError {
  constructor(
    errorId: string,
    message: string,
    apiFunction?: string,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'resource');
    super({ errorId, message, apiFunction, context });
    this.name = 'ResourceError';
  }
}

/** Caller misuse detected before reaching the runtime */
export class LogicError extends LuaError {
  constructor(
    errorId: string,
    message: string,
    apiFunction?: string,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'logic');
    super({ errorId, message, apiFunction, context });
    this.name = 'LogicError';
  }
}

/** Script file missing or unreadable */
export class FileNotFoundError extends LuaError {
  readonly filename: string;

  constructor(filename: string, apiFunction?: string) {
    super({
      errorId: 'LUA-F001',
      message: renderMessage('File {filename} not found', { filename }),
      apiFunction,
      context: { filename },
    });
    this.name = 'FileNotFoundError';
    this.filename = filename;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Renders the definition's message template with `context` and picks the
 * class matching the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('LUA-M002', { count: 5 })
 * // ResourceError: "Cannot grow Lua stack by 5 slots"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  apiFunction?: string
): LuaError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'compile':
      return new CompileError(errorId, message, apiFunction, context);
    case 'runtime':
      return new LuaRuntimeError(errorId, message, apiFunction, context);
    case 'resource':
      return new ResourceError(errorId, message, apiFunction, context);
    case 'logic':
      return new LogicError(errorId, message, apiFunction, context);
    case 'io':
      return new FileNotFoundError(String(context['filename']), apiFunction);
  }
}

/**
 * Map a non-OK status returned by the runtime to a typed error.
 * `message` is the runtime's diagnostic and is kept verbatim.
 *
 * @param defaultRuntimeId - Error ID used for LUA_ERRRUN (LUA-R001 for pcall,
 *   LUA-R003 for protected API operations)
 */
export function errorFromStatus(
  status: number,
  message: string,
  apiFunction: string,
  defaultRuntimeId = 'LUA-R001'
): LuaError {
  const context = { status, message };

  if (status === lua.LUA_ERRSYNTAX) {
    return new CompileError('LUA-C001', message, apiFunction, context);
  }
  if (status === lua.LUA_ERRMEM) {
    return new ResourceError('LUA-M003', message, apiFunction, context);
  }
  if (status === lua.LUA_ERRERR) {
    return new LuaRuntimeError('LUA-R002', message, apiFunction, context);
  }
  return new LuaRuntimeError(defaultRuntimeId, message, apiFunction, context);
}
