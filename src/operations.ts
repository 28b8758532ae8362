/**
 * High-level operations built on State.
 */

import type { NativeFunction, State } from './state/state.js';
import { withStackCleaner } from './state/stack-cleaner.js';

/**
 * Call the chunk on top of the stack with the `nargs` values below it.
 * Returns the number of results left on the stack.
 */
function callLoaded(
  state: State,
  depth: number,
  nargs: number,
  nresults: number,
  errorHandler: number
): number {
  if (nargs > 0) {
    state.insert(-nargs - 1);
  }
  // The chunk now sits below the arguments: relative handler indices move by one.
  const handler = errorHandler < 0 ? errorHandler - 1 : errorHandler;
  state.pcall(nargs, nresults, handler);
  return state.getTop() - depth;
}

/**
 * Load and run a string of code.
 *
 * The top `nargs` values are passed to the chunk as `...`.
 *
 * @param nresults - Results to keep, or LUA_MULTRET for all
 * @param errorHandler - Stack index of a message handler, 0 for none
 * @returns Number of results pushed
 * @throws CompileError, LuaRuntimeError
 */
export function doString(
  state: State,
  code: string,
  nargs = 0,
  nresults = 0,
  errorHandler = 0
): number {
  const depth = state.getTop() - nargs;
  state.loadString(code);
  return callLoaded(state, depth, nargs, nresults, errorHandler);
}

/**
 * Load and run a file. Same conventions as doString.
 * @throws FileNotFoundError, CompileError, LuaRuntimeError
 */
export function doFile(
  state: State,
  file: string,
  nargs = 0,
  nresults = 0,
  errorHandler = 0
): number {
  const depth = state.getTop() - nargs;
  state.loadFile(file);
  return callLoaded(state, depth, nargs, nresults, errorHandler);
}

/**
 * Evaluate an expression and push its values.
 *
 * @example
 * evaluate(state, '1 + 2');
 * state.toInteger(); // 3
 */
export function evaluate(
  state: State,
  expression: string,
  nresults = 1
): number {
  return doString(state, `return ${expression}`, 0, nresults);
}

/**
 * Create a global table `name` whose fields are the given native functions.
 * The stack is left unchanged.
 */
export function createModule(
  state: State,
  name: string,
  members: Record<string, NativeFunction>
): void {
  withStackCleaner(state, () => {
    state.newTable();
    for (const [key, fn] of Object.entries(members)) {
      state.pushString(key);
      state.pushFunction(fn);
      state.setTable(-3);
    }
    state.setGlobal(name);
  });
}
