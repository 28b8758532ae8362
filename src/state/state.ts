/**
 * Lua State
 *
 * Owning (or borrowing) handle over one interpreter instance. Every wrapper
 * uses the implicit state held by the instance, takes and returns host
 * types, and reports failures by throwing typed errors.
 *
 * Operations the runtime can fail on outside a protected call (table and
 * global access through metamethods, library loading, tostring) are run
 * through a small native function under lua_pcall so that the failure is
 * caught at this boundary instead of aborting the interpreter. A failed
 * operation leaves the stack as it found it.
 */

import fs from 'node:fs';
import {
  lauxlib,
  lua,
  lualib,
  to_jsstring,
  to_luastring,
  type lua_CFunction,
  type lua_State,
} from 'fengari';
import {
  createError,
  errorFromStatus,
  FileNotFoundError,
  type LuaError,
} from '../error-classes.js';
import type { Debug } from './debug.js';
import {
  resolveOptions,
  type LibraryName,
  type ResolvedStateOptions,
  type StateOptions,
} from './options.js';
import type { UserdataSlot, UserdataType } from './userdata.js';

// ============================================================
// TYPES
// ============================================================

/** Interpreter instance as handed to native functions by the runtime */
export type RawState = lua_State;

/**
 * Native function in the runtime's own calling convention: takes the raw
 * state, returns the number of results it pushed.
 */
export type CFunction = lua_CFunction;

/** Native function running on a borrowed State */
export type NativeFunction = (state: State) => number;

/** Request all results from pcall */
export const LUA_MULTRET: number = lua.LUA_MULTRET;

const LIBRARIES: Readonly<
  Record<LibraryName, { module: string; open: CFunction }>
> = {
  base: { module: '_G', open: lualib.luaopen_base },
  string: { module: 'string', open: lualib.luaopen_string },
  table: { module: 'table', open: lualib.luaopen_table },
  math: { module: 'math', open: lualib.luaopen_math },
};

const tolstring: CFunction = (L) => {
  lauxlib.luaL_tolstring(L, 1);
  return 1;
};

/**
 * Converts a host exception raised inside a native function into the error
 * object of the failing call. The runtime passes the exception as light
 * userdata at index 1.
 */
const nativeErrorHandler: CFunction = (L) => {
  const thrown = lua.lua_touserdata(L, 1);
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  lua.lua_pushstring(L, to_luastring(message));
  return 1;
};

/** Whether `index` refers to a stack slot (or a pseudo-index) */
function acceptable(L: RawState, index: number): boolean {
  if (index > 0) {
    return index <= lua.lua_gettop(L);
  }
  if (index > lua.LUA_REGISTRYINDEX) {
    return index !== 0 && -index <= lua.lua_gettop(L);
  }
  return true;
}

/**
 * String form of the error object on top of the stack.
 * Strings and numbers are read directly; anything else goes through
 * tostring (honouring __tostring) in protected mode.
 */
function describeTop(L: RawState): string {
  const direct = lua.lua_tostring(L, -1);
  if (direct !== null) {
    return to_jsstring(direct);
  }

  const typeName = to_jsstring(lua.lua_typename(L, lua.lua_type(L, -1)));
  if (!lua.lua_checkstack(L, 2)) {
    return `(error object is a ${typeName} value)`;
  }
  lua.lua_pushcfunction(L, tolstring);
  lua.lua_pushvalue(L, -2);
  const status = lua.lua_pcall(L, 1, 1, 0);
  const described = status === lua.LUA_OK ? lua.lua_tostring(L, -1) : null;
  lua.lua_pop(L, 1);
  return described === null
    ? `(error object is a ${typeName} value)`
    : to_jsstring(described);
}

// ============================================================
// NATIVE GATE
// ============================================================

/**
 * Adapt a NativeFunction to the runtime's calling convention.
 *
 * The body runs on a State borrowed around the raw state the runtime passes
 * in. An Error thrown by the body becomes a script-level error with the
 * same message. Anything else is rethrown: either the runtime unwinding or
 * a host value, which the native error handler of an owned state turns
 * into its string form.
 */
export function wrapNativeFunction(
  fn: NativeFunction,
  options: StateOptions = {}
): CFunction {
  return (L) => {
    let message: string;
    try {
      return fn(State.borrow(L, options));
    } catch (error: unknown) {
      if (!(error instanceof Error)) {
        throw error;
      }
      message = error.message;
    }
    lua.lua_pushstring(L, to_luastring(message));
    return lua.lua_error(L);
  };
}

// ============================================================
// STATE
// ============================================================

/**
 * Handle over the state of one Lua interpreter.
 *
 * `new State()` creates and owns a fresh interpreter, released by close().
 * `State.borrow(raw)` wraps a live interpreter owned by someone else (for
 * example the raw state a native function receives); close() then only
 * detaches the handle.
 *
 * Index arguments follow the runtime's conventions: positive indices count
 * from the bottom of the current frame, negative ones from the top. Indices
 * outside the stack are not validated except where noted.
 *
 * @example
 * const state = new State();
 * const cleaner = new StackCleaner(state);
 * try {
 *   state.loadString('return 1 + 2');
 *   state.pcall(0, 1);
 *   state.toInteger(); // 3
 * } finally {
 *   cleaner.dispose();
 * }
 */
export class State {
  private L: RawState | null;
  /** Whether close() releases the interpreter */
  readonly owned: boolean;
  readonly options: ResolvedStateOptions;

  constructor(raw?: RawState, options: StateOptions = {}) {
    this.options = resolveOptions(options);

    if (raw !== undefined) {
      this.L = raw;
      this.owned = false;
      return;
    }

    const created = lauxlib.luaL_newstate();
    if (created === null) {
      this.L = null;
      this.owned = false;
      throw this.fail(createError('LUA-M001', {}, 'luaL_newstate'));
    }
    this.L = created;
    this.owned = true;
    lua.lua_atnativeerror(created, nativeErrorHandler);

    for (const library of this.options.libraries) {
      this.openLibrary(library);
    }
    if (this.options.libraries.includes('base')) {
      this.installPrint();
    }
  }

  /** Wrap an interpreter owned elsewhere */
  static borrow(raw: RawState, options: StateOptions = {}): State {
    return new State(raw, options);
  }

  // ============================================================
  // LIFECYCLE
  // ============================================================

  /**
   * Release the interpreter if owned, detach otherwise.
   * Idempotent; every other operation throws once the state is closed.
   */
  close(): void {
    if (this.L === null) {
      return;
    }
    if (this.owned) {
      lua.lua_close(this.L);
    }
    this.L = null;
  }

  get closed(): boolean {
    return this.L === null;
  }

  /** Underlying interpreter, for native interop and tests */
  get raw(): RawState {
    return this.state;
  }

  // ============================================================
  // LIBRARIES
  // ============================================================

  /** Open the base library; print() is routed to callbacks.onLog */
  openBase(): void {
    this.openLibrary('base');
    this.installPrint();
  }

  openString(): void {
    this.openLibrary('string');
  }

  openTable(): void {
    this.openLibrary('table');
  }

  openMath(): void {
    this.openLibrary('math');
  }

  /** Open every standard library the runtime ships */
  openAll(): void {
    this.protect('luaL_openlibs', [], 0, (L) => {
      lualib.luaL_openlibs(L);
      return 0;
    });
    this.installPrint();
  }

  // ============================================================
  // LOADING
  // ============================================================

  /**
   * Compile a file and push the resulting function.
   * @throws FileNotFoundError when the file is not readable
   * @throws CompileError with the compiler diagnostic
   */
  loadFile(file: string): void {
    const L = this.state;
    try {
      fs.accessSync(file, fs.constants.R_OK);
    } catch {
      throw this.fail(new FileNotFoundError(file, 'luaL_loadfile'));
    }

    this.reserve(1);
    const status = lauxlib.luaL_loadfile(L, to_luastring(file));
    if (status === lauxlib.LUA_ERRFILE) {
      lua.lua_pop(L, 1);
      throw this.fail(new FileNotFoundError(file, 'luaL_loadfile'));
    }
    if (status !== lua.LUA_OK) {
      this.raiseFromTop(status, 'luaL_loadfile');
    }
  }

  /**
   * Compile a string and push the resulting function.
   * Without `chunkName` the source itself names the chunk in diagnostics.
   * @throws CompileError with the compiler diagnostic
   */
  loadString(code: string, chunkName?: string): void {
    const L = this.state;
    this.reserve(1);
    const buffer = to_luastring(code);
    const status =
      chunkName === undefined
        ? lauxlib.luaL_loadstring(L, buffer)
        : lauxlib.luaL_loadbuffer(
            L,
            buffer,
            buffer.length,
            to_luastring(chunkName)
          );
    if (status !== lua.LUA_OK) {
      this.raiseFromTop(status, 'luaL_loadstring');
    }
  }

  // ============================================================
  // STACK
  // ============================================================

  getTop(): number {
    return lua.lua_gettop(this.state);
  }

  setTop(index: number): void {
    lua.lua_settop(this.state, index);
  }

  pop(count: number): void {
    lua.lua_pop(this.state, count);
  }

  /** Move the top value into `index`, shifting the values above it up */
  insert(index: number): void {
    lua.lua_insert(this.state, index);
  }

  /** Remove the value at `index`, shifting the values above it down */
  remove(index: number): void {
    lua.lua_remove(this.state, index);
  }

  absIndex(index: number): number {
    return lua.lua_absindex(this.state, index);
  }

  /**
   * Make room for `extra` more values.
   * @throws ResourceError when the stack cannot grow
   */
  checkStack(extra: number): void {
    this.reserve(extra);
  }

  /** Pseudo-index of the n-th upvalue of the running native closure */
  upvalueIndex(n: number): number {
    return lua.lua_upvalueindex(n);
  }

  // ============================================================
  // PREDICATES
  // ============================================================
  // Predicates never throw for bad indices: out of range is simply false.

  isBoolean(index = -1): boolean {
    const L = this.state;
    return acceptable(L, index) && lua.lua_isboolean(L, index);
  }

  isFunction(index = -1): boolean {
    const L = this.state;
    return acceptable(L, index) && lua.lua_isfunction(L, index);
  }

  isNil(index = -1): boolean {
    const L = this.state;
    return acceptable(L, index) && lua.lua_isnil(L, index);
  }

  isNumber(index = -1): boolean {
    const L = this.state;
    return acceptable(L, index) && lua.lua_isnumber(L, index);
  }

  isString(index = -1): boolean {
    const L = this.state;
    return acceptable(L, index) && lua.lua_isstring(L, index);
  }

  isTable(index = -1): boolean {
    const L = this.state;
    return acceptable(L, index) && lua.lua_istable(L, index);
  }

  isUserdata(index = -1): boolean {
    const L = this.state;
    return acceptable(L, index) && lua.lua_isuserdata(L, index);
  }

  /** Type name of the value at index ("no value" when out of range) */
  typeName(index = -1): string {
    const L = this.state;
    if (!acceptable(L, index)) {
      return 'no value';
    }
    return to_jsstring(lua.lua_typename(L, lua.lua_type(L, index)));
  }

  // ============================================================
  // CONVERSIONS
  // ============================================================

  toBoolean(index = -1): boolean {
    const L = this.state;
    return acceptable(L, index) && lua.lua_toboolean(L, index);
  }

  /** Integer value, 0 when the value is not convertible */
  toInteger(index = -1): number {
    const L = this.state;
    return acceptable(L, index) ? lua.lua_tointeger(L, index) : 0;
  }

  /** Number value, 0 when the value is not convertible */
  toNumber(index = -1): number {
    const L = this.state;
    return acceptable(L, index) ? lua.lua_tonumber(L, index) : 0;
  }

  /**
   * String value. A number is converted in place, as the runtime does.
   * @throws LogicError when the value is neither a string nor a number
   */
  toString(index = -1): string {
    const L = this.state;
    const value = acceptable(L, index) ? lua.lua_tostring(L, index) : null;
    if (value === null) {
      throw this.fail(
        createError(
          'LUA-A002',
          { index, type: this.typeName(index) },
          'lua_tostring'
        )
      );
    }
    return to_jsstring(value);
  }

  /**
   * Printable form of any value, as tostring() produces it.
   * @throws LuaRuntimeError when a __tostring metamethod fails
   */
  toDisplayString(index = -1): string {
    this.protect('luaL_tolstring', [index], 1, tolstring);
    const value = this.toString(-1);
    this.pop(1);
    return value;
  }

  // ============================================================
  // PUSH
  // ============================================================

  pushNil(): void {
    this.reserve(1);
    lua.lua_pushnil(this.state);
  }

  pushBoolean(value: boolean): void {
    this.reserve(1);
    lua.lua_pushboolean(this.state, value);
  }

  /**
   * Push an integer. The runtime's integers are 32 bits wide.
   * @throws LogicError for non-integral or out-of-range values
   */
  pushInteger(value: number): void {
    if (!Number.isInteger(value) || (value | 0) !== value) {
      throw this.fail(
        createError('LUA-A005', { value }, 'lua_pushinteger')
      );
    }
    this.reserve(1);
    lua.lua_pushinteger(this.state, value);
  }

  pushNumber(value: number): void {
    this.reserve(1);
    lua.lua_pushnumber(this.state, value);
  }

  pushString(value: string): void {
    this.reserve(1);
    lua.lua_pushstring(this.state, to_luastring(value));
  }

  /** Push a copy of the value at index */
  pushValue(index: number): void {
    this.reserve(1);
    lua.lua_pushvalue(this.state, index);
  }

  /**
   * Push a native function in the runtime's calling convention.
   * On an owned state, an exception it throws surfaces from pcall with the
   * exception's message.
   */
  pushCFunction(fn: CFunction): void {
    this.reserve(1);
    lua.lua_pushcfunction(this.state, fn);
  }

  /** Push a native closure capturing the top `upvalues` values (popped) */
  pushCClosure(fn: CFunction, upvalues: number): void {
    this.reserve(1);
    lua.lua_pushcclosure(this.state, fn, upvalues);
  }

  /** Push a gated native function (see wrapNativeFunction) */
  pushFunction(fn: NativeFunction): void {
    this.pushCFunction(wrapNativeFunction(fn, this.options));
  }

  /** Push a gated native closure capturing the top `upvalues` values */
  pushClosure(fn: NativeFunction, upvalues: number): void {
    this.pushCClosure(wrapNativeFunction(fn, this.options), upvalues);
  }

  // ============================================================
  // TABLES
  // ============================================================

  newTable(): void {
    this.reserve(1);
    lua.lua_newtable(this.state);
  }

  /**
   * Replace the key on top of the stack with `t[key]`, where t is the
   * table at `index`.
   */
  getTable(index = -2): void {
    this.protect('lua_gettable', [index, -1], 1, (L) => {
      lua.lua_gettable(L, 1);
      return 1;
    });
    lua.lua_remove(this.state, -2);
  }

  /**
   * Do `t[key] = value`, where t is the table at `index`, key is just
   * below the top and value on top. Key and value are popped.
   */
  setTable(index = -3): void {
    this.protect('lua_settable', [index, -2, -1], 0, (L) => {
      lua.lua_settable(L, 1);
      return 0;
    });
    lua.lua_pop(this.state, 2);
  }

  /**
   * Advance a traversal of the table at `index`.
   *
   * Pops the key on top and, when another entry exists, pushes its key and
   * value and returns true. Start with a nil key. As with the runtime,
   * changing the key while traversing is undefined.
   */
  next(index = -2): boolean {
    this.protect('lua_next', [index, -1], LUA_MULTRET, (L) => {
      if (lua.lua_next(L, 1) !== 0) {
        lua.lua_pushboolean(L, true);
        return 3;
      }
      lua.lua_pushboolean(L, false);
      return 1;
    });

    const L = this.state;
    const more = lua.lua_toboolean(L, -1);
    lua.lua_pop(L, 1);
    if (more) {
      lua.lua_remove(L, -3);
    } else {
      lua.lua_pop(L, 1);
    }
    return more;
  }

  /** Pop the table on top and set it as the metatable of the value at index */
  setMetatable(index = -2): void {
    lua.lua_setmetatable(this.state, index);
  }

  // ============================================================
  // GLOBALS
  // ============================================================

  /** Push the value of global `name` */
  getGlobal(name: string): void {
    const key = to_luastring(name);
    this.protect('lua_getglobal', [], 1, (L) => {
      lua.lua_getglobal(L, key);
      return 1;
    });
  }

  /** Pop the top value into global `name` */
  setGlobal(name: string): void {
    const key = to_luastring(name);
    this.protect('lua_setglobal', [-1], 0, (L) => {
      lua.lua_setglobal(L, key);
      return 0;
    });
    lua.lua_pop(this.state, 1);
  }

  // ============================================================
  // CALLS
  // ============================================================

  /**
   * Call the function below the top `nargs` values in protected mode.
   *
   * On failure the error object stays on top of the stack (for the caller's
   * StackCleaner to remove) and its string form is thrown.
   *
   * @param errorHandler - Stack index of a message handler, 0 for none
   * @throws LuaRuntimeError, ResourceError
   */
  pcall(nargs: number, nresults: number, errorHandler = 0): void {
    const L = this.state;
    const { onCall, onCallEnd } = this.options.observability;

    onCall?.({ nargs, nresults });
    const startTime = performance.now();
    const status = lua.lua_pcall(L, nargs, nresults, errorHandler);
    if (status !== lua.LUA_OK) {
      throw this.fail(errorFromStatus(status, describeTop(L), 'lua_pcall'));
    }
    onCallEnd?.({
      nargs,
      nresults,
      durationMs: performance.now() - startTime,
    });
  }

  // ============================================================
  // USERDATA
  // ============================================================

  /**
   * Allocate a userdata block on top of the stack holding `construct()`.
   * The block's lifetime belongs to the garbage collector.
   */
  newUserdata<T>(type: UserdataType<T>, construct: () => T): UserdataSlot<T> {
    const L = this.state;
    const slot: UserdataSlot<T> = { value: construct() };
    this.reserve(1);
    type.bind(lua.lua_newuserdata(L, 0), slot);
    return slot;
  }

  /**
   * Read the userdata at `index` as `type`.
   *
   * Unchecked: the runtime keeps no type tag, so the slot is returned as
   * `type` whatever tag allocated it. Returns undefined when there is no
   * userdata at `index`.
   */
  toUserdata<T>(type: UserdataType<T>, index = -1): UserdataSlot<T> | undefined {
    const L = this.state;
    if (!acceptable(L, index)) {
      return undefined;
    }
    return type.slotOf(lua.lua_touserdata(L, index));
  }

  // ============================================================
  // DEBUG
  // ============================================================

  /**
   * Fill `debug` with the activation record at `level` (0 = running function).
   * @throws LogicError when the call stack is not that deep
   */
  getStack(level: number, debug: Debug): void {
    if (lua.lua_getstack(this.state, level, debug.record) !== 1) {
      throw this.fail(createError('LUA-A003', { level }, 'lua_getstack'));
    }
  }

  /**
   * Fill fields of `debug` selected by `what` (e.g. "Snl"). With a leading
   * ">" the function on top of the stack is popped and described instead.
   * @throws LogicError on an invalid option
   */
  getInfo(what: string, debug: Debug): void {
    if (lua.lua_getinfo(this.state, to_luastring(what), debug.record) === 0) {
      throw this.fail(createError('LUA-A004', { what }, 'lua_getinfo'));
    }
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private get state(): RawState {
    if (this.L === null) {
      throw this.fail(createError('LUA-A001', {}));
    }
    return this.L;
  }

  private fail(error: LuaError): LuaError {
    this.options.observability.onError?.({
      error,
      apiFunction: error.apiFunction,
    });
    return error;
  }

  private reserve(extra: number): void {
    if (!lua.lua_checkstack(this.state, extra)) {
      throw this.fail(
        createError('LUA-M002', { count: extra }, 'lua_checkstack')
      );
    }
  }

  /** Pop the error message left by a failed load and throw it */
  private raiseFromTop(status: number, apiFunction: string): never {
    const L = this.state;
    const message = describeTop(L);
    lua.lua_pop(L, 1);
    throw this.fail(errorFromStatus(status, message, apiFunction));
  }

  /**
   * Run `body` under lua_pcall with copies of the values at `args` as its
   * arguments. On failure the error is popped and thrown, so the stack is
   * left as it was.
   */
  private protect(
    apiFunction: string,
    args: number[],
    nresults: number,
    body: CFunction
  ): void {
    const L = this.state;
    this.reserve(args.length + 1);

    const absolute = args.map((index) => lua.lua_absindex(L, index));
    lua.lua_pushcfunction(L, body);
    for (const index of absolute) {
      lua.lua_pushvalue(L, index);
    }

    const status = lua.lua_pcall(L, absolute.length, nresults, 0);
    if (status !== lua.LUA_OK) {
      const message = describeTop(L);
      lua.lua_pop(L, 1);
      throw this.fail(
        errorFromStatus(status, message, apiFunction, 'LUA-R003')
      );
    }
  }

  private openLibrary(library: LibraryName): void {
    const { module, open } = LIBRARIES[library];
    const modname = to_luastring(module);
    this.protect('luaL_requiref', [], 0, (L) => {
      lauxlib.luaL_requiref(L, modname, open, true);
      lua.lua_pop(L, 1);
      return 0;
    });
  }

  /** Replace print() with one that writes through callbacks.onLog */
  private installPrint(): void {
    const { onLog } = this.options.callbacks;
    this.pushFunction((state) => {
      const parts: string[] = [];
      const count = state.getTop();
      for (let index = 1; index <= count; index++) {
        parts.push(state.toDisplayString(index));
      }
      onLog(parts.join('\t'));
      return 0;
    });
    this.setGlobal('print');
  }
}

/** Create an owned state. */
export function createState(options: StateOptions = {}): State {
  return new State(undefined, options);
}
