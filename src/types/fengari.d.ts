/**
 * Type declarations for the fengari Lua VM.
 * Covers the subset of the C API wrapped by this package.
 *
 * fengari represents Lua strings as byte arrays; convert with
 * to_luastring() / to_jsstring().
 */

declare module 'fengari' {
  /** Lua string (bytes) */
  export type lua_String = Uint8Array;

  /** Opaque interpreter state */
  export class lua_State {
    private constructor();
  }

  export type lua_CFunction = (L: lua_State) => number;

  export namespace lua {
    // Thread status
    const LUA_OK: number;
    const LUA_ERRRUN: number;
    const LUA_ERRSYNTAX: number;
    const LUA_ERRMEM: number;
    const LUA_ERRERR: number;

    const LUA_MULTRET: number;
    const LUA_REGISTRYINDEX: number;

    class lua_Debug {
      constructor();
      event: number;
      name: lua_String | null;
      namewhat: lua_String | null;
      what: lua_String | null;
      source: lua_String | null;
      currentline: number;
      linedefined: number;
      lastlinedefined: number;
      nups: number;
      nparams: number;
      isvararg: boolean;
      istailcall: boolean;
      short_src: lua_String | null;
    }

    function lua_close(L: lua_State): void;

    // Stack manipulation
    function lua_absindex(L: lua_State, idx: number): number;
    function lua_gettop(L: lua_State): number;
    function lua_settop(L: lua_State, idx: number): void;
    function lua_pop(L: lua_State, n: number): void;
    function lua_pushvalue(L: lua_State, idx: number): void;
    function lua_insert(L: lua_State, idx: number): void;
    function lua_remove(L: lua_State, idx: number): void;
    function lua_checkstack(L: lua_State, n: number): boolean;
    function lua_upvalueindex(i: number): number;

    // Access
    function lua_type(L: lua_State, idx: number): number;
    function lua_typename(L: lua_State, t: number): lua_String;
    function lua_isboolean(L: lua_State, idx: number): boolean;
    function lua_isnumber(L: lua_State, idx: number): boolean;
    function lua_isstring(L: lua_State, idx: number): boolean;
    function lua_istable(L: lua_State, idx: number): boolean;
    function lua_isfunction(L: lua_State, idx: number): boolean;
    function lua_isnil(L: lua_State, idx: number): boolean;
    function lua_isuserdata(L: lua_State, idx: number): boolean;
    function lua_toboolean(L: lua_State, idx: number): boolean;
    function lua_tointeger(L: lua_State, idx: number): number;
    function lua_tonumber(L: lua_State, idx: number): number;
    function lua_tostring(L: lua_State, idx: number): lua_String | null;
    function lua_touserdata(L: lua_State, idx: number): unknown;

    // Push
    function lua_pushnil(L: lua_State): void;
    function lua_pushboolean(L: lua_State, b: boolean): void;
    function lua_pushinteger(L: lua_State, n: number): void;
    function lua_pushnumber(L: lua_State, n: number): void;
    function lua_pushstring(L: lua_State, s: lua_String): lua_String;
    function lua_pushcfunction(L: lua_State, fn: lua_CFunction): void;
    function lua_pushcclosure(L: lua_State, fn: lua_CFunction, n: number): void;
    function lua_newuserdata(L: lua_State, size: number): object;

    // Tables and globals
    function lua_newtable(L: lua_State): void;
    function lua_gettable(L: lua_State, idx: number): number;
    function lua_settable(L: lua_State, idx: number): void;
    function lua_next(L: lua_State, idx: number): number;
    function lua_setmetatable(L: lua_State, idx: number): void;
    function lua_getglobal(L: lua_State, name: lua_String): number;
    function lua_setglobal(L: lua_State, name: lua_String): void;

    // Calls
    function lua_pcall(L: lua_State, nargs: number, nresults: number, msgh: number): number;
    function lua_error(L: lua_State): never;
    /** Handler turning a host exception (light userdata at index 1) into an error object */
    function lua_atnativeerror(L: lua_State, errorf: lua_CFunction): void;

    // Debug
    function lua_getstack(L: lua_State, level: number, ar: lua_Debug): number;
    function lua_getinfo(L: lua_State, what: lua_String, ar: lua_Debug): number;
  }

  export namespace lauxlib {
    const LUA_ERRFILE: number;

    function luaL_newstate(): lua_State | null;
    function luaL_loadstring(L: lua_State, s: lua_String): number;
    function luaL_loadbuffer(L: lua_State, buff: lua_String, size: number, name: lua_String): number;
    function luaL_loadfile(L: lua_State, filename: lua_String): number;
    function luaL_tolstring(L: lua_State, idx: number): lua_String;
    function luaL_requiref(L: lua_State, modname: lua_String, openf: lua_CFunction, glb: boolean): void;
  }

  export namespace lualib {
    function luaopen_base(L: lua_State): number;
    function luaopen_string(L: lua_State): number;
    function luaopen_table(L: lua_State): number;
    function luaopen_math(L: lua_State): number;
    function luaL_openlibs(L: lua_State): void;
  }

  export function to_luastring(str: string): lua_String;
  export function to_jsstring(str: lua_String): string;
}
