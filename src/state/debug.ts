/**
 * Debug Records
 *
 * Mirror of the runtime's lua_Debug structure, filled by State.getStack
 * and State.getInfo. Field names match the runtime's debug API.
 */

import { lua, to_jsstring, type lua_String } from 'fengari';

function text(value: lua_String | null): string | null {
  return value === null ? null : to_jsstring(value);
}

export class Debug {
  /** Record passed to lua_getstack / lua_getinfo */
  readonly record = new lua.lua_Debug();

  get event(): number {
    return this.record.event;
  }

  /** Reasonable name for the function, null when none was found */
  get name(): string | null {
    return text(this.record.name);
  }

  /** "global", "local", "method", "field", "upvalue" or "" */
  get namewhat(): string | null {
    return text(this.record.namewhat);
  }

  /** "Lua", "C", "main" or "tail" */
  get what(): string | null {
    return text(this.record.what);
  }

  get source(): string | null {
    return text(this.record.source);
  }

  get currentline(): number {
    return this.record.currentline;
  }

  get linedefined(): number {
    return this.record.linedefined;
  }

  get lastlinedefined(): number {
    return this.record.lastlinedefined;
  }

  get nups(): number {
    return this.record.nups;
  }

  get nparams(): number {
    return this.record.nparams;
  }

  get isvararg(): boolean {
    return this.record.isvararg;
  }

  get istailcall(): boolean {
    return this.record.istailcall;
  }

  /** Printable version of source, used in error messages */
  get short_src(): string | null {
    return text(this.record.short_src);
  }
}
