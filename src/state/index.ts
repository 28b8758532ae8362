/**
 * State Module
 * Public API for host applications.
 */

export {
  createState,
  LUA_MULTRET,
  State,
  wrapNativeFunction,
  type CFunction,
  type NativeFunction,
  type RawState,
} from './state.js';
export { StackCleaner, withStackCleaner } from './stack-cleaner.js';
export { Debug } from './debug.js';
export {
  defineUserdataType,
  type UserdataSlot,
  type UserdataType,
} from './userdata.js';
export {
  resolveOptions,
  type CallEndEvent,
  type CallEvent,
  type ErrorEvent,
  type LibraryName,
  type ObservabilityCallbacks,
  type ResolvedStateOptions,
  type StackUnderflowEvent,
  type StateCallbacks,
  type StateOptions,
} from './options.js';
