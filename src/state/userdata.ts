/**
 * Typed userdata slots.
 *
 * The runtime stores no host type information in a userdata block, so the
 * type is asserted by the caller through a tag created once per host type.
 * A slot is a mutable box: writes through it are seen by every later
 * retrieval of the same block.
 */

/** Storage for one host value owned by the Lua garbage collector */
export interface UserdataSlot<T> {
  value: T;
}

/** Caller-asserted type tag for userdata blocks */
export interface UserdataType<T> {
  readonly name: string;
  /** Attach a slot to a freshly allocated block */
  bind(block: object, slot: UserdataSlot<T>): void;
  /**
   * Slot attached to `block`, read as T whichever tag attached it.
   * Undefined only when `block` carries no slot.
   */
  slotOf(block: unknown): UserdataSlot<T> | undefined;
}

// Shared by every tag; held weakly so a slot goes with its block.
const slots = new WeakMap<object, UserdataSlot<unknown>>();

/**
 * Create a tag for userdata holding values of type T.
 *
 * Retrieval is an unchecked cast: reading a block through a tag other than
 * the one it was allocated under yields its slot typed as the wrong T.
 * Do not keep a slot past the point where its block is reachable from the
 * stack or the registry.
 */
export function defineUserdataType<T>(name: string): UserdataType<T> {
  return {
    name,
    bind(block, slot) {
      slots.set(block, slot);
    },
    slotOf(block) {
      if (typeof block !== 'object' || block === null) {
        return undefined;
      }
      return slots.get(block) as UserdataSlot<T> | undefined;
    },
  };
}
