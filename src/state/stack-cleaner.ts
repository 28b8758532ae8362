/**
 * Stack Cleaner
 *
 * Records the depth of a state's stack at creation and restores it on
 * dispose() by popping everything pushed since. The stack may grow freely
 * in between; it should never shrink below the recorded depth.
 *
 * Cleaners nest: each records its own depth, so an inner cleaner never
 * touches values that existed before it was created. Dispose them in
 * reverse order of creation.
 */

import type { State } from './state.js';

export class StackCleaner {
  /** Depth recorded at creation */
  readonly depth: number;
  private readonly state: State;
  private kept = false;
  private disposed = false;

  constructor(state: State) {
    this.state = state;
    this.depth = state.getTop();
  }

  /** Whether forget() was called */
  get forgotten(): boolean {
    return this.kept;
  }

  /** Keep everything pushed since creation; dispose() becomes a no-op */
  forget(): void {
    this.kept = true;
  }

  /**
   * Pop back down to the recorded depth. Runs once.
   *
   * If the stack is already below the recorded depth something popped
   * values it did not own. Nothing is popped and the condition is reported.
   */
  dispose(): void {
    if (this.kept || this.disposed) {
      return;
    }
    this.disposed = true;
    if (this.state.closed) {
      return;
    }

    const currentDepth = this.state.getTop();
    if (currentDepth < this.depth) {
      const { callbacks, observability } = this.state.options;
      callbacks.onWarn(
        `Stack depth ${currentDepth} is below the depth ${this.depth} recorded by a StackCleaner`
      );
      observability.onStackUnderflow?.({
        recordedDepth: this.depth,
        currentDepth,
      });
      return;
    }
    this.state.pop(currentDepth - this.depth);
  }
}

/**
 * Run `body` with a cleaner over `state` and restore the stack afterwards,
 * whether `body` returns or throws. `body` must be synchronous.
 *
 * @example
 * const sum = withStackCleaner(state, () => {
 *   state.loadString('return 2 + 3');
 *   state.pcall(0, 1);
 *   return state.toInteger();
 * });
 */
export function withStackCleaner<T>(
  state: State,
  body: (cleaner: StackCleaner) => T
): T {
  const cleaner = new StackCleaner(state);
  try {
    return body(cleaner);
  } finally {
    cleaner.dispose();
  }
}
