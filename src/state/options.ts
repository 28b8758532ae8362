/**
 * State Options
 *
 * Configuration accepted by State and resolved against defaults once,
 * at construction. Borrowed states share the resolved options of the
 * state that created them.
 */

/** Standard libraries that can be opened on a state */
export type LibraryName = 'base' | 'string' | 'table' | 'math';

/** I/O callbacks */
export interface StateCallbacks {
  /** Called for each line written by the script-level print() */
  onLog: (message: string) => void;
  /** Called for conditions worth reporting that do not raise */
  onWarn: (message: string) => void;
}

/** Observability callbacks for monitoring a state */
export interface ObservabilityCallbacks {
  /** Called before a protected call starts */
  onCall?: (event: CallEvent) => void;
  /** Called after a protected call returns successfully */
  onCallEnd?: (event: CallEndEvent) => void;
  /** Called before a typed error is thrown */
  onError?: (event: ErrorEvent) => void;
  /** Called when a StackCleaner finds the stack below its recorded depth */
  onStackUnderflow?: (event: StackUnderflowEvent) => void;
}

/** Event emitted before a protected call */
export interface CallEvent {
  nargs: number;
  nresults: number;
}

/** Event emitted after a protected call */
export interface CallEndEvent extends CallEvent {
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error about to be thrown */
  error: Error;
  /** Wrapped runtime entry point, when the error came from the runtime */
  apiFunction?: string | undefined;
}

/** Event emitted when a cleaner cannot restore its recorded depth */
export interface StackUnderflowEvent {
  recordedDepth: number;
  currentDepth: number;
}

/** Options for creating a state */
export interface StateOptions {
  /** I/O callbacks */
  callbacks?: Partial<StateCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Libraries opened right after an owned state is created */
  libraries?: readonly LibraryName[];
}

/** Options after defaults are applied */
export interface ResolvedStateOptions {
  readonly callbacks: StateCallbacks;
  readonly observability: ObservabilityCallbacks;
  readonly libraries: readonly LibraryName[];
}

const defaultCallbacks: StateCallbacks = {
  onLog: (message) => {
    console.log(message);
  },
  onWarn: (message) => {
    console.warn(message);
  },
};

export function resolveOptions(
  options: StateOptions = {}
): ResolvedStateOptions {
  return {
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    libraries: options.libraries ?? [],
  };
}
