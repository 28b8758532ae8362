/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'compile' | 'runtime' | 'resource' | 'logic' | 'io';

/** ID letter for each category: LUA-{letter}{3-digit} */
export const CATEGORY_PREFIX: Readonly<Record<ErrorCategory, string>> = {
  compile: 'C',
  runtime: 'R',
  resource: 'M',
  logic: 'A',
  io: 'F',
};

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LUA-{letter}{3-digit} (e.g., LUA-R001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Compile Errors (LUA-C0xx)
  {
    errorId: 'LUA-C001',
    category: 'compile',
    description: 'Chunk failed to compile',
    messageTemplate: '{message}',
    cause: 'The source passed to loadString or loadFile is not valid Lua.',
    resolution:
      'Fix the reported line. The message is the Lua compiler diagnostic, unmodified.',
  },

  // Runtime Errors (LUA-R0xx)
  {
    errorId: 'LUA-R001',
    category: 'runtime',
    description: 'Error raised during protected call',
    messageTemplate: '{message}',
    cause:
      'The called function raised an error, either with error() in Lua or by throwing from a native function.',
    resolution:
      'Inspect the message; the error object is left on top of the stack for further inspection.',
  },
  {
    errorId: 'LUA-R002',
    category: 'runtime',
    description: 'Error in message handler',
    messageTemplate: '{message}',
    cause: 'The error handler passed to pcall raised an error itself.',
    resolution: 'Make the message handler total; it must not raise.',
  },
  {
    errorId: 'LUA-R003',
    category: 'runtime',
    description: 'API operation raised an error',
    messageTemplate: '{message}',
    cause:
      'A table or global access triggered a metamethod that raised, or the operands were of the wrong type.',
    resolution:
      'Check the value types at the indices passed in and any __index / __newindex metamethods.',
  },

  // Resource Errors (LUA-M0xx)
  {
    errorId: 'LUA-M001',
    category: 'resource',
    description: 'Cannot create interpreter state',
    messageTemplate: 'Cannot create Lua state',
    cause: 'The runtime failed to allocate a new interpreter instance.',
  },
  {
    errorId: 'LUA-M002',
    category: 'resource',
    description: 'Stack overflow',
    messageTemplate: 'Cannot grow Lua stack by {count} slots',
    cause: 'The value stack reached its maximum size.',
    resolution:
      'Pop values that are no longer needed, or wrap the work in a StackCleaner.',
  },
  {
    errorId: 'LUA-M003',
    category: 'resource',
    description: 'Memory allocation failed',
    messageTemplate: '{message}',
    cause: 'The runtime reported a memory error while running code.',
  },

  // Logic Errors (LUA-A0xx)
  {
    errorId: 'LUA-A001',
    category: 'logic',
    description: 'State used after close',
    messageTemplate: 'Lua state is closed',
    resolution: 'Do not call operations on a State after close().',
  },
  {
    errorId: 'LUA-A002',
    category: 'logic',
    description: 'Value has no string form',
    messageTemplate: 'Value at index {index} is a {type}, not a string',
    resolution: 'Check with isString() before calling toString().',
  },
  {
    errorId: 'LUA-A003',
    category: 'logic',
    description: 'No activation record',
    messageTemplate: 'No activation record at stack level {level}',
    cause: 'getStack was called with a level deeper than the call stack.',
  },
  {
    errorId: 'LUA-A004',
    category: 'logic',
    description: 'Invalid debug info request',
    messageTemplate: 'Invalid debug info option "{what}"',
    resolution: 'Use a combination of the options n, S, l, u, t.',
  },
  {
    errorId: 'LUA-A005',
    category: 'logic',
    description: 'Value is not an integer',
    messageTemplate: '{value} is not a 32-bit integer',
    resolution: 'Use pushNumber() for non-integral values.',
  },

  // IO Errors (LUA-F0xx)
  {
    errorId: 'LUA-F001',
    category: 'io',
    description: 'Script file not found',
    messageTemplate: 'File {filename} not found',
    cause: 'The path passed to loadFile does not exist or is not readable.',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Missing context values render as empty string; other values go through
 * String(). A template with an unclosed brace is returned unchanged.
 *
 * @example
 * renderMessage("Cannot grow Lua stack by {count} slots", { count: 3 })
 * // Returns: "Cannot grow Lua stack by 3 slots"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  const open = template.lastIndexOf('{');
  if (open !== -1 && template.indexOf('}', open) === -1) {
    return template;
  }

  return template.replace(/\{([^{}]*)\}/g, (_match, name: string) => {
    const value = context[name];
    if (value === undefined || value === null) {
      return '';
    }
    try {
      return String(value);
    } catch {
      return '[object Object]';
    }
  });
}
