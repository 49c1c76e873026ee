/**
 * Error types raised by the trie and its drivers.
 *
 * Absent keys are not errors: `find` returns null, `remove` returns false and
 * `complete` returns an empty list.
 */

/** Base class for every error thrown by this package. */
export class TrieError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Thrown by `render` for a mode other than "list" or "tree". */
export class InvalidRenderModeError extends TrieError {
  public readonly mode: string;

  constructor(mode: string) {
    super(`Unknown render mode "${mode}" (expected "list" or "tree")`, 'INVALID_RENDER_MODE');
    this.mode = mode;
  }
}

/** A structural check that failed at `path` (the string spelled down to the node). */
export interface InvariantViolation {
  path: string;
  message: string;
}

/**
 * The tree broke one of its structural invariants. This is a bug in the trie,
 * raised only when verification is switched on.
 */
export class TrieInvariantError extends TrieError {
  public readonly violations: InvariantViolation[];

  constructor(violations: InvariantViolation[]) {
    const detail = violations.map((v) => `  at "${v.path}": ${v.message}`).join('\n');
    super(`Radix trie invariant violated:\n${detail}`, 'INVARIANT_VIOLATION');
    this.violations = violations;
  }
}

/** Bad command-line arguments. */
export class UsageError extends TrieError {
  constructor(message: string) {
    super(message, 'USAGE');
  }
}
