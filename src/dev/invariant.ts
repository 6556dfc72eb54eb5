/**
 * Invariant assertion utilities for correctness checking
 *
 * Core principle: fail fast when invariants are violated.
 * These guard internal contracts (slot bookkeeping, single-pass streams),
 * not user input; user-facing failures use the typed errors in common/errors.
 */

export class InvariantError extends Error {
  readonly code = 'STACKABLE_INVARIANT_VIOLATION';
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
    Object.setPrototypeOf(this, InvariantError.prototype);
  }
}

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new InvariantError(`[Stackable Invariant] ${message}${contextStr}`);
  }
}

/**
 * Guard for one-shot resources (sessions, markup streams)
 * @internal
 */
export class Once {
  private called = false;
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  mark(): void {
    invariant(!this.called, `${this.name} called more than once`);
    this.called = true;
  }
}

/**
 * Assert scheduling precondition (pool bounds, single completion, etc)
 * @internal
 */
export function assertSchedulingPrecondition(
  condition: boolean,
  violationMessage: string
): asserts condition {
  invariant(condition, `[Scheduler Precondition] ${violationMessage}`);
}
