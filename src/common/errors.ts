/**
 * Error taxonomy
 *
 * ResolutionError describes one bridge node's failure and never leaves the
 * scheduler on its own. RenderError subclasses are what a render session
 * reports to its caller.
 */

import type { NodeId } from './tree';

export type ResolutionErrorKind =
  | 'timeout'
  | 'dependency-failed'
  | 'cancelled'
  | 'internal-failure';

export class ResolutionError extends Error {
  readonly code = 'STACKABLE_RESOLUTION_ERROR';
  readonly kind: ResolutionErrorKind;
  readonly detail: string | undefined;

  constructor(
    kind: ResolutionErrorKind,
    message: string,
    options?: { cause?: unknown; detail?: string }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ResolutionError';
    this.kind = kind;
    this.detail = options?.detail;
    Object.setPrototypeOf(this, ResolutionError.prototype);
  }

  static timeout(timeoutMs: number): ResolutionError {
    return new ResolutionError(
      'timeout',
      `Resolution did not complete within ${timeoutMs}ms`
    );
  }

  /**
   * Wrap a failure of the work itself (fetch, database call, ...).
   * Resolvers may throw this directly to keep a specific message.
   */
  static dependencyFailed(cause: unknown): ResolutionError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new ResolutionError(
      'dependency-failed',
      `Dependency failed: ${message}`,
      { cause }
    );
  }

  static cancelled(reason?: string): ResolutionError {
    return new ResolutionError(
      'cancelled',
      reason ? `Resolution cancelled: ${reason}` : 'Resolution cancelled'
    );
  }

  static internalFailure(detail: string, cause?: unknown): ResolutionError {
    return new ResolutionError(
      'internal-failure',
      `Internal failure: ${detail}`,
      { cause, detail }
    );
  }
}

export function toResolutionError(err: unknown): ResolutionError {
  return err instanceof ResolutionError
    ? err
    : ResolutionError.dependencyFailed(err);
}

// --- Session boundary --------------------------------------------------------

export type RenderErrorKind =
  | 'resolution-failed'
  | 'rewrite-failed'
  | 'session-timeout'
  | 'session-cancelled';

export abstract class RenderError extends Error {
  abstract readonly kind: RenderErrorKind;
  abstract readonly code: string;
}

export class ResolutionFailedError extends RenderError {
  readonly kind = 'resolution-failed';
  readonly code = 'STACKABLE_RESOLUTION_FAILED';

  constructor(
    readonly node: NodeId,
    readonly slot: number,
    readonly key: string,
    readonly error: ResolutionError
  ) {
    super(`Bridge "${key}" (slot ${slot}) failed: ${error.message}`, {
      cause: error,
    });
    this.name = 'ResolutionFailedError';
    Object.setPrototypeOf(this, ResolutionFailedError.prototype);
  }
}

export class RewriteFailedError extends RenderError {
  readonly kind = 'rewrite-failed';
  readonly code = 'STACKABLE_REWRITE_FAILED';

  constructor(readonly reason: string) {
    super(`Document rewrite failed: ${reason}`);
    this.name = 'RewriteFailedError';
    Object.setPrototypeOf(this, RewriteFailedError.prototype);
  }
}

export class SessionTimeoutError extends RenderError {
  readonly kind = 'session-timeout';
  readonly code = 'STACKABLE_SESSION_TIMEOUT';

  constructor(readonly timeoutMs: number) {
    super(`Render session exceeded its ${timeoutMs}ms deadline`);
    this.name = 'SessionTimeoutError';
    Object.setPrototypeOf(this, SessionTimeoutError.prototype);
  }
}

export class SessionCancelledError extends RenderError {
  readonly kind = 'session-cancelled';
  readonly code = 'STACKABLE_SESSION_CANCELLED';

  constructor(reason?: unknown) {
    super('Render session was cancelled', { cause: reason });
    this.name = 'SessionCancelledError';
    Object.setPrototypeOf(this, SessionCancelledError.prototype);
  }
}

/** Every error a render session can report */
export type RenderFailure =
  | ResolutionFailedError
  | RewriteFailedError
  | SessionTimeoutError
  | SessionCancelledError;
