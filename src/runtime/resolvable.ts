/**
 * Resolvable node contract
 *
 * beginResolution() starts a bridge's work and returns a handle right away;
 * awaitResolution() settles with a ResolutionOutcome and never rejects.
 * Each handle owns an AbortSignal that fires on its own timeout, on
 * cancel() and when the signal it was started under aborts. Once a handle
 * has settled, anything the work produces later is discarded.
 */

import type { ArenaNode, NodeId, ResolveContext } from '../common/tree';
import { ResolutionError, toResolutionError } from '../common/errors';

export type ResolutionOutcome<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: ResolutionError };

export type HandleState =
  | 'resolving'
  | 'resolved'
  | 'failed'
  | 'timed-out'
  | 'cancelled';

export type BeginOptions = {
  slot: number;
  key: string;
  attempt?: number;
  /** Value of the enclosing bridge, passed through to resolve() */
  parent?: unknown;
  /** Cancels this resolution when aborted (usually the session signal) */
  signal?: AbortSignal;
  timeoutMs?: number;
};

function stateFor(error: ResolutionError): HandleState {
  switch (error.kind) {
    case 'timeout':
      return 'timed-out';
    case 'cancelled':
      return 'cancelled';
    default:
      return 'failed';
  }
}

export class ResolutionHandle {
  readonly node: NodeId;
  readonly slot: number;
  readonly key: string;
  readonly attempt: number;
  readonly outcome: Promise<ResolutionOutcome>;

  private readonly controller = new AbortController();
  private current: HandleState = 'resolving';
  private timer: ReturnType<typeof setTimeout> | null = null;
  private unlink: (() => void) | null = null;
  private settleWith: (outcome: ResolutionOutcome) => void = () => {};

  constructor(node: NodeId, options: BeginOptions) {
    this.node = node;
    this.slot = options.slot;
    this.key = options.key;
    this.attempt = options.attempt ?? 1;
    this.outcome = new Promise<ResolutionOutcome>((resolve) => {
      this.settleWith = resolve;
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get state(): HandleState {
    return this.current;
  }

  get settled(): boolean {
    return this.current !== 'resolving';
  }

  cancel(reason?: string): void {
    this.fail(ResolutionError.cancelled(reason));
  }

  /** @internal */
  arm(parent: AbortSignal | undefined, timeoutMs: number | undefined): void {
    if (parent) {
      if (parent.aborted) {
        this.cancel('session ended');
        return;
      }
      const onAbort = () => this.cancel('session ended');
      parent.addEventListener('abort', onAbort, { once: true });
      this.unlink = () => parent.removeEventListener('abort', onAbort);
    }
    if (timeoutMs !== undefined) {
      this.timer = setTimeout(() => {
        this.fail(ResolutionError.timeout(timeoutMs));
      }, timeoutMs);
    }
  }

  /** @internal */
  succeed(value: unknown): void {
    if (this.settled) return;
    this.current = 'resolved';
    this.release();
    this.settleWith({ ok: true, value });
  }

  /** @internal */
  fail(error: ResolutionError): void {
    if (this.settled) return;
    this.current = stateFor(error);
    this.release();
    // Cooperative: tell the work to stop; its result is ignored either way
    this.controller.abort(error);
    this.settleWith({ ok: false, error });
  }

  private release(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.unlink?.();
    this.unlink = null;
  }
}

/**
 * Start resolving a bridge node. None of the node's own code runs on the
 * caller's stack: resolve() is invoked from a microtask.
 */
export function beginResolution(
  node: ArenaNode,
  options: BeginOptions
): ResolutionHandle {
  if (node.kind !== 'bridge') {
    throw ResolutionError.internalFailure(
      `beginResolution() requires a bridge node, got ${node.kind} node ${node.id}`
    );
  }

  const handle = new ResolutionHandle(node.id, options);
  handle.arm(options.signal, options.timeoutMs);
  if (handle.settled) return handle;

  const ctx: ResolveContext = {
    signal: handle.signal,
    slot: handle.slot,
    key: handle.key,
    attempt: handle.attempt,
    parent: options.parent,
  };
  const spec = node.spec;

  void Promise.resolve()
    .then(() => {
      if (handle.settled) return undefined;
      return spec.resolve(ctx);
    })
    .then(
      (value) => handle.succeed(value),
      (err: unknown) => handle.fail(toResolutionError(err))
    );

  return handle;
}

export function awaitResolution(
  handle: ResolutionHandle
): Promise<ResolutionOutcome> {
  return handle.outcome;
}
