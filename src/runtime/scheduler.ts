/**
 * Resolution scheduler
 *
 * Turns a component tree into a resolved tree plus a filled state registry.
 *
 * Key ideas:
 * - Discovery walks the arena in pre-order and allocates every slot before
 *   any work starts, so slot order never depends on completion order.
 * - Bridges without an enclosing bridge are independent and all go to the
 *   bounded pool at once. A bridge nested in another bridge waits for that
 *   ancestor and receives its value as `parent`.
 * - The arena is copied; resolved bridges are swapped for static markup in
 *   the copy, so the caller's tree can be rendered again.
 * - One AbortController per run. It aborts on the global deadline, on
 *   external cancellation and (fail-fast) on the first node failure;
 *   aborting cancels every in-flight handle and drops queued work.
 */

import type {
  ArenaNode,
  BridgeEntry,
  ComponentTree,
  NodeId,
  ResolvedNode,
  ResolvedTree,
} from '../common/tree';
import { childrenOf } from '../common/tree';
import type {
  NodeState,
  ResolvedRenderConfig,
  TransitionEvent,
} from '../common/config';
import {
  ResolutionError,
  ResolutionFailedError,
  SessionCancelledError,
  SessionTimeoutError,
} from '../common/errors';
import { invariant } from '../dev/invariant';
import { isRenderDebugEnabled, logger } from '../dev/logger';
import { serializeState } from '../ssr/hydration';
import { escapeAttr } from '../ssr/escape';
import type { StateRegistry } from './registry';
import { ResolutionPool } from './pool';
import {
  awaitResolution,
  beginResolution,
  type ResolutionHandle,
  type ResolutionOutcome,
} from './resolvable';

export type DegradedNode = {
  node: NodeId;
  slot: number;
  key: string;
  error: ResolutionError;
};

export type SchedulerStats = {
  bridges: number;
  resolved: number;
  degraded: number;
  retries: number;
  peakInFlight: number;
  /** false when the tree had no bridges and no pool was ever created */
  poolCreated: boolean;
};

export type SchedulerError =
  | ResolutionFailedError
  | SessionTimeoutError
  | SessionCancelledError;

export type SchedulerResult =
  | {
      ok: true;
      tree: ResolvedTree;
      degraded: DegradedNode[];
      stats: SchedulerStats;
    }
  | { ok: false; error: SchedulerError; stats: SchedulerStats };

type BridgeRecord = {
  slot: number;
  key: string;
  entry: BridgeEntry;
  parentSlot: number | null;
  dependents: number[];
  state: NodeState;
  value: unknown;
};

const TERMINAL: ReadonlySet<NodeState> = new Set([
  'resolved',
  'failed',
  'timed-out',
  'cancelled',
]);

export function defaultFallback(slot: number): string {
  const attr = escapeAttr(String(slot));
  return `<template data-stackable-fallback="${attr}"></template>`;
}

function isSchedulerError(reason: unknown): reason is SchedulerError {
  return (
    reason instanceof ResolutionFailedError ||
    reason instanceof SessionTimeoutError ||
    reason instanceof SessionCancelledError
  );
}

function stateForError(error: ResolutionError): NodeState {
  if (error.kind === 'timeout') return 'timed-out';
  if (error.kind === 'cancelled') return 'cancelled';
  return 'failed';
}

export class ResolutionScheduler {
  private readonly records: BridgeRecord[] = [];
  private readonly bySlot = new Map<number, BridgeRecord>();
  private readonly working: ArenaNode[];
  private readonly degraded: DegradedNode[] = [];
  private readonly inFlight = new Set<ResolutionHandle>();
  private readonly controller = new AbortController();

  private pool: ResolutionPool | null = null;
  private pending = 0;
  private retries = 0;
  private resolvedCount = 0;
  private discovered = false;
  private finish: () => void = () => {};

  constructor(
    private readonly tree: ComponentTree,
    private readonly registry: StateRegistry,
    private readonly config: ResolvedRenderConfig
  ) {
    this.working = tree.nodes.slice();
  }

  /**
   * Pre-order walk allocating one slot per bridge. Returns the slot count.
   * Must run before any resolution starts; run() calls it if needed.
   */
  discover(): number {
    if (this.discovered) return this.records.length;
    this.discovered = true;

    const { nodes, root } = this.tree;
    // Each stack frame carries the slot of the nearest enclosing bridge
    const stack: Array<{ id: NodeId; owner: number | null }> = [
      { id: root, owner: null },
    ];
    while (stack.length > 0) {
      const top = stack.pop();
      if (!top) break;
      const node = nodes[top.id];
      invariant(node !== undefined, `dangling node id ${top.id}`);

      let owner = top.owner;
      if (node.kind === 'bridge') {
        const slot = this.registry.allocate(node.id, node.spec.key);
        const record: BridgeRecord = {
          slot,
          key: this.registry.info(slot).key,
          entry: node,
          parentSlot: owner,
          dependents: [],
          state: 'discovered',
          value: undefined,
        };
        this.records.push(record);
        this.bySlot.set(slot, record);
        if (owner !== null) this.record(owner).dependents.push(slot);
        owner = slot;
      }

      const kids = childrenOf(node);
      for (let i = kids.length - 1; i >= 0; i--) {
        stack.push({ id: kids[i], owner });
      }
    }

    this.pending = this.records.length;
    return this.records.length;
  }

  async run(): Promise<SchedulerResult> {
    this.discover();

    const external = this.config.signal;
    if (external?.aborted) {
      this.controller.abort(new SessionCancelledError(external.reason));
    }
    // Cancelled before any work started
    if (this.controller.signal.aborted) {
      this.cancelRemaining();
      this.registry.freeze();
      return { ok: false, error: this.abortReason(), stats: this.stats() };
    }

    if (this.records.length === 0) {
      this.registry.freeze();
      return {
        ok: true,
        tree: this.resolvedTree(),
        degraded: [],
        stats: this.stats(),
      };
    }

    const onExternalAbort = () =>
      this.controller.abort(new SessionCancelledError(external?.reason));
    external?.addEventListener('abort', onExternalAbort, { once: true });

    const deadline = setTimeout(() => {
      this.controller.abort(
        new SessionTimeoutError(this.config.globalTimeoutMs)
      );
    }, this.config.globalTimeoutMs);

    const done = new Promise<void>((resolve) => {
      this.finish = resolve;
    });
    const onAbort = () => this.onSessionAbort();
    this.controller.signal.addEventListener('abort', onAbort, { once: true });

    const pool = new ResolutionPool(this.config.maxConcurrentResolutions);
    this.pool = pool;

    try {
      for (const record of this.records) {
        if (record.parentSlot === null) this.enqueue(record);
      }
      await done;
    } finally {
      clearTimeout(deadline);
      external?.removeEventListener('abort', onExternalAbort);
      this.controller.signal.removeEventListener('abort', onAbort);
      pool.close();
      this.registry.freeze();
    }

    if (this.controller.signal.aborted) {
      return { ok: false, error: this.abortReason(), stats: this.stats() };
    }

    this.degraded.sort((a, b) => a.slot - b.slot);
    return {
      ok: true,
      tree: this.resolvedTree(),
      degraded: this.degraded.slice(),
      stats: this.stats(),
    };
  }

  /** Abort the run from outside (session cancellation) */
  cancel(reason?: unknown): void {
    this.controller.abort(new SessionCancelledError(reason));
  }

  private abortReason(): SchedulerError {
    const reason: unknown = this.controller.signal.reason;
    invariant(
      isSchedulerError(reason),
      'scheduler aborted without a session error',
      { reason: String(reason) }
    );
    return reason;
  }

  private record(slot: number): BridgeRecord {
    const record = this.bySlot.get(slot);
    invariant(record !== undefined, `unknown slot ${slot}`);
    return record;
  }

  private enqueue(record: BridgeRecord): void {
    const pool = this.pool;
    invariant(pool !== null, 'enqueue() before the pool exists');
    pool.submit(async () => {
      try {
        await this.resolveRecord(record);
      } catch (err) {
        this.controller.abort(this.internalFailure(record, err));
      }
    });
  }

  private async resolveRecord(record: BridgeRecord): Promise<void> {
    const signal = this.controller.signal;
    if (signal.aborted || record.state !== 'discovered') return;

    this.transition(record, 'resolving');
    const spec = record.entry.spec;
    const parent =
      record.parentSlot === null
        ? undefined
        : this.record(record.parentSlot).value;
    const timeoutMs = spec.timeoutMs ?? this.config.perNodeTimeoutMs;

    let outcome: ResolutionOutcome;
    let attempt = 1;
    for (;;) {
      const handle = beginResolution(record.entry, {
        slot: record.slot,
        key: record.key,
        attempt,
        parent,
        signal,
        timeoutMs,
      });
      this.inFlight.add(handle);
      outcome = await awaitResolution(handle);
      this.inFlight.delete(handle);

      // Session is ending; onSessionAbort() settles the remaining records
      if (signal.aborted) return;

      if (
        !outcome.ok &&
        outcome.error.kind === 'dependency-failed' &&
        attempt <= this.config.maxRetries
      ) {
        attempt++;
        this.retries++;
        if (isRenderDebugEnabled()) {
          logger.debug(
            `[Scheduler] retrying slot ${record.slot} (attempt ${attempt})`
          );
        }
        continue;
      }
      break;
    }

    if (outcome.ok) {
      this.complete(record, outcome.value);
    } else {
      this.fail(record, outcome.error);
    }
  }

  private complete(record: BridgeRecord, value: unknown): void {
    const { entry } = record;
    let replacement: ResolvedNode;
    let state: string;
    try {
      state = serializeState(value);
      replacement = this.replacementFor(record, value);
    } catch (err) {
      this.fail(
        record,
        err instanceof ResolutionError
          ? err
          : ResolutionError.internalFailure(
              `render() of bridge "${record.key}" threw`,
              err
            )
      );
      return;
    }

    this.registry.record(record.slot, state);
    this.working[entry.id] = replacement;
    record.value = value;
    this.resolvedCount++;
    this.transition(record, 'resolved');

    for (const slot of record.dependents) this.enqueue(this.record(slot));
    this.settle(record);
  }

  private replacementFor(record: BridgeRecord, value: unknown): ResolvedNode {
    const { entry } = record;
    const origin = {
      slot: record.slot,
      key: record.key,
      status: 'resolved' as const,
    };
    const markup = entry.spec.render(value);

    let open: string;
    let close: string;
    if (typeof markup === 'string') {
      open = markup;
      close = '';
    } else if (
      markup &&
      typeof markup === 'object' &&
      typeof markup.open === 'string' &&
      typeof markup.close === 'string'
    ) {
      open = markup.open;
      close = markup.close;
    } else {
      throw ResolutionError.internalFailure(
        `render() of bridge "${record.key}" must return a string or { open, close }`
      );
    }

    if (entry.children.length === 0) {
      return {
        kind: 'static',
        id: entry.id,
        parent: entry.parent,
        markup: open + close,
        origin,
      };
    }
    return {
      kind: 'composite',
      id: entry.id,
      parent: entry.parent,
      open,
      close,
      children: entry.children,
      origin,
    };
  }

  private fallbackFor(record: BridgeRecord): ResolvedNode {
    const { entry } = record;
    return {
      kind: 'static',
      id: entry.id,
      parent: entry.parent,
      markup: entry.spec.fallback ?? defaultFallback(record.slot),
      origin: { slot: record.slot, key: record.key, status: 'fallback' },
    };
  }

  private fail(record: BridgeRecord, error: ResolutionError): void {
    this.transition(record, stateForError(error), error);

    if (this.config.failureMode === 'fail-fast') {
      this.settle(record);
      this.controller.abort(
        new ResolutionFailedError(
          record.entry.id,
          record.slot,
          record.key,
          error
        )
      );
      return;
    }

    logger.warn(
      `[Scheduler] bridge "${record.key}" (slot ${record.slot}) degraded: ${error.message}`
    );
    this.degrade(record, error);
    this.settle(record);

    // Dependents never start: the fallback replaces their whole subtree
    const skipped = ResolutionError.cancelled(
      `enclosing bridge "${record.key}" did not resolve`
    );
    const stack = record.dependents.slice().reverse();
    while (stack.length > 0) {
      const slot = stack.pop();
      if (slot === undefined) break;
      const dep = this.record(slot);
      this.transition(dep, 'cancelled', skipped);
      this.degrade(dep, skipped);
      this.settle(dep);
      for (let i = dep.dependents.length - 1; i >= 0; i--) {
        stack.push(dep.dependents[i]);
      }
    }
  }

  private degrade(record: BridgeRecord, error: ResolutionError): void {
    this.working[record.entry.id] = this.fallbackFor(record);
    this.degraded.push({
      node: record.entry.id,
      slot: record.slot,
      key: record.key,
      error,
    });
  }

  /** Count a record as terminal; resolves the run when none are left */
  private settle(record: BridgeRecord): void {
    invariant(
      TERMINAL.has(record.state),
      `settle() on non-terminal slot ${record.slot}`
    );
    this.pending--;
    if (this.pending === 0) this.finish();
  }

  private onSessionAbort(): void {
    this.pool?.close();
    for (const handle of this.inFlight) handle.cancel('session aborted');
    this.inFlight.clear();
    this.cancelRemaining();
    this.finish();
  }

  private cancelRemaining(): void {
    const cancelled = ResolutionError.cancelled('session aborted');
    for (const record of this.records) {
      if (!TERMINAL.has(record.state)) {
        this.transition(record, 'cancelled', cancelled);
      }
    }
  }

  private transition(
    record: BridgeRecord,
    to: NodeState,
    error?: ResolutionError
  ): void {
    const from = record.state;
    invariant(!TERMINAL.has(from), `slot ${record.slot} is already ${from}`, {
      to,
    });
    record.state = to;

    if (isRenderDebugEnabled()) {
      logger.debug(
        `[Scheduler] slot ${record.slot} (${record.key}): ${from} -> ${to}`
      );
    }

    const hook = this.config.onTransition;
    if (!hook) return;
    const event: TransitionEvent = {
      node: record.entry.id,
      slot: record.slot,
      key: record.key,
      from,
      to,
    };
    if (error) event.error = error;
    try {
      hook(event);
    } catch (err) {
      logger.error('[Scheduler] onTransition hook threw:', err);
    }
  }

  private internalFailure(
    record: BridgeRecord,
    err: unknown
  ): ResolutionFailedError {
    return new ResolutionFailedError(
      record.entry.id,
      record.slot,
      record.key,
      ResolutionError.internalFailure('resolution job threw', err)
    );
  }

  private resolvedTree(): ResolvedTree {
    const nodes: ResolvedNode[] = [];
    for (const node of this.working) {
      invariant(
        node.kind !== 'bridge',
        `bridge node ${node.id} left unresolved`
      );
      nodes.push(node);
    }
    return { root: this.tree.root, nodes };
  }

  private stats(): SchedulerStats {
    return {
      bridges: this.records.length,
      resolved: this.resolvedCount,
      degraded: this.degraded.length,
      retries: this.retries,
      peakInFlight: this.pool?.getState().peakInFlight ?? 0,
      poolCreated: this.pool !== null,
    };
  }
}

/** Resolve every bridge of a tree into a registry (one-shot convenience) */
export function resolveTree(
  tree: ComponentTree,
  registry: StateRegistry,
  config: ResolvedRenderConfig
): Promise<SchedulerResult> {
  return new ResolutionScheduler(tree, registry, config).run();
}
