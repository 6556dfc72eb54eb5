import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ResolutionScheduler, resolveTree } from '../../src/runtime/scheduler';
import { StateRegistry } from '../../src/runtime/registry';
import { resolveConfig, type RenderConfig } from '../../src/common/config';
import {
  ResolutionFailedError,
  SessionCancelledError,
  SessionTimeoutError,
} from '../../src/common/errors';
import type { BridgeSpec, ComponentTree, ResolvedTree } from '../../src/common/tree';
import { bridge, buildTree, element, fragment, raw } from '../../src/tree/build';
import { renderMarkup } from '../../src/ssr/render';
import { delayed, hanging, sleep } from '../helpers/async';

function markupOf(tree: ResolvedTree): string {
  let out = '';
  for (const chunk of renderMarkup(tree)) out += chunk.markup;
  return out;
}

function run(tree: ComponentTree, config: RenderConfig = {}) {
  const registry = new StateRegistry();
  const result = resolveTree(tree, registry, resolveConfig(config));
  return { registry, result };
}

describe('resolution scheduler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should keep slot order when completions arrive out of order', async () => {
    const log: string[] = [];
    const tree = buildTree(
      fragment(
        raw('<div>'),
        bridge(delayed('A', 'a', 50, log)),
        bridge(delayed('B', 'b', 10, log)),
        raw('</div>')
      )
    );
    const { registry, result } = run(tree, { maxConcurrentResolutions: 2 });
    const res = await result;

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(log).toEqual(['B', 'A']);
    expect(registry.entries().map((e) => [e.slot, e.key, e.state])).toEqual([
      [0, 'A', '"a"'],
      [1, 'B', '"b"'],
    ]);
    expect(res.stats.peakInFlight).toBe(2);
    expect(markupOf(res.tree)).toBe('<div><span>a</span><span>b</span></div>');
  });

  it('should start nested bridges after their parent and hand them its value', async () => {
    const order: string[] = [];
    const parents: unknown[] = [];
    const user: BridgeSpec<{ id: number }> = {
      key: 'user',
      resolve: async () => {
        await sleep(10);
        order.push('user');
        return { id: 7 };
      },
      render: (u) => ({ open: `<section data-user="${u.id}">`, close: '</section>' }),
    };
    const posts: BridgeSpec<string[]> = {
      key: 'posts',
      resolve: (ctx) => {
        order.push('posts');
        parents.push(ctx.parent);
        return ['p1'];
      },
      render: (p) => `<ul>${p.length}</ul>`,
    };

    const tree = buildTree(bridge(user, bridge(posts)));
    const { registry, result } = run(tree);
    const res = await result;

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(order).toEqual(['user', 'posts']);
    expect(parents).toEqual([{ id: 7 }]);
    expect(markupOf(res.tree)).toBe('<section data-user="7"><ul>1</ul></section>');
    expect(registry.toPayload().toString()).toBe(
      '{"v":1,"slots":[[0,"user",{"id":7}],[1,"posts",["p1"]]]}'
    );
  });

  it('should report every state transition', async () => {
    const events: string[] = [];
    const tree = buildTree(bridge(delayed('only', 1, 1)));
    const { result } = run(tree, {
      onTransition: (e) => events.push(`${e.slot}:${e.from}->${e.to}`),
    });
    await result;

    expect(events).toEqual(['0:discovered->resolving', '0:resolving->resolved']);
  });

  it('should not create a pool for a tree without bridges', async () => {
    const { registry, result } = run(buildTree(element('p', null, 'hi')));
    const res = await result;

    expect(res.ok).toBe(true);
    expect(res.stats).toEqual({
      bridges: 0,
      resolved: 0,
      degraded: 0,
      retries: 0,
      peakInFlight: 0,
      poolCreated: false,
    });
    expect(registry.isFrozen()).toBe(true);
  });

  it('should never exceed the concurrency bound', async () => {
    let running = 0;
    let maxRunning = 0;
    const spec = (i: number): BridgeSpec<number> => ({
      key: `n${i}`,
      resolve: async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await sleep(5);
        running--;
        return i;
      },
      render: String,
    });
    const tree = buildTree(
      fragment(...[0, 1, 2, 3, 4, 5].map((i) => bridge(spec(i))))
    );
    const { registry, result } = run(tree, { maxConcurrentResolutions: 2 });
    const res = await result;

    expect(res.ok).toBe(true);
    expect(res.stats.peakInFlight).toBe(2);
    expect(maxRunning).toBe(2);
    expect(registry.entries().map((e) => e.state)).toEqual(['0', '1', '2', '3', '4', '5']);
  });

  it('should retry dependency failures up to maxRetries', async () => {
    const attempts: number[] = [];
    const flaky: BridgeSpec<string> = {
      key: 'flaky',
      resolve: ({ attempt }) => {
        attempts.push(attempt);
        if (attempt === 1) throw new Error('connection reset');
        return 'ok';
      },
      render: (v) => v,
    };
    const { result } = run(buildTree(bridge(flaky)), { maxRetries: 1 });
    const res = await result;

    expect(res.ok).toBe(true);
    expect(attempts).toEqual([1, 2]);
    expect(res.stats.retries).toBe(1);
  });

  it('should not retry timeouts', async () => {
    const tree = buildTree(bridge({ ...hanging('slow'), timeoutMs: 5 }));
    const { result } = run(tree, { maxRetries: 2, failureMode: 'best-effort' });
    const res = await result;

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.stats.retries).toBe(0);
    expect(res.degraded.map((d) => d.error.kind)).toEqual(['timeout']);
  });

  it('should abort siblings on the first failure in fail-fast mode', async () => {
    const signals: AbortSignal[] = [];
    const events: string[] = [];
    const broken: BridgeSpec<string> = {
      key: 'D',
      resolve: () => {
        throw new Error('db down');
      },
      render: (v) => v,
    };
    const tree = buildTree(fragment(bridge(broken), bridge(hanging('E', signals))));
    const { registry, result } = run(tree, {
      onTransition: (e) => events.push(`${e.key}:${e.to}`),
    });
    const res = await result;

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(ResolutionFailedError);
    expect(res.error.message).toBe('Bridge "D" (slot 0) failed: Dependency failed: db down');
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
    expect(events).toEqual(['D:resolving', 'E:resolving', 'D:failed', 'E:cancelled']);
    expect(registry.entries()).toEqual([]);
  });

  it('should blame the bridge whose job threw, not the first one in flight', async () => {
    class RejectingRegistry extends StateRegistry {
      record(slot: number, state: string): void {
        if (slot === 1) throw new Error('registry unavailable');
        super.record(slot, state);
      }
    }
    const signals: AbortSignal[] = [];
    const tree = buildTree(
      fragment(bridge(hanging('first', signals)), bridge(delayed('second', 'x', 1)))
    );
    const res = await resolveTree(tree, new RejectingRegistry(), resolveConfig());

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(ResolutionFailedError);
    if (!(res.error instanceof ResolutionFailedError)) return;
    expect(res.error.slot).toBe(1);
    expect(res.error.key).toBe('second');
    expect(res.error.error.kind).toBe('internal-failure');
    expect(res.error.message).toBe(
      'Bridge "second" (slot 1) failed: Internal failure: resolution job threw'
    );
    expect(signals[0].aborted).toBe(true);
  });

  it('should degrade a failed bridge and cancel its dependents in best-effort mode', async () => {
    const childResolve = vi.fn(() => 'never');
    const parentSpec: BridgeSpec<string> = {
      key: 'user',
      resolve: () => {
        throw new Error('unauthorized');
      },
      render: (v) => v,
    };
    const tree = buildTree(
      fragment(
        bridge(parentSpec, bridge({ key: 'posts', resolve: childResolve, render: String })),
        bridge({ ...delayed('side', 'ok', 1), fallback: '<p>offline</p>' }),
        raw('<p>after</p>')
      )
    );
    const { registry, result } = run(tree, { failureMode: 'best-effort' });
    const res = await result;

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(childResolve).not.toHaveBeenCalled();
    expect(res.degraded.map((d) => [d.slot, d.key, d.error.kind])).toEqual([
      [0, 'user', 'dependency-failed'],
      [1, 'posts', 'cancelled'],
    ]);
    expect(res.stats).toMatchObject({ bridges: 3, resolved: 1, degraded: 2 });
    expect(markupOf(res.tree)).toBe(
      '<template data-stackable-fallback="0"></template><span>ok</span><p>after</p>'
    );
    expect(registry.entries().map((e) => e.key)).toEqual(['side']);
    expect(console.warn).toHaveBeenCalledWith(
      '[stackable]',
      '[Scheduler] bridge "user" (slot 0) degraded: Dependency failed: unauthorized'
    );
  });

  it('should use the bridge fallback markup when it has one', async () => {
    const spec: BridgeSpec<string> = {
      key: 'ad',
      resolve: () => {
        throw new Error('blocked');
      },
      render: (v) => v,
      fallback: '<p>offline</p>',
    };
    const { result } = run(buildTree(bridge(spec)), { failureMode: 'best-effort' });
    const res = await result;

    expect(res.ok && markupOf(res.tree)).toBe('<p>offline</p>');
  });

  it('should fail a bridge whose render() throws', async () => {
    const spec: BridgeSpec<string> = {
      key: 'x',
      resolve: () => 'v',
      render: () => {
        throw new Error('bad template');
      },
    };
    const { result } = run(buildTree(bridge(spec)));
    const res = await result;

    expect(!res.ok && res.error.message).toBe(
      'Bridge "x" (slot 0) failed: Internal failure: render() of bridge "x" threw'
    );
  });

  it('should fail a bridge whose value cannot be serialized', async () => {
    const spec: BridgeSpec<undefined> = {
      key: 'void',
      resolve: () => undefined,
      render: () => '',
    };
    const { result } = run(buildTree(bridge(spec)));
    const res = await result;

    expect(res.ok).toBe(false);
    if (res.ok || !(res.error instanceof ResolutionFailedError)) return;
    expect(res.error.error.kind).toBe('internal-failure');
    expect(res.error.error.message).toBe(
      'Internal failure: resolved value is not serializable: undefined at $'
    );
  });

  it('should leave the input tree untouched', async () => {
    const tree = buildTree(fragment(raw('<i>'), bridge(delayed('k', 1, 1))));
    const { result } = run(tree);
    await result;

    expect(tree.nodes[2].kind).toBe('bridge');
  });

  it('should fail the run at the global deadline', async () => {
    const signals: AbortSignal[] = [];
    const { result } = run(buildTree(bridge(hanging('slow', signals))), {
      globalTimeoutMs: 20,
      failureMode: 'best-effort',
    });
    const res = await result;

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(SessionTimeoutError);
    expect(res.error.message).toBe('Render session exceeded its 20ms deadline');
    expect(signals[0].aborted).toBe(true);
  });

  it('should cancel in-flight work on cancel()', async () => {
    const signals: AbortSignal[] = [];
    const tree = buildTree(bridge(hanging('slow', signals)));
    const scheduler = new ResolutionScheduler(tree, new StateRegistry(), resolveConfig());
    const pending = scheduler.run();
    setTimeout(() => scheduler.cancel('client went away'), 5);
    const res = await pending;

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(SessionCancelledError);
    expect(res.error.cause).toBe('client went away');
    expect(signals[0].aborted).toBe(true);
  });

  it('should report cancellation when the external signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort('shutdown');
    const { result } = run(buildTree(raw('<p></p>')), { signal: controller.signal });
    const res = await result;

    expect(res.ok).toBe(false);
    expect(!res.ok && res.error).toBeInstanceOf(SessionCancelledError);
  });
});
