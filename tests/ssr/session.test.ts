import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  RenderSession,
  render,
  renderToStringSync,
} from '../../src/ssr/session';
import { StringSink } from '../../src/ssr/sink';
import { createAssetResolver } from '../../src/ssr/assets';
import { readHydrationPayload } from '../../src/ssr/hydration';
import {
  ResolutionFailedError,
  RewriteFailedError,
  SessionCancelledError,
  SessionTimeoutError,
} from '../../src/common/errors';
import { BridgeDuringSyncRenderError } from '../../src/common/ssr-errors';
import { InvariantError } from '../../src/dev/invariant';
import type { BridgeSpec } from '../../src/common/tree';
import {
  bridge,
  buildTree,
  element,
  fragment,
  hydrationMarker,
  raw,
  scriptAsset,
} from '../../src/tree/build';
import { delayed, hanging } from '../helpers/async';

const STATE_OPEN = '<script type="application/json" id="__STACKABLE_STATE__">';

describe('render session', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should order the payload by slot when B finishes before A', async () => {
    const log: string[] = [];
    const tree = fragment(
      raw('<div>'),
      bridge(delayed('A', 'a', 50, log)),
      bridge(delayed('B', 'b', 10, log)),
      raw('</div>'),
      hydrationMarker()
    );
    const outcome = await render(tree, { maxConcurrentResolutions: 2 });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(log).toEqual(['B', 'A']);
    expect(outcome.hydration.toString()).toBe(
      '{"v":1,"slots":[[0,"A","a"],[1,"B","b"]]}'
    );
    expect(outcome.output.toString()).toBe(
      `<div><span>a</span><span>b</span></div>${STATE_OPEN}{"v":1,"slots":[[0,"A","a"],[1,"B","b"]]}</script>`
    );
    expect(outcome.stats.peakInFlight).toBe(2);
  });

  it('should render a placeholder for a timed-out bridge in best-effort mode', async () => {
    const tree = fragment(
      raw('<main>'),
      bridge(hanging('C')),
      raw('</main>'),
      hydrationMarker()
    );
    const outcome = await render(tree, {
      perNodeTimeoutMs: 20,
      failureMode: 'best-effort',
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.output.toString()).toBe(
      `<main><template data-stackable-fallback="0"></template></main>${STATE_OPEN}{"v":1,"slots":[]}</script>`
    );
    expect(outcome.degraded).toHaveLength(1);
    expect(outcome.degraded[0]).toMatchObject({ slot: 0, key: 'C' });
    expect(outcome.degraded[0].error.kind).toBe('timeout');
    expect(console.warn).toHaveBeenCalledWith(
      '[stackable]',
      '[Scheduler] bridge "C" (slot 0) degraded: Resolution did not complete within 20ms'
    );
  });

  it('should fail the whole render in fail-fast mode and return no output', async () => {
    const signals: AbortSignal[] = [];
    const broken: BridgeSpec<string> = {
      key: 'D',
      resolve: async () => {
        throw new Error('upstream 503');
      },
      render: (v) => v,
    };
    const tree = fragment(bridge(broken), bridge(hanging('E', signals)), hydrationMarker());
    const outcome = await render(tree);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect('output' in outcome).toBe(false);
    expect(outcome.error).toBeInstanceOf(ResolutionFailedError);
    expect(outcome.error.kind).toBe('resolution-failed');
    expect(signals[0].aborted).toBe(true);
    expect(console.error).toHaveBeenCalledWith(
      '[stackable]',
      '[Session] render failed: Bridge "D" (slot 0) failed: Dependency failed: upstream 503'
    );
  });

  it('should fail a bridge whose value has array holes instead of inlining bad JSON', async () => {
    const sparse: BridgeSpec<Array<number | undefined>> = {
      key: 's',
      // eslint-disable-next-line no-sparse-arrays
      resolve: () => [1, , 3],
      render: () => '<ul></ul>',
    };
    const outcome = await render(fragment(bridge(sparse), hydrationMarker()));

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(ResolutionFailedError);
    if (!(outcome.error instanceof ResolutionFailedError)) return;
    expect(outcome.error.error.kind).toBe('internal-failure');
    expect(outcome.error.error.message).toBe(
      'Internal failure: resolved value is not serializable: array hole at $[1]'
    );
  });

  it('should fail when the document has no hydration marker', async () => {
    const outcome = await render(
      element('html', null, bridge(delayed('k', 1, 1)))
    );

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(RewriteFailedError);
    expect(outcome.error.kind).toBe('rewrite-failed');
    expect(outcome.error.message).toBe(
      'Document rewrite failed: document has no hydration marker'
    );
  });

  it('should give identical output for the same tree rendered twice', async () => {
    const tree = buildTree(
      fragment(
        bridge(delayed('one', { b: 2, a: 1 }, 5)),
        bridge(delayed('two', [3], 1)),
        hydrationMarker()
      )
    );
    const first = await render(tree);
    const second = await render(tree);

    expect(first.ok && second.ok).toBe(true);
    if (!first.ok || !second.ok) return;
    expect(second.hydration.toString()).toBe(first.hydration.toString());
    expect(second.output.toString()).toBe(first.output.toString());
    expect(first.hydration.toString()).toBe(
      '{"v":1,"slots":[[0,"one",{"a":1,"b":2}],[1,"two",[3]]]}'
    );
  });

  it('should match the sync render for a tree without bridges', async () => {
    const tree = buildTree(
      element('body', null, element('h1', null, 'Hello & welcome'), hydrationMarker())
    );
    const outcome = await render(tree);
    const sync = renderToStringSync(tree);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.output.toString()).toBe(sync);
    expect(sync).toBe(
      `<body><h1>Hello &amp; welcome</h1>${STATE_OPEN}{"v":1,"slots":[]}</script></body>`
    );
    expect(outcome.stats.poolCreated).toBe(false);
  });

  it('should refuse bridges in the sync render', () => {
    expect(() =>
      renderToStringSync(fragment(bridge(delayed('k', 1, 1)), hydrationMarker()))
    ).toThrow(BridgeDuringSyncRenderError);
  });

  it('should inline asset references', async () => {
    const outcome = await render(
      fragment(scriptAsset('main.js'), hydrationMarker()),
      { assets: createAssetResolver({ 'main.js': 'assets/main-1a2b.js' }) }
    );

    expect(outcome.ok && outcome.output.toString()).toBe(
      `<script type="module" src="/assets/main-1a2b.js"></script>${STATE_OPEN}{"v":1,"slots":[]}</script>`
    );
  });

  it('should report session-cancelled when the caller aborts', async () => {
    const controller = new AbortController();
    const signals: AbortSignal[] = [];
    setTimeout(() => controller.abort('client disconnected'), 10);
    const outcome = await render(fragment(bridge(hanging('slow', signals)), hydrationMarker()), {
      signal: controller.signal,
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(SessionCancelledError);
    expect(outcome.error.cause).toBe('client disconnected');
    expect(signals[0].aborted).toBe(true);
  });

  it('should report session-timeout at the global deadline', async () => {
    const outcome = await render(fragment(bridge(hanging('slow')), hydrationMarker()), {
      globalTimeoutMs: 15,
    });

    expect(!outcome.ok && outcome.error).toBeInstanceOf(SessionTimeoutError);
  });

  it('should honour cancel() issued before run()', async () => {
    const session = new RenderSession();
    session.cancel('not needed');
    const outcome = await session.run(
      fragment(bridge(delayed('k', 1, 1)), hydrationMarker()),
      new StringSink()
    );

    expect(!outcome.ok && outcome.error).toBeInstanceOf(SessionCancelledError);
  });

  it('should run a session only once', async () => {
    const session = new RenderSession();
    await session.run(hydrationMarker(), new StringSink());
    await expect(session.run(hydrationMarker(), new StringSink())).rejects.toThrow(
      InvariantError
    );
  });

  it('should keep concurrent sessions independent', async () => {
    const page = (value: string) =>
      fragment(bridge(delayed('user', value, value.length)), hydrationMarker());
    const [left, right] = await Promise.all([render(page('alice')), render(page('bo'))]);

    expect(left.ok && readHydrationPayload(left.hydration.toString()).get(0)?.value).toBe(
      'alice'
    );
    expect(right.ok && readHydrationPayload(right.hydration.toString()).get(0)?.value).toBe(
      'bo'
    );
  });

  it('should stream the output as bytes', async () => {
    const outcome = await render(fragment(raw('<p>é</p>'), hydrationMarker()));
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;

    expect(outcome.output.chunkCount).toBe(1);
    const parts: Buffer[] = [];
    for await (const part of outcome.output.toReadable()) {
      parts.push(Buffer.isBuffer(part) ? part : Buffer.from(String(part)));
    }
    expect(Buffer.concat(parts).toString('utf8')).toBe(outcome.output.toString());
    expect(outcome.output.toBytes().length).toBe(
      Buffer.byteLength(outcome.output.toString(), 'utf8')
    );
  });
});
