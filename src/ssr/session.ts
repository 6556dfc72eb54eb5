/**
 * Render session
 *
 * One session is one request: it owns a fresh state registry and drives
 * scheduler -> renderer -> rewriter. Nothing it allocates outlives run();
 * concurrent sessions share no mutable state.
 */

import type { RenderConfig, ResolvedRenderConfig } from '../common/config';
import { resolveConfig } from '../common/config';
import { RewriteFailedError, type RenderFailure } from '../common/errors';
import type { ComponentTree, TreeNode } from '../common/tree';
import { Once } from '../dev/invariant';
import { isRenderDebugEnabled, logger } from '../dev/logger';
import { StateRegistry } from '../runtime/registry';
import {
  ResolutionScheduler,
  type DegradedNode,
  type SchedulerStats,
} from '../runtime/scheduler';
import { buildTree } from '../tree/build';
import { HydrationPayload } from './hydration';
import { OutputStream } from './output';
import { asResolvedTree, renderMarkup } from './render';
import { DocumentRewriter, rewriteDocument } from './rewriter';
import { StreamSink, StringSink, type RenderSink } from './sink';

export type RenderStats = SchedulerStats & {
  /** Characters the rewriter held back at most while looking for a marker */
  maxHeldBack: number;
};

export type SessionSuccess = {
  ok: true;
  hydration: HydrationPayload;
  /** Bridges rendered as fallbacks (best-effort mode), in slot order */
  degraded: DegradedNode[];
  stats: RenderStats;
};

export type SessionFailure = {
  ok: false;
  error: RenderFailure;
  stats: RenderStats;
};

export type SessionOutcome = SessionSuccess | SessionFailure;

export type RenderResult = SessionSuccess & { output: OutputStream };

export type RenderOutcome = RenderResult | SessionFailure;

export type RenderInput = ComponentTree | TreeNode;

export function isComponentTree(input: RenderInput): input is ComponentTree {
  return 'nodes' in input && Array.isArray(input.nodes);
}

export function toComponentTree(input: RenderInput): ComponentTree {
  return isComponentTree(input) ? input : buildTree(input);
}

export class RenderSession {
  readonly config: ResolvedRenderConfig;
  private readonly once = new Once('RenderSession.run');
  private registry: StateRegistry | null = new StateRegistry();
  private scheduler: ResolutionScheduler | null = null;
  private cancelled: { reason: unknown } | null = null;

  constructor(config: RenderConfig = {}) {
    this.config = resolveConfig(config);
  }

  /** Cancel an in-flight run; it settles with `session-cancelled` */
  cancel(reason?: unknown): void {
    if (this.scheduler) {
      this.scheduler.cancel(reason);
    } else {
      this.cancelled = { reason };
    }
  }

  async run(input: RenderInput, sink: RenderSink): Promise<SessionOutcome> {
    this.once.mark();
    const registry = this.registry;
    if (!registry) throw new Error('RenderSession was disposed before run()');

    try {
      const tree = toComponentTree(input);
      const scheduler = new ResolutionScheduler(tree, registry, this.config);
      this.scheduler = scheduler;
      if (this.cancelled) scheduler.cancel(this.cancelled.reason);
      const resolution = await scheduler.run();

      if (!resolution.ok) {
        logger.error(`[Session] render failed: ${resolution.error.message}`);
        return {
          ok: false,
          error: resolution.error,
          stats: { ...resolution.stats, maxHeldBack: 0 },
        };
      }

      const hydration = registry.toPayload();
      const rewriter = new DocumentRewriter(sink, {
        payload: hydration,
        assets: this.config.assets,
        hydrationElementId: this.config.hydrationElementId,
      });

      try {
        for (const chunk of renderMarkup(resolution.tree)) {
          rewriter.write(chunk);
        }
        rewriter.end();
      } catch (err) {
        if (!(err instanceof RewriteFailedError)) throw err;
        logger.error(`[Session] ${err.message}`);
        return {
          ok: false,
          error: err,
          stats: { ...resolution.stats, maxHeldBack: rewriter.maxHeldBack },
        };
      }

      if (isRenderDebugEnabled()) {
        logger.debug(
          `[Session] rendered ${resolution.stats.bridges} bridge(s), ${hydration.size} hydrated, ${resolution.degraded.length} degraded`
        );
      }

      return {
        ok: true,
        hydration,
        degraded: resolution.degraded,
        stats: { ...resolution.stats, maxHeldBack: rewriter.maxHeldBack },
      };
    } finally {
      this.dispose();
    }
  }

  private dispose(): void {
    this.registry = null;
    this.scheduler = null;
  }
}

/**
 * Render a tree to a complete document. On failure no partial output is
 * returned.
 */
export async function render(
  input: RenderInput,
  config: RenderConfig = {}
): Promise<RenderOutcome> {
  const sink = new StringSink();
  const outcome = await new RenderSession(config).run(input, sink);
  if (!outcome.ok) return outcome;
  return { ...outcome, output: new OutputStream(sink.toChunks()) };
}

export type StreamOptions = RenderConfig & {
  onChunk(html: string): void;
  onComplete(): void;
};

/**
 * Render a tree, handing each rewritten chunk to `onChunk` as soon as it
 * exists. Bridges are resolved before the first chunk is produced, so a
 * resolution failure emits nothing. A rewrite failure can happen after
 * some chunks went out; `onComplete` is then never called and the outcome
 * carries the error.
 */
export function renderToStream(
  input: RenderInput,
  options: StreamOptions
): Promise<SessionOutcome> {
  const { onChunk, onComplete, ...config } = options;
  return new RenderSession(config).run(
    input,
    new StreamSink(onChunk, onComplete)
  );
}

/**
 * Synchronous render for trees without bridges. Throws
 * BridgeDuringSyncRenderError if the tree has any, and RewriteFailedError
 * for marker problems.
 */
export function renderToStringSync(
  input: RenderInput,
  config: RenderConfig = {}
): string {
  const resolved = resolveConfig(config);
  const tree = asResolvedTree(toComponentTree(input));
  const sink = new StringSink();
  rewriteDocument(renderMarkup(tree), sink, {
    payload: HydrationPayload.empty(),
    assets: resolved.assets,
    hydrationElementId: resolved.hydrationElementId,
  });
  return sink.toString();
}
