import type { RenderConfig } from '../common/config';
import { resolveConfig } from '../common/config';
import { InvalidConfigError } from '../common/ssr-errors';
import {
  render,
  renderToStream,
  renderToStringSync,
  toComponentTree,
  type RenderInput,
  type RenderOutcome,
  type SessionOutcome,
} from './session';

export type Renderer = {
  /** Render a tree to a complete document plus hydration payload */
  render(tree: RenderInput, overrides?: RenderConfig): Promise<RenderOutcome>;
  renderToStream(
    tree: RenderInput,
    handlers: { onChunk(html: string): void; onComplete(): void },
    overrides?: RenderConfig
  ): Promise<SessionOutcome>;
  /** Trees without bridges only */
  renderToStringSync(tree: RenderInput, overrides?: RenderConfig): string;
};

/**
 * createRenderer: binds configuration once for a server or pre-render step.
 *
 * - Configuration is validated up front
 * - Holds no per-request state: every call gets its own session
 * - After a rebuild the caller just passes the new tree
 */
export function createRenderer(config: RenderConfig = {}): Renderer {
  if (!config || typeof config !== 'object') {
    throw new InvalidConfigError('createRenderer requires a config object');
  }
  resolveConfig(config);

  const merge = (overrides?: RenderConfig): RenderConfig =>
    overrides ? { ...config, ...overrides } : config;

  return {
    render(tree, overrides) {
      return render(tree, merge(overrides));
    },
    renderToStream(tree, handlers, overrides) {
      return renderToStream(tree, { ...merge(overrides), ...handlers });
    },
    renderToStringSync(tree, overrides) {
      return renderToStringSync(tree, merge(overrides));
    },
  };
}

/**
 * Static pre-render: renders every page concurrently, each in its own
 * session, and returns the outcomes keyed by path in input order.
 *
 * Every page is built before any render starts, so a malformed tree
 * throws `InvalidTreeError` without running a single bridge.
 */
export async function prerender(
  pages: Record<string, RenderInput> | Map<string, RenderInput>,
  config: RenderConfig = {}
): Promise<Map<string, RenderOutcome>> {
  const entries =
    pages instanceof Map ? [...pages.entries()] : Object.entries(pages);
  const trees = entries.map(([, input]) => toComponentTree(input));
  const outcomes = await Promise.all(
    trees.map((tree) => render(tree, config))
  );
  const out = new Map<string, RenderOutcome>();
  entries.forEach(([path], i) => out.set(path, outcomes[i]));
  return out;
}
