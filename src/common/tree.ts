/**
 * Common call contracts: component tree
 *
 * Trees are authored as plain descriptor objects (`TreeNode`) and flattened
 * into an arena (`ComponentTree`) before a render pass. Arena nodes refer to
 * each other by index only; `parent` is a non-owning back-reference.
 */

export type Attrs = Record<string, unknown>;

/** Insertion points the document rewriter must fill */
export type Marker = { type: 'hydration' } | { type: 'asset'; name: string };

export type ResolveContext = {
  /** Aborts on per-node timeout and when the resolution is cancelled */
  signal: AbortSignal;
  slot: number;
  key: string;
  /** 1-based; greater than 1 only when the scheduler retries */
  attempt: number;
  /** Value of the nearest enclosing bridge, if any */
  parent: unknown;
};

/** Markup a resolved bridge contributes; open/close wraps its children */
export type BridgeMarkup = string | { open: string; close: string };

export type BridgeSpec<T = unknown> = {
  /** Stable identity carried into the hydration payload; defaults to `b<slot>` */
  key?: string;
  resolve(ctx: ResolveContext): Promise<T> | T;
  render(value: T): BridgeMarkup;
  /** Placeholder markup used in best-effort mode when resolution fails */
  fallback?: string;
  /** Overrides the configured per-node timeout for this node */
  timeoutMs?: number;
};

// --- Descriptors -----------------------------------------------------------

export type RawNode = { type: 'raw'; markup: string; marker?: Marker };
export type TextNode = { type: 'text'; value: string };
export type ElementNode = {
  type: 'element';
  tag: string;
  attrs?: Attrs;
  children: TreeNode[];
};
export type FragmentNode = { type: 'fragment'; children: TreeNode[] };
export type BridgeNode = {
  type: 'bridge';
  spec: BridgeSpec;
  children: TreeNode[];
};

export type TreeNode =
  | RawNode
  | TextNode
  | ElementNode
  | FragmentNode
  | BridgeNode;

// --- Arena -----------------------------------------------------------------

export type NodeId = number;

/** Set on nodes that replaced a bridge during resolution */
export type BridgeOrigin = {
  slot: number;
  key: string;
  status: 'resolved' | 'fallback';
};

export type StaticEntry = {
  kind: 'static';
  id: NodeId;
  parent: NodeId | null;
  markup: string;
  marker?: Marker;
  origin?: BridgeOrigin;
};

export type CompositeEntry = {
  kind: 'composite';
  id: NodeId;
  parent: NodeId | null;
  open: string;
  close: string;
  children: readonly NodeId[];
  origin?: BridgeOrigin;
};

export type BridgeEntry = {
  kind: 'bridge';
  id: NodeId;
  parent: NodeId | null;
  spec: BridgeSpec;
  children: readonly NodeId[];
};

export type ArenaNode = StaticEntry | CompositeEntry | BridgeEntry;

export type ComponentTree = {
  readonly root: NodeId;
  /** Indexed by NodeId; ids follow pre-order */
  readonly nodes: readonly ArenaNode[];
};

export type ResolvedNode = StaticEntry | CompositeEntry;

/** Arena after resolution: every bridge has been replaced */
export type ResolvedTree = {
  readonly root: NodeId;
  readonly nodes: readonly ResolvedNode[];
};

export function childrenOf(node: ArenaNode): readonly NodeId[] {
  return node.kind === 'static' ? [] : node.children;
}
