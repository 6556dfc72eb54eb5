/**
 * Tree descriptors and arena construction
 *
 * Descriptors are plain data; `buildTree` flattens them into the indexed
 * arena the scheduler and renderer walk. Node ids are assigned in pre-order,
 * which is also the order bridge slots are handed out in.
 */

import type {
  ArenaNode,
  Attrs,
  BridgeNode,
  BridgeSpec,
  ComponentTree,
  FragmentNode,
  ElementNode,
  Marker,
  NodeId,
  RawNode,
  TextNode,
  TreeNode,
} from '../common/tree';
import { MAX_TIMEOUT_MS } from '../common/config';
import { InvalidTreeError } from '../common/ssr-errors';
import { renderAttrs } from '../ssr/attrs';
import { VOID_ELEMENTS, escapeText } from '../ssr/escape';
import { formatMarker, isValidAssetName } from '../ssr/markers';

export type Child = TreeNode | string | number | null | undefined | false;

const TAG_RE = /^[A-Za-z][A-Za-z0-9-]*$/;

function normalizeChildren(children: Child[]): TreeNode[] {
  const out: TreeNode[] = [];
  for (const c of children) {
    if (c === null || c === undefined || c === false) continue;
    if (typeof c === 'string' || typeof c === 'number') {
      out.push(text(c));
    } else {
      out.push(c);
    }
  }
  return out;
}

/** Trusted markup, emitted as-is */
export function raw(markup: string): RawNode {
  return { type: 'raw', markup };
}

/** Text content, escaped */
export function text(value: string | number): TextNode {
  return { type: 'text', value: String(value) };
}

export function element(
  tag: string,
  attrs?: Attrs | null,
  ...children: Child[]
): ElementNode {
  return {
    type: 'element',
    tag,
    attrs: attrs ?? undefined,
    children: normalizeChildren(children),
  };
}

export function fragment(...children: Child[]): FragmentNode {
  return { type: 'fragment', children: normalizeChildren(children) };
}

/**
 * A node whose markup depends on asynchronous work. Children are rendered
 * inside it and may themselves be bridges that read this node's value.
 */
export function bridge<T>(
  spec: BridgeSpec<T>,
  ...children: Child[]
): BridgeNode {
  return { type: 'bridge', spec, children: normalizeChildren(children) };
}

/** Where the hydration payload is inlined */
export function hydrationMarker(): RawNode {
  const marker: Marker = { type: 'hydration' };
  return { type: 'raw', markup: formatMarker(marker), marker };
}

/** Replaced by the served reference of a logical asset */
export function assetMarker(name: string): RawNode {
  if (!isValidAssetName(name)) {
    throw new InvalidTreeError(`invalid asset name: ${JSON.stringify(name)}`);
  }
  const marker: Marker = { type: 'asset', name };
  return { type: 'raw', markup: formatMarker(marker), marker };
}

export function scriptAsset(name: string): FragmentNode {
  return fragment(
    raw('<script type="module" src="'),
    assetMarker(name),
    raw('"></script>')
  );
}

export function styleAsset(name: string): FragmentNode {
  return fragment(
    raw('<link rel="stylesheet" href="'),
    assetMarker(name),
    raw('" />')
  );
}

function checkBridgeSpec(spec: BridgeSpec): void {
  if (!spec || typeof spec !== 'object') {
    throw new InvalidTreeError('bridge() requires a spec object');
  }
  if (typeof spec.resolve !== 'function' || typeof spec.render !== 'function') {
    throw new InvalidTreeError('bridge spec requires resolve() and render()');
  }
  if (
    spec.timeoutMs !== undefined &&
    (!Number.isFinite(spec.timeoutMs) ||
      spec.timeoutMs <= 0 ||
      spec.timeoutMs > MAX_TIMEOUT_MS)
  ) {
    throw new InvalidTreeError(
      `bridge timeoutMs must be a positive number up to ${MAX_TIMEOUT_MS}, got ${String(spec.timeoutMs)}`
    );
  }
}

function toArenaNode(
  desc: TreeNode,
  id: NodeId,
  parent: NodeId | null
): ArenaNode {
  switch (desc.type) {
    case 'raw':
      return desc.marker
        ? {
            kind: 'static',
            id,
            parent,
            markup: desc.markup,
            marker: desc.marker,
          }
        : { kind: 'static', id, parent, markup: desc.markup };
    case 'text':
      return { kind: 'static', id, parent, markup: escapeText(desc.value) };
    case 'fragment':
      return {
        kind: 'composite',
        id,
        parent,
        open: '',
        close: '',
        children: [],
      };
    case 'element': {
      if (!TAG_RE.test(desc.tag)) {
        throw new InvalidTreeError(
          `invalid element tag: ${JSON.stringify(desc.tag)}`
        );
      }
      const attrs = renderAttrs(desc.attrs);
      if (VOID_ELEMENTS.has(desc.tag)) {
        if (desc.children.length > 0) {
          throw new InvalidTreeError(
            `void element <${desc.tag}> cannot have children`
          );
        }
        return {
          kind: 'composite',
          id,
          parent,
          open: `<${desc.tag}${attrs} />`,
          close: '',
          children: [],
        };
      }
      return {
        kind: 'composite',
        id,
        parent,
        open: `<${desc.tag}${attrs}>`,
        close: `</${desc.tag}>`,
        children: [],
      };
    }
    case 'bridge':
      checkBridgeSpec(desc.spec);
      return { kind: 'bridge', id, parent, spec: desc.spec, children: [] };
  }
}

function descriptorChildren(desc: TreeNode): TreeNode[] {
  return desc.type === 'raw' || desc.type === 'text' ? [] : desc.children;
}

/**
 * Flatten a descriptor tree into an arena. Iterative so that very deep or
 * very wide trees do not hit the call stack limit.
 *
 * A descriptor object may appear only once: shared sub-structures and
 * cycles are rejected with InvalidTreeError.
 */
export function buildTree(root: TreeNode): ComponentTree {
  const nodes: ArenaNode[] = [];
  const childLists: NodeId[][] = [];
  const seen = new Set<TreeNode>();
  const stack: Array<{ desc: TreeNode; parent: NodeId | null }> = [
    { desc: root, parent: null },
  ];

  while (stack.length > 0) {
    const top = stack.pop();
    if (!top) break;
    const { desc, parent } = top;

    if (!desc || typeof desc !== 'object' || !('type' in desc)) {
      throw new InvalidTreeError(`not a tree node: ${String(desc)}`);
    }
    if (seen.has(desc)) {
      throw new InvalidTreeError(
        'a tree node appears more than once (shared or cyclic structure); build a separate node for each position'
      );
    }
    seen.add(desc);

    const id = nodes.length;
    const children: NodeId[] = [];
    nodes.push(toArenaNode(desc, id, parent));
    childLists.push(children);
    if (parent !== null) childLists[parent].push(id);

    // Push in reverse so siblings are visited in order
    const kids = descriptorChildren(desc);
    for (let i = kids.length - 1; i >= 0; i--) {
      stack.push({ desc: kids[i], parent: id });
    }
  }

  for (const node of nodes) {
    if (node.kind !== 'static') node.children = childLists[node.id];
  }

  return { root: 0, nodes };
}

/** Number of bridge nodes in a tree */
export function countBridges(tree: ComponentTree): number {
  let n = 0;
  for (const node of tree.nodes) if (node.kind === 'bridge') n++;
  return n;
}
