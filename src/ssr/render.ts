/**
 * Markup renderer
 *
 * Walks a resolved tree in the same pre-order used for slot allocation and
 * yields markup chunks lazily. Purely a transform over resolved data: no
 * I/O, no awaiting, same output for the same tree.
 */

import type {
  ComponentTree,
  Marker,
  NodeId,
  ResolvedNode,
  ResolvedTree,
} from '../common/tree';
import { BridgeDuringSyncRenderError } from '../common/ssr-errors';
import { Once, invariant } from '../dev/invariant';

export type MarkupChunk = {
  /** Node the markup came from */
  node: NodeId;
  markup: string;
  /** Set when the chunk is an insertion point for the rewriter */
  marker?: Marker;
};

function* walk(tree: ResolvedTree): Generator<MarkupChunk, void, undefined> {
  // 'exit' frames emit a composite's closing markup after its children
  const stack: Array<{ id: NodeId; exit: boolean }> = [
    { id: tree.root, exit: false },
  ];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) return;
    const node: ResolvedNode | undefined = tree.nodes[frame.id];
    invariant(node !== undefined, `dangling node id ${frame.id}`);

    if (node.kind === 'static') {
      if (node.marker) {
        yield { node: node.id, markup: node.markup, marker: node.marker };
      } else if (node.markup) {
        yield { node: node.id, markup: node.markup };
      }
      continue;
    }

    if (frame.exit) {
      if (node.close) yield { node: node.id, markup: node.close };
      continue;
    }

    if (node.open) yield { node: node.id, markup: node.open };
    stack.push({ id: node.id, exit: true });
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({ id: node.children[i], exit: false });
    }
  }
}

/**
 * Single-pass sequence of markup chunks. Iterating a second time is an
 * invariant violation; render again from the resolved tree instead.
 */
export class MarkupStream implements Iterable<MarkupChunk> {
  private readonly once = new Once('MarkupStream iteration');

  constructor(private readonly tree: ResolvedTree) {}

  [Symbol.iterator](): Iterator<MarkupChunk> {
    this.once.mark();
    return walk(this.tree);
  }
}

export function renderMarkup(tree: ResolvedTree): MarkupStream {
  return new MarkupStream(tree);
}

/**
 * View a tree that has no bridges as a resolved tree. Throws
 * BridgeDuringSyncRenderError if any bridge is present.
 */
export function asResolvedTree(tree: ComponentTree): ResolvedTree {
  const nodes: ResolvedNode[] = [];
  for (const node of tree.nodes) {
    if (node.kind === 'bridge') throw new BridgeDuringSyncRenderError();
    nodes.push(node);
  }
  return { root: tree.root, nodes };
}
