import { InvalidOperationError, NodeNotFoundError } from '../errors/tree.js';
import type { Node } from './Node.js';
import { type NodeId, TraversalStrategy } from './TreeConstants.js';

/**
 * The part of a tree the traversal functions need: resolving ids to nodes.
 */
export interface NodeLookup<Q extends NodeId, T> {
  getNodeById(id: Q): Node<Q, T> | null;
}

export interface SubtreeEntry<Q extends NodeId, T> {
  id: Q;
  node: Node<Q, T>;
  /** Distance from the start node */
  depth: number;
}

/**
 * Resolves ids and refuses to expand the same node twice, which only happens
 * when the linkage has been bent into a cycle (or a child listed twice)
 * through node handles.
 */
class Expander<Q extends NodeId, T> {
  private readonly expanded = new Set<Q>();

  constructor(
    private readonly lookup: NodeLookup<Q, T>,
    private readonly operation: string
  ) {}

  require(id: Q): Node<Q, T> {
    const node = this.lookup.getNodeById(id);
    if (!node) {
      throw new NodeNotFoundError(String(id), this.operation);
    }
    return node;
  }

  children(id: Q): Q[] {
    if (this.expanded.has(id)) {
      throw new InvalidOperationError(
        `Node ${String(id)} is reached more than once; the linkage has a cycle or a repeated child`,
        this.operation,
        { nodeId: id }
      );
    }
    this.expanded.add(id);
    return this.require(id).getChildrenIds();
  }
}

/**
 * Visit `startId` and its descendants in pre-order, down to `maxDepth`
 * generations below the start (all generations when null).
 *
 * @throws NodeNotFoundError when the start or any listed child is missing
 * @throws InvalidOperationError when a node is reached twice
 */
export function collectSubtree<Q extends NodeId, T>(
  lookup: NodeLookup<Q, T>,
  startId: Q,
  maxDepth: number | null = null,
  operation = 'collectSubtree'
): SubtreeEntry<Q, T>[] {
  const expander = new Expander(lookup, operation);
  const entries: SubtreeEntry<Q, T>[] = [];
  const stack: { id: Q; depth: number }[] = [{ id: startId, depth: 0 }];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;

    entries.push({ id: current.id, node: expander.require(current.id), depth: current.depth });
    if (maxDepth !== null && current.depth >= maxDepth) continue;

    const children = expander.children(current.id);
    for (let index = children.length - 1; index >= 0; index--) {
      const childId = children[index];
      if (childId !== undefined) {
        stack.push({ id: childId, depth: current.depth + 1 });
      }
    }
  }

  return entries;
}

/**
 * Walk the linkage below `startId` and return the visited ids in `order`.
 *
 * Works on an explicit stack, so deep trees do not exhaust the call stack.
 * The result keeps only the first occurrence of each id.
 */
export function traverseTree<Q extends NodeId, T>(
  lookup: NodeLookup<Q, T>,
  startId: Q,
  order: TraversalStrategy
): Q[] {
  const expander = new Expander(lookup, 'traverse');
  expander.require(startId);

  switch (order) {
    case TraversalStrategy.PreOrder:
      return dedupe(preOrder(expander, startId));
    case TraversalStrategy.PostOrder:
      return dedupe(postOrder(expander, startId));
    case TraversalStrategy.InOrder:
      return dedupe(inOrder(expander, startId));
  }
}

function preOrder<Q extends NodeId, T>(expander: Expander<Q, T>, startId: Q): Q[] {
  const emitted: Q[] = [];
  const stack: Q[] = [startId];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    emitted.push(id);
    stack.push(...expander.children(id).reverse());
  }

  return emitted;
}

function postOrder<Q extends NodeId, T>(expander: Expander<Q, T>, startId: Q): Q[] {
  const emitted: Q[] = [];
  const stack: { id: Q; childrenDone: boolean }[] = [{ id: startId, childrenDone: false }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    if (frame.childrenDone) {
      emitted.push(frame.id);
      continue;
    }
    stack.push({ id: frame.id, childrenDone: true });
    for (const childId of expander.children(frame.id).reverse()) {
      stack.push({ id: childId, childrenDone: false });
    }
  }

  return emitted;
}

type InOrderStep<Q> = { kind: 'visit'; id: Q } | { kind: 'emit'; id: Q };

/**
 * visit(n) for a leaf emits n. Otherwise it runs visit(first child), emits n,
 * then for each remaining child c emits c before visit(c). The later repeat
 * of c from inside visit(c) is dropped by the final de-duplication.
 */
function inOrder<Q extends NodeId, T>(expander: Expander<Q, T>, startId: Q): Q[] {
  const emitted: Q[] = [];
  const stack: InOrderStep<Q>[] = [{ kind: 'visit', id: startId }];

  while (stack.length > 0) {
    const step = stack.pop();
    if (!step) break;

    if (step.kind === 'emit') {
      emitted.push(step.id);
      continue;
    }

    const [first, ...rest] = expander.children(step.id);
    if (first === undefined) {
      emitted.push(step.id);
      continue;
    }

    const steps: InOrderStep<Q>[] = [
      { kind: 'visit', id: first },
      { kind: 'emit', id: step.id },
    ];
    for (const childId of rest) {
      steps.push({ kind: 'emit', id: childId }, { kind: 'visit', id: childId });
    }
    stack.push(...steps.reverse());
  }

  return emitted;
}

function dedupe<Q>(ids: Q[]): Q[] {
  return [...new Set(ids)];
}
