import { createHash } from 'node:crypto';
import {
  InvalidOperationError,
  NodeNotFoundError,
  RootNodeAlreadyPresentError,
} from '../errors/tree.js';
import { createModuleLogger } from '../utils/logger.js';
import { Node } from './Node.js';
import { NodeCollection } from './NodeCollection.js';
import { type NodeId, NodeRemovalStrategy, type TraversalStrategy } from './TreeConstants.js';
import { type RenderOptions, renderTree } from './TreePrinter.js';
import { collectSubtree, traverseTree } from './traversal.js';

const logger = createModuleLogger('tree');

/**
 * An optionally named, ordered collection of linked nodes with at most one
 * parentless node (the root).
 *
 * Nodes are handles: the tree keeps the very `Node` objects passed to
 * `addNode`, so changes made through a handle the caller still holds show up
 * in the tree and the other way round.
 *
 * @example
 * ```ts
 * const tree = new Tree<number, number>('Sample Tree');
 * const root = tree.addNode(new Node(1, 2));
 * const child = tree.addNode(new Node(2, 3), root);
 * tree.addNode(new Node(3, 6), child);
 * tree.traverse(root, TraversalStrategy.PreOrder); // [1, 2, 3]
 * ```
 */
export class Tree<Q extends NodeId, T> {
  private name: string | null;
  private readonly nodes: NodeCollection<Q, T>;

  constructor(name: string | null = null) {
    this.name = name;
    this.nodes = new NodeCollection<Q, T>();
  }

  /**
   * Wrap existing nodes without re-linking or checking them.
   */
  static fromNodes<Q extends NodeId, T>(
    name: string | null,
    nodes: Iterable<Node<Q, T>>
  ): Tree<Q, T> {
    const tree = new Tree<Q, T>(name);
    tree.nodes.appendRaw(Array.from(nodes));
    return tree;
  }

  getName(): string | null {
    return this.name;
  }

  rename(name: string | null): void {
    this.name = name;
  }

  /**
   * The live node collection. Mutating it bypasses the tree's checks.
   */
  getNodes(): NodeCollection<Q, T> {
    return this.nodes;
  }

  /**
   * Add `node` under `parentId`, or as the root when no parent is given.
   *
   * @returns the node's id
   * @throws NodeNotFoundError when `parentId` is not in the tree
   * @throws RootNodeAlreadyPresentError when adding a second root
   */
  addNode(node: Node<Q, T>, parentId: Q | null = null): Q {
    if (parentId !== null) {
      this.requireNode(parentId, 'addNode').addChild(node);
    } else if (this.getRootNode()) {
      throw new RootNodeAlreadyPresentError('addNode', { nodeId: node.getNodeId() });
    }
    this.nodes.push(node);
    logger.debug({ nodeId: node.getNodeId(), parentId }, 'Node added');
    return node.getNodeId();
  }

  getNodeById(id: Q): Node<Q, T> | null {
    return this.nodes.getById(id);
  }

  getRootNode(): Node<Q, T> | null {
    for (const node of this.nodes) {
      if (node.getParentId() === null) return node;
    }
    return null;
  }

  /**
   * Longest downward path from `id` to a leaf, in edges. Leaves have height 0.
   */
  getNodeHeight(id: Q): number {
    return collectSubtree(this, id, null, 'getNodeHeight').reduce(
      (height, entry) => Math.max(height, entry.depth),
      0
    );
  }

  /**
   * Number of parent hops from `id` to the root.
   */
  getNodeDepth(id: Q): number {
    return this.walkAncestors(id, 'getNodeDepth').length;
  }

  /**
   * Parent ids from the nearest to the root.
   */
  getAncestorIds(id: Q): Q[] {
    return this.walkAncestors(id, 'getAncestorIds');
  }

  /**
   * Height of the root.
   *
   * @throws InvalidOperationError when the tree has no root
   */
  getHeight(): number {
    const root = this.getRootNode();
    if (!root) {
      throw new InvalidOperationError('Tree has no root node', 'getHeight');
    }
    return this.getNodeHeight(root.getNodeId());
  }

  getNodeDegree(id: Q): number {
    return this.requireNode(id, 'getNodeDegree').getChildrenIds().length;
  }

  /**
   * Children of `id`'s parent, without `id` unless `inclusive`. A parentless
   * node has no siblings; with `inclusive` it is its own only sibling.
   */
  getSiblingIds(id: Q, inclusive: boolean): Q[] {
    const parentId = this.requireNode(id, 'getSiblingIds').getParentId();
    if (parentId === null) {
      return inclusive ? [id] : [];
    }
    const siblings = this.requireNode(parentId, 'getSiblingIds').getChildrenIds();
    return inclusive ? siblings : siblings.filter((siblingId) => siblingId !== id);
  }

  /**
   * Remove `id` from the tree.
   *
   * - `RetainChildren` moves the node's children to the end of its former
   *   parent's child list. The root cannot be removed this way.
   * - `RemoveNodeAndChildren` deletes the node and every descendant.
   *
   * @throws NodeNotFoundError when `id` (or a node its linkage names) is missing
   * @throws InvalidOperationError when removing the root with `RetainChildren`
   */
  removeNode(id: Q, strategy: NodeRemovalStrategy): void {
    if (strategy === NodeRemovalStrategy.RetainChildren) {
      this.removeRetainingChildren(id);
    } else {
      this.removeWithDescendants(id);
    }
    logger.debug({ nodeId: id, strategy, remaining: this.nodes.length }, 'Node removed');
  }

  /**
   * Copy `id` and its descendants into a new tree named after `id`.
   *
   * With `generations` set, only nodes at most that many levels below `id`
   * are copied; 0 copies `id` alone. The copy's root has no parent, and child
   * lists only name nodes that were copied. The source tree is not modified.
   *
   * @throws NodeNotFoundError when `id` is missing
   * @throws InvalidOperationError when `generations` is negative or fractional
   */
  getSubtree(id: Q, generations: number | null = null): SubTree<Q, T> {
    if (generations !== null && (!Number.isInteger(generations) || generations < 0)) {
      throw new InvalidOperationError(
        `Generations must be a non-negative integer, got ${generations}`,
        'getSubtree'
      );
    }

    const entries = collectSubtree(this, id, generations, 'getSubtree');
    const included = new Set(entries.map((entry) => entry.id));

    const copies = entries.map(({ node }, index) => {
      const record = node.toRecord();
      return Node.fromRecord<Q, T>({
        ...record,
        children: record.children.filter((childId) => included.has(childId)),
        parent: index === 0 ? null : record.parent,
      });
    });

    return Tree.fromNodes(String(id), copies);
  }

  /**
   * Attach `subtree`'s root under `id` and move all of its nodes into this
   * tree; `subtree` is left empty. Ids are not de-duplicated: the caller must
   * make sure the two trees do not share any.
   *
   * @throws NodeNotFoundError when `id` is missing
   * @throws InvalidOperationError when `subtree` has no root or is this tree
   */
  addSubtree(id: Q, subtree: SubTree<Q, T>): void {
    if (subtree === this) {
      throw new InvalidOperationError('Cannot graft a tree into itself', 'addSubtree');
    }
    const node = this.requireNode(id, 'addSubtree');
    const subtreeRoot = subtree.getRootNode();
    if (!subtreeRoot) {
      throw new InvalidOperationError('Subtree has no root node.', 'addSubtree');
    }

    const collisions = subtree.nodes.ids().filter((nodeId) => this.nodes.getById(nodeId) !== null);
    if (collisions.length > 0) {
      logger.warn({ nodeId: id, collisions }, 'Merged subtree shares node ids with the tree');
    }

    node.addChild(subtreeRoot);
    const added = subtree.nodes.length;
    this.nodes.append(subtree.nodes);
    logger.debug({ nodeId: id, added }, 'Subtree attached');
  }

  /**
   * Ids reachable from `id` in the given order.
   *
   * @throws NodeNotFoundError when `id` is missing
   */
  traverse(id: Q, order: TraversalStrategy): Q[] {
    return traverseTree(this, id, order);
  }

  /**
   * Same name and pairwise-equal nodes (id and value) in the same order.
   */
  equals(other: Tree<Q, T>): boolean {
    return this.name === other.name && this.nodes.equals(other.nodes);
  }

  /**
   * Structural digest over the name and every node's id, value and linkage.
   */
  hash(): string {
    const digest = createHash('sha256').update(JSON.stringify(this.name));
    for (const node of this.nodes) {
      digest.update(node.hash());
    }
    return digest.digest('hex');
  }

  render(options: RenderOptions = {}): string {
    return renderTree(this, options);
  }

  /**
   * @throws FormatError when the tree has no root
   */
  toString(): string {
    return renderTree(this);
  }

  private requireNode(id: Q, operation: string): Node<Q, T> {
    const node = this.nodes.getById(id);
    if (!node) {
      throw new NodeNotFoundError(String(id), operation);
    }
    return node;
  }

  private walkAncestors(id: Q, operation: string): Q[] {
    const ancestors: Q[] = [];
    const seen = new Set<Q>([id]);
    let parentId = this.requireNode(id, operation).getParentId();

    while (parentId !== null) {
      if (seen.has(parentId)) {
        throw new InvalidOperationError(
          `Parent chain of node ${String(id)} loops back to node ${String(parentId)}`,
          operation
        );
      }
      seen.add(parentId);
      ancestors.push(parentId);
      parentId = this.requireNode(parentId, operation).getParentId();
    }

    return ancestors;
  }

  private removeRetainingChildren(id: Q): void {
    const node = this.requireNode(id, 'removeNode');
    const parentId = node.getParentId();
    if (parentId === null) {
      throw new InvalidOperationError(
        'Cannot remove root node with RetainChildren strategy',
        'removeNode'
      );
    }
    const parent = this.requireNode(parentId, 'removeNode');

    parent.removeChild(node);
    for (const childId of node.getChildrenIds()) {
      const child = this.nodes.getById(childId);
      if (child) {
        parent.addChild(child);
      }
    }
    this.nodes.retain((candidate) => candidate.getNodeId() !== id);
  }

  private removeWithDescendants(id: Q): void {
    // Resolve everything first so a broken link fails before any mutation.
    const entries = collectSubtree(this, id, null, 'removeNode');
    const [top] = entries;
    if (!top) {
      throw new NodeNotFoundError(String(id), 'removeNode');
    }
    const parentId = top.node.getParentId();
    const parent = parentId === null ? null : this.requireNode(parentId, 'removeNode');

    parent?.removeChild(top.node);

    const removed = new Map(entries.map((entry) => [entry.id, entry.node]));
    for (const { node } of entries) {
      for (const childId of node.getChildrenIds()) {
        const child = removed.get(childId);
        if (child) {
          node.removeChild(child);
        }
      }
    }
    this.nodes.retain((candidate) => !removed.has(candidate.getNodeId()));
  }
}

/**
 * A tree used as a detached fragment, as produced by `getSubtree` or consumed
 * by `addSubtree`.
 */
export type SubTree<Q extends NodeId, T> = Tree<Q, T>;
