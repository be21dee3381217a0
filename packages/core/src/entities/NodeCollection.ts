import { InvalidOperationError } from '../errors/tree.js';
import type { Node } from './Node.js';
import type { NodeId } from './TreeConstants.js';

/**
 * Ordered list of node handles with lookup by position and by id.
 *
 * Id lookup is a linear scan returning the first match. The collection does
 * not enforce unique ids; the owning tree is responsible for that.
 */
export class NodeCollection<Q extends NodeId, T> implements Iterable<Node<Q, T>> {
  private readonly items: Node<Q, T>[];

  constructor(nodes: Node<Q, T>[] = []) {
    this.items = [...nodes];
  }

  static from<Q extends NodeId, T>(nodes: Iterable<Node<Q, T>>): NodeCollection<Q, T> {
    return new NodeCollection(Array.from(nodes));
  }

  get length(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  get(index: number): Node<Q, T> | null {
    return this.items[index] ?? null;
  }

  getById(id: Q): Node<Q, T> | null {
    return this.items.find((node) => node.getNodeId() === id) ?? null;
  }

  first(): Node<Q, T> | null {
    return this.items[0] ?? null;
  }

  push(node: Node<Q, T>): void {
    this.items.push(node);
  }

  /**
   * Remove and return the node at `index`.
   */
  remove(index: number): Node<Q, T> {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new InvalidOperationError(
        `Index ${index} is out of bounds for a collection of ${this.items.length} nodes`,
        'remove'
      );
    }
    const [removed] = this.items.splice(index, 1);
    if (!removed) {
      throw new InvalidOperationError(`No node at index ${index}`, 'remove');
    }
    return removed;
  }

  /**
   * Keep only the nodes for which `predicate` holds, preserving order.
   */
  retain(predicate: (node: Node<Q, T>) => boolean): void {
    const kept = this.items.filter(predicate);
    this.items.splice(0, this.items.length, ...kept);
  }

  clear(): void {
    this.items.length = 0;
  }

  /**
   * Move every node of `other` to the end of this collection, leaving
   * `other` empty.
   */
  append(other: NodeCollection<Q, T>): void {
    if (other === this) return;
    this.items.push(...other.items);
    other.clear();
  }

  /**
   * Move every node of a plain array to the end of this collection, leaving
   * the array empty.
   */
  appendRaw(nodes: Node<Q, T>[]): void {
    this.items.push(...nodes.splice(0, nodes.length));
  }

  toArray(): Node<Q, T>[] {
    return [...this.items];
  }

  ids(): Q[] {
    return this.items.map((node) => node.getNodeId());
  }

  /**
   * Pairwise node equality in order.
   */
  equals(other: NodeCollection<Q, T>): boolean {
    if (this.items.length !== other.items.length) return false;
    return this.items.every((node, index) => {
      const counterpart = other.items[index];
      return counterpart !== undefined && node.equals(counterpart);
    });
  }

  [Symbol.iterator](): Iterator<Node<Q, T>> {
    return this.items[Symbol.iterator]();
  }

  toString(): string {
    return this.items.map((node) => node.toString()).join('');
  }
}
