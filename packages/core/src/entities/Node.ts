import { createHash } from 'node:crypto';
import { isDeepStrictEqual } from 'node:util';
import { canonicalEncode } from '../utils/canonical.js';
import { cfg } from '../utils/config.js';
import { type IdentifierGenerator, defaultIdGenerator } from '../utils/id-generator.js';
import { RecordCell } from './RecordCell.js';
import type { NodeId } from './TreeConstants.js';

/**
 * The state behind a node handle. Linkage is stored as identifiers only, so
 * parents and children never hold each other.
 */
export interface NodeRecord<Q extends NodeId, T> {
  readonly id: Q;
  value: T | null;
  children: Q[];
  parent: Q | null;
}

export interface NodeFormatOptions {
  /** Prefix the value with `"<id>: "` */
  showNodeIds?: boolean;
}

/**
 * A handle to one tree entry.
 *
 * Every holder of the same `Node` object sees the same record: the tree's
 * collection and the caller share it, so `setValue` through one reference is
 * visible through all of them. Linking two nodes with `addChild` updates both
 * records; the tree resolves ids back to nodes through its collection.
 */
export class Node<Q extends NodeId, T> {
  private readonly cell: RecordCell<NodeRecord<Q, T>>;

  constructor(id: Q, value: T | null = null) {
    this.cell = new RecordCell<NodeRecord<Q, T>>(
      { id, value, children: [], parent: null },
      String(id)
    );
  }

  /**
   * Create a node whose id is drawn from `generator` and converted with
   * `convert`. Uniqueness is the generator's guarantee.
   */
  static withAutoId<Q extends NodeId, T>(
    value: T | null,
    convert: (raw: number) => Q,
    generator: IdentifierGenerator = defaultIdGenerator
  ): Node<Q, T> {
    return new Node<Q, T>(convert(generator.next()), value);
  }

  /**
   * Rebuild a node with existing linkage, as read back from a record or
   * copied out of another tree.
   */
  static fromRecord<Q extends NodeId, T>(record: NodeRecord<Q, T>): Node<Q, T> {
    const node = new Node<Q, T>(record.id, record.value);
    node.cell.write((own) => {
      own.children = [...record.children];
      own.parent = record.parent;
    });
    return node;
  }

  getNodeId(): Q {
    return this.cell.read((record) => record.id);
  }

  getValue(): T | null {
    return this.cell.read((record) => record.value);
  }

  setValue(value: T | null): void {
    this.cell.write((record) => {
      record.value = value;
    });
  }

  /**
   * Replace the value with `modifier(current)` while the record is held
   * exclusively. Touching this same node from inside `modifier` throws
   * `AccessConflictError`.
   */
  updateValue(modifier: (current: T | null) => T | null): void {
    this.cell.write((record) => {
      record.value = modifier(record.value);
    });
  }

  getChildrenIds(): Q[] {
    return this.cell.read((record) => [...record.children]);
  }

  getParentId(): Q | null {
    return this.cell.read((record) => record.parent);
  }

  addChild(child: Node<Q, T>): void {
    const parentId = this.getNodeId();
    const childId = child.getNodeId();
    this.cell.write((record) => {
      record.children.push(childId);
    });
    child.cell.write((record) => {
      record.parent = parentId;
    });
  }

  removeChild(child: Node<Q, T>): void {
    const childId = child.getNodeId();
    this.cell.write((record) => {
      record.children = record.children.filter((id) => id !== childId);
    });
    child.cell.write((record) => {
      record.parent = null;
    });
  }

  /**
   * Attach this node under `parent` (appending it to the parent's children),
   * or clear the parent id when `parent` is null. Clearing does not touch the
   * former parent's child list; use `removeChild` on the parent for that.
   */
  setParent(parent: Node<Q, T> | null): void {
    if (parent) {
      parent.addChild(this);
      return;
    }
    this.cell.write((record) => {
      record.parent = null;
    });
  }

  /**
   * Reorder the child id list. Child records are not touched.
   */
  sortChildren(compare: (a: Q, b: Q) => number): void {
    // Sort outside the exclusive section so `compare` may read other nodes.
    const sorted = this.getChildrenIds().sort(compare);
    this.cell.write((record) => {
      record.children = sorted;
    });
  }

  /**
   * Id and value equality. Linkage is deliberately ignored, so the same entry
   * in two different trees compares equal.
   */
  equals(other: Node<Q, T>): boolean {
    return (
      this.getNodeId() === other.getNodeId() && isDeepStrictEqual(this.getValue(), other.getValue())
    );
  }

  /**
   * Structural digest over id, value, children ids and parent id.
   */
  hash(): string {
    const canonical = this.cell.read((record) =>
      canonicalEncode([record.id, record.value, record.children, record.parent])
    );
    return createHash('sha256').update(canonical).digest('hex');
  }

  /**
   * Independent copy of the record. Later changes to either node do not show
   * through the other.
   */
  copy(): Node<Q, T> {
    return Node.fromRecord(this.toRecord());
  }

  toRecord(): NodeRecord<Q, T> {
    return this.cell.read((record) => ({
      id: record.id,
      value: record.value,
      children: [...record.children],
      parent: record.parent,
    }));
  }

  format(options: NodeFormatOptions = {}): string {
    const { id, value } = this.cell.read((record) => ({ id: record.id, value: record.value }));
    const text = formatValue(value);
    return options.showNodeIds ? `${id}: ${text}` : text;
  }

  toString(): string {
    return this.format({ showNodeIds: cfg.TREE_PRINT_NODE_IDS });
  }
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
