import { describe, expect, it } from 'vitest';
import { Node } from '../src/entities/Node.js';
import { NodeCollection } from '../src/entities/NodeCollection.js';
import { InvalidOperationError } from '../src/errors/tree.js';

const makeNodes = (...ids: number[]) => ids.map((id) => new Node<number, number>(id, id * 10));

describe('NodeCollection', () => {
  it('starts empty', () => {
    const nodes = new NodeCollection<number, number>();
    expect(nodes.length).toBe(0);
    expect(nodes.isEmpty()).toBe(true);
    expect(nodes.first()).toBeNull();
    expect(nodes.get(0)).toBeNull();
  });

  it('looks nodes up by position and id', () => {
    const nodes = NodeCollection.from(makeNodes(1, 2, 3));

    expect(nodes.get(1)?.getNodeId()).toBe(2);
    expect(nodes.get(3)).toBeNull();
    expect(nodes.getById(3)?.getValue()).toBe(30);
    expect(nodes.getById(4)).toBeNull();
    expect(nodes.first()?.getNodeId()).toBe(1);
    expect(nodes.ids()).toEqual([1, 2, 3]);
  });

  it('returns the first match for repeated ids', () => {
    const nodes = new NodeCollection([new Node<number, string>(1, 'a'), new Node<number, string>(1, 'b')]);
    expect(nodes.getById(1)?.getValue()).toBe('a');
  });

  it('copies the array it is built from', () => {
    const source = makeNodes(1, 2);
    const nodes = new NodeCollection(source);
    source.pop();
    expect(nodes.length).toBe(2);
  });

  it('removes by index and rejects out-of-bounds indexes', () => {
    const nodes = NodeCollection.from(makeNodes(1, 2, 3));

    expect(nodes.remove(1).getNodeId()).toBe(2);
    expect(nodes.ids()).toEqual([1, 3]);
    expect(() => nodes.remove(2)).toThrow(InvalidOperationError);
    expect(() => nodes.remove(-1)).toThrow(
      'Index -1 is out of bounds for a collection of 2 nodes'
    );
  });

  it('retains matching nodes in order', () => {
    const nodes = NodeCollection.from(makeNodes(1, 2, 3, 4));
    nodes.retain((node) => node.getNodeId() % 2 === 0);
    expect(nodes.ids()).toEqual([2, 4]);
  });

  it('moves nodes on append, leaving the source empty', () => {
    const target = NodeCollection.from(makeNodes(1));
    const source = NodeCollection.from(makeNodes(2, 3));
    target.append(source);

    expect(target.ids()).toEqual([1, 2, 3]);
    expect(source.isEmpty()).toBe(true);
  });

  it('ignores appending a collection to itself', () => {
    const nodes = NodeCollection.from(makeNodes(1, 2));
    nodes.append(nodes);
    expect(nodes.ids()).toEqual([1, 2]);
  });

  it('drains a plain array on appendRaw', () => {
    const nodes = new NodeCollection<number, number>();
    const raw = makeNodes(5, 6);
    nodes.appendRaw(raw);

    expect(nodes.ids()).toEqual([5, 6]);
    expect(raw).toEqual([]);
  });

  it('clears', () => {
    const nodes = NodeCollection.from(makeNodes(1, 2));
    nodes.clear();
    expect(nodes.isEmpty()).toBe(true);
  });

  it('compares pairwise and in order', () => {
    const a = NodeCollection.from(makeNodes(1, 2));
    expect(a.equals(NodeCollection.from(makeNodes(1, 2)))).toBe(true);
    expect(a.equals(NodeCollection.from(makeNodes(2, 1)))).toBe(false);
    expect(a.equals(NodeCollection.from(makeNodes(1)))).toBe(false);
  });

  it('iterates and hands out independent arrays', () => {
    const nodes = NodeCollection.from(makeNodes(1, 2));
    expect([...nodes].map((node) => node.getNodeId())).toEqual([1, 2]);

    nodes.toArray().pop();
    expect(nodes.length).toBe(2);
  });

  it('concatenates node strings', () => {
    const nodes = NodeCollection.from(makeNodes(1, 2));
    expect(nodes.toString()).toBe('1: 102: 20');
  });
});
