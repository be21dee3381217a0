import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { Node } from '../src/entities/Node.js';
import { Tree } from '../src/entities/Tree.js';
import { NodeRemovalStrategy, TraversalStrategy } from '../src/entities/TreeConstants.js';
import { DeserializationError } from '../src/errors/tree.js';
import { createTreeCodec } from '../src/serialization/TreeCodec.js';

const numberIds = { idSchema: z.number().int(), valueSchema: z.number() };

function createChain(name: string | null = null): Tree<number, number> {
  const tree = new Tree<number, number>(name);
  tree.addNode(new Node(1, 2));
  tree.addNode(new Node(2, 3), 1);
  tree.addNode(new Node(3, 6), 2);
  return tree;
}

function createBranchingTree(): Tree<number, number> {
  const tree = new Tree<number, number>('Branching');
  tree.addNode(new Node(1, 10));
  tree.addNode(new Node(2, 20), 1);
  tree.addNode(new Node(3, 30), 1);
  tree.addNode(new Node(4, 40), 2);
  tree.addNode(new Node(5, 50), 2);
  tree.addNode(new Node(6, 60), 3);
  return tree;
}

function captureDecodeError(run: () => unknown): DeserializationError {
  try {
    run();
  } catch (error) {
    if (error instanceof DeserializationError) return error;
    throw error;
  }
  throw new Error('Expected a DeserializationError');
}

describe('TreeCodec', () => {
  describe('Encoding', () => {
    it('writes compact records without children', () => {
      const codec = createTreeCodec({ ...numberIds, mode: 'compact' });

      expect(codec.stringify(createChain())).toBe(
        '{"nodes":[{"node_id":1,"value":2,"parent":null},{"node_id":2,"value":3,"parent":1},{"node_id":3,"value":6,"parent":2}]}'
      );
    });

    it('writes full records with the name first', () => {
      const codec = createTreeCodec({ ...numberIds, mode: 'full' });

      expect(codec.stringify(createChain('Sample'))).toBe(
        '{"name":"Sample","nodes":[{"node_id":1,"value":2,"children":[2],"parent":null},{"node_id":2,"value":3,"children":[3],"parent":1},{"node_id":3,"value":6,"children":[],"parent":2}]}'
      );
    });

    it('encodes to plain records', () => {
      const codec = createTreeCodec({ ...numberIds, mode: 'compact' });
      const tree = new Tree<number, number>('Solo');
      tree.addNode(new Node<number, number>(7));

      expect(codec.encode(tree)).toEqual({
        name: 'Solo',
        nodes: [{ node_id: 7, value: null, parent: null }],
      });
    });

    it('defaults to the configured mode', () => {
      expect(createTreeCodec(numberIds).mode).toBe('full');
    });
  });

  describe('Round trips', () => {
    it.each(['full', 'compact'] as const)('reproduces the tree in %s mode', (mode) => {
      const codec = createTreeCodec({ ...numberIds, mode });
      const tree = createBranchingTree();
      const decoded = codec.parse(codec.stringify(tree));

      expect(decoded.equals(tree)).toBe(true);
      expect(decoded.hash()).toBe(tree.hash());
      expect(decoded.traverse(1, TraversalStrategy.PreOrder)).toEqual([1, 2, 4, 5, 3, 6]);
    });

    it('round trips string ids and object values', () => {
      const codec = createTreeCodec({
        idSchema: z.string(),
        valueSchema: z.object({ label: z.string() }),
        mode: 'full',
      });
      const tree = new Tree<string, { label: string }>();
      tree.addNode(new Node('root', { label: 'Root' }));
      tree.addNode(new Node('leaf', { label: 'Leaf' }), 'root');

      const decoded = codec.decode(JSON.parse(codec.stringify(tree)));

      expect(decoded.getName()).toBeNull();
      expect(decoded.getNodeById('leaf')?.getValue()).toEqual({ label: 'Leaf' });
      expect(decoded.equals(tree)).toBe(true);
    });

    it('keeps sorted child order in full mode only', () => {
      const tree = createBranchingTree();
      tree.getNodeById(1)?.sortChildren((a, b) => b - a);

      const full = createTreeCodec({ ...numberIds, mode: 'full' });
      expect(full.parse(full.stringify(tree)).getNodeById(1)?.getChildrenIds()).toEqual([3, 2]);

      const compact = createTreeCodec({ ...numberIds, mode: 'compact' });
      const restored = compact.parse(compact.stringify(tree));
      expect(restored.getNodeById(1)?.getChildrenIds()).toEqual([2, 3]);
      expect(restored.hash()).not.toBe(tree.hash());
    });
  });

  it('restores re-parented children in collection order in compact mode', () => {
    // 1 ─┬─ 2 ── 3
    //    └─ 4
    const tree = new Tree<number, number>();
    tree.addNode(new Node(1, 1));
    tree.addNode(new Node(2, 2), 1);
    tree.addNode(new Node(3, 3), 2);
    tree.addNode(new Node(4, 4), 1);
    tree.removeNode(2, NodeRemovalStrategy.RetainChildren);
    expect(tree.getNodeById(1)?.getChildrenIds()).toEqual([4, 3]);

    const full = createTreeCodec({ ...numberIds, mode: 'full' });
    expect(full.parse(full.stringify(tree)).getNodeById(1)?.getChildrenIds()).toEqual([4, 3]);

    const compact = createTreeCodec({ ...numberIds, mode: 'compact' });
    expect(compact.parse(compact.stringify(tree)).getNodeById(1)?.getChildrenIds()).toEqual([3, 4]);
  });

  describe('Decoding', () => {
    it('reads a missing value or parent as null', () => {
      const codec = createTreeCodec({ ...numberIds, mode: 'compact' });
      const tree = codec.decode({ nodes: [{ node_id: 1 }] });

      expect(tree.getNodeById(1)?.getValue()).toBeNull();
      expect(tree.getRootNode()?.getNodeId()).toBe(1);
    });

    it('ignores children in compact records', () => {
      const codec = createTreeCodec({ ...numberIds, mode: 'compact' });
      const tree = codec.decode({
        nodes: [
          { node_id: 1, value: 1, children: [99], parent: null },
          { node_id: 2, value: 2, parent: 1 },
        ],
      });

      expect(tree.getNodeById(1)?.getChildrenIds()).toEqual([2]);
    });

    it('accepts a null name', () => {
      const codec = createTreeCodec({ ...numberIds, mode: 'compact' });
      const tree = codec.decode({ name: null, nodes: [{ node_id: 1, value: 1, parent: null }] });
      expect(tree.getName()).toBeNull();
    });
  });

  describe('Decoding failures', () => {
    const compact = createTreeCodec({ ...numberIds, mode: 'compact' });
    const full = createTreeCodec({ ...numberIds, mode: 'full' });

    it('rejects a record without nodes', () => {
      const error = captureDecodeError(() => compact.decode({}));
      expect(error.message).toBe('Malformed tree record');
      expect(error.issues).toEqual(['nodes: Required']);
    });

    it('rejects ids and values that fail their schemas', () => {
      const error = captureDecodeError(() =>
        compact.decode({ nodes: [{ node_id: 'one', value: 'two', parent: null }] })
      );
      expect(error.message).toBe('Tree record contains invalid nodes');
      expect(error.issues).toEqual([
        'nodes.0.node_id: Expected number, received string',
        'nodes.0.value: Expected number, received string',
      ]);
    });

    it('requires children in full mode', () => {
      const error = captureDecodeError(() =>
        full.decode({ nodes: [{ node_id: 1, value: 1, parent: null }] })
      );
      expect(error.issues).toEqual(['nodes.0.children: Required in full mode']);
    });

    it('rejects a second root', () => {
      const error = captureDecodeError(() =>
        compact.decode({
          nodes: [
            { node_id: 1, value: 1, parent: null },
            { node_id: 2, value: 2, parent: null },
          ],
        })
      );
      expect(error.message).toBe('Decoded tree violates tree invariants');
      expect(error.issues).toEqual(['Node "2" is a second parentless node']);
    });

    it('rejects a parent that is not in the record', () => {
      const error = captureDecodeError(() =>
        compact.decode({
          nodes: [
            { node_id: 1, value: 1, parent: null },
            { node_id: 2, value: 2, parent: 5 },
          ],
        })
      );
      expect(error.issues).toEqual(['Parent "5" of node "2" is not in the tree']);
    });

    it('rejects full records whose links disagree', () => {
      const error = captureDecodeError(() =>
        full.decode({
          nodes: [
            { node_id: 1, value: 1, children: [2], parent: null },
            { node_id: 2, value: 2, children: [], parent: 3 },
            { node_id: 3, value: 3, children: [], parent: 1 },
          ],
        })
      );
      expect(error.issues).toContain(
        'Node "1" lists child "2", whose parent is "3"'
      );
    });

    it('rejects text that is not JSON', () => {
      const error = captureDecodeError(() => compact.parse('{nodes'));
      expect(error).toBeInstanceOf(DeserializationError);
      expect(error.message).toBe('Tree record is not valid JSON');
      expect(error.issues).toHaveLength(1);
    });
  });
});
