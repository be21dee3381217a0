import { isCanopyError } from '../errors/base.js';
import { FormatError } from '../errors/tree.js';
import { cfg } from '../utils/config.js';
import type { Node } from './Node.js';
import { type NodeId, OUTLINE_GLYPHS } from './TreeConstants.js';
import type { NodeLookup } from './traversal.js';

export interface PrintableTree<Q extends NodeId, T> extends NodeLookup<Q, T> {
  getName(): string | null;
  getRootNode(): Node<Q, T> | null;
}

export interface RenderOptions {
  /** Defaults to the TREE_PRINT_NODE_IDS setting */
  showNodeIds?: boolean;
}

interface OutlineFrame<Q extends NodeId, T> {
  node: Node<Q, T>;
  /** Prefix written before this node's branch glyph */
  prefix: string;
  isLast: boolean;
  isRoot: boolean;
}

/**
 * Render a tree as its name, an asterisk underline of the same length, and a
 * box-drawing outline of the nodes in pre-order:
 *
 * ```text
 * Sample Tree
 * ***********
 * 1: 2
 * └── 2: 3
 *     ├── 3: 6
 *     └── 4: 5
 * ```
 *
 * @throws FormatError when the tree has no root or its linkage is broken
 */
export function renderTree<Q extends NodeId, T>(
  tree: PrintableTree<Q, T>,
  options: RenderOptions = {}
): string {
  const showNodeIds = options.showNodeIds ?? cfg.TREE_PRINT_NODE_IDS;
  const lines: string[] = [];

  const name = tree.getName();
  if (name !== null) {
    lines.push(name, OUTLINE_GLYPHS.NAME_UNDERLINE.repeat([...name].length));
  }

  const root = tree.getRootNode();
  if (!root) {
    throw new FormatError('Cannot render a tree without a root node');
  }

  const seen = new Set<Q>();
  const stack: OutlineFrame<Q, T>[] = [{ node: root, prefix: '', isLast: true, isRoot: true }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;

    const id = frame.node.getNodeId();
    if (seen.has(id)) {
      throw new FormatError(`Node ${String(id)} appears more than once in the outline`);
    }
    seen.add(id);

    const text = formatNode(frame.node, showNodeIds);
    let childPrefix = frame.prefix;
    if (frame.isRoot) {
      lines.push(text);
    } else if (frame.isLast) {
      lines.push(`${frame.prefix}${OUTLINE_GLYPHS.LAST_BRANCH}${text}`);
      childPrefix += OUTLINE_GLYPHS.INDENT;
    } else {
      lines.push(`${frame.prefix}${OUTLINE_GLYPHS.BRANCH}${text}`);
      childPrefix += OUTLINE_GLYPHS.CONTINUATION;
    }

    const childIds = frame.node.getChildrenIds();
    for (let index = childIds.length - 1; index >= 0; index--) {
      const childId = childIds[index];
      if (childId === undefined) continue;
      const child = tree.getNodeById(childId);
      if (!child) {
        throw new FormatError(`Node ${String(childId)} not found while rendering`);
      }
      stack.push({
        node: child,
        prefix: childPrefix,
        isLast: index === childIds.length - 1,
        isRoot: false,
      });
    }
  }

  return lines.map((line) => `${line}\n`).join('');
}

function formatNode<Q extends NodeId, T>(node: Node<Q, T>, showNodeIds: boolean): string {
  try {
    return node.format({ showNodeIds });
  } catch (error) {
    if (isCanopyError(error)) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new FormatError(`Cannot format node ${String(node.getNodeId())}: ${reason}`, error);
  }
}
