import type { Node } from './Node.js';
import type { Tree } from './Tree.js';
import type { NodeId } from './TreeConstants.js';

/**
 * TreeValidation - checks a tree's linkage against the structural invariants:
 * a single root, parents and children that exist, parent and child records
 * that agree with each other, unique ids and no cycles.
 */

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  type:
    | 'multiple_roots'
    | 'missing_parent'
    | 'missing_child'
    | 'parent_mismatch'
    | 'duplicate_id'
    | 'cycle';
  nodeId: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationWarning {
  type: 'deep_nesting' | 'unreachable_node';
  nodeId: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationOptions {
  /** Warn about nodes deeper than this */
  maxDepth?: number;
}

export function validateTree<Q extends NodeId, T>(
  tree: Tree<Q, T>,
  options: ValidationOptions = {}
): ValidationResult {
  const nodes = tree.getNodes().toArray();
  const byId = new Map<Q, Node<Q, T>>();
  for (const node of nodes) {
    if (!byId.has(node.getNodeId())) byId.set(node.getNodeId(), node);
  }

  const errors: ValidationError[] = [
    ...findDuplicateIds(nodes),
    ...findExtraRoots(nodes),
    ...validateLinks(nodes, byId),
    ...detectCycles(nodes, byId),
  ];

  const warnings: ValidationWarning[] = [...findUnreachable(tree, byId)];
  if (options.maxDepth !== undefined && !errors.some((error) => error.type === 'cycle')) {
    warnings.push(...findDeepNodes(nodes, byId, options.maxDepth));
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

function findDuplicateIds<Q extends NodeId, T>(nodes: Node<Q, T>[]): ValidationError[] {
  const counts = new Map<Q, number>();
  for (const node of nodes) {
    counts.set(node.getNodeId(), (counts.get(node.getNodeId()) ?? 0) + 1);
  }

  const errors: ValidationError[] = [];
  for (const [id, count] of counts) {
    if (count > 1) {
      errors.push({
        type: 'duplicate_id',
        nodeId: String(id),
        message: `Duplicate node ID found: "${String(id)}" (appears ${count} times)`,
        details: { count },
      });
    }
  }
  return errors;
}

function findExtraRoots<Q extends NodeId, T>(nodes: Node<Q, T>[]): ValidationError[] {
  const roots = nodes.filter((node) => node.getParentId() === null);
  return roots.slice(1).map((node) => ({
    type: 'multiple_roots' as const,
    nodeId: String(node.getNodeId()),
    message: `Node "${String(node.getNodeId())}" is a second parentless node`,
    details: { firstRoot: roots[0]?.getNodeId() },
  }));
}

/**
 * Both directions of every link: a node's parent must exist and list it, and
 * every listed child must exist and point back.
 */
function validateLinks<Q extends NodeId, T>(
  nodes: Node<Q, T>[],
  byId: Map<Q, Node<Q, T>>
): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const node of nodes) {
    const id = node.getNodeId();
    const parentId = node.getParentId();

    if (parentId !== null) {
      const parent = byId.get(parentId);
      if (!parent) {
        errors.push({
          type: 'missing_parent',
          nodeId: String(id),
          message: `Parent "${String(parentId)}" of node "${String(id)}" is not in the tree`,
          details: { parentId },
        });
      } else if (!parent.getChildrenIds().includes(id)) {
        errors.push({
          type: 'parent_mismatch',
          nodeId: String(id),
          message: `Node "${String(id)}" names parent "${String(parentId)}", which does not list it as a child`,
          details: { parentId },
        });
      }
    }

    for (const childId of node.getChildrenIds()) {
      const child = byId.get(childId);
      if (!child) {
        errors.push({
          type: 'missing_child',
          nodeId: String(id),
          message: `Child "${String(childId)}" of node "${String(id)}" is not in the tree`,
          details: { childId },
        });
      } else if (child.getParentId() !== id) {
        errors.push({
          type: 'parent_mismatch',
          nodeId: String(childId),
          message: `Node "${String(id)}" lists child "${String(childId)}", whose parent is "${String(child.getParentId())}"`,
          details: { listedBy: id, actualParentId: child.getParentId() },
        });
      }
    }
  }

  return errors;
}

/**
 * Follows parent pointers from each node; reaching a node twice on one walk
 * means the chain loops. Each loop is reported once.
 */
function detectCycles<Q extends NodeId, T>(
  nodes: Node<Q, T>[],
  byId: Map<Q, Node<Q, T>>
): ValidationError[] {
  const errors: ValidationError[] = [];
  const settled = new Set<Q>();

  for (const node of nodes) {
    const path: Q[] = [];
    const onPath = new Set<Q>();
    let current: Q | null = node.getNodeId();

    while (current !== null && !settled.has(current)) {
      if (onPath.has(current)) {
        const loop = path.slice(path.indexOf(current));
        errors.push({
          type: 'cycle',
          nodeId: String(current),
          message: `Cycle detected involving node "${String(current)}"`,
          details: { cyclePath: loop },
        });
        break;
      }
      onPath.add(current);
      path.push(current);
      current = byId.get(current)?.getParentId() ?? null;
    }

    for (const id of path) settled.add(id);
  }

  return errors;
}

function findUnreachable<Q extends NodeId, T>(
  tree: Tree<Q, T>,
  byId: Map<Q, Node<Q, T>>
): ValidationWarning[] {
  const root = tree.getRootNode();
  if (!root) return [];

  const reached = new Set<Q>();
  const stack: Q[] = [root.getNodeId()];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || reached.has(id)) continue;
    reached.add(id);
    stack.push(...(byId.get(id)?.getChildrenIds() ?? []));
  }

  const warnings: ValidationWarning[] = [];
  for (const id of byId.keys()) {
    if (!reached.has(id)) {
      warnings.push({
        type: 'unreachable_node',
        nodeId: String(id),
        message: `Node "${String(id)}" cannot be reached from the root`,
      });
    }
  }
  return warnings;
}

function findDeepNodes<Q extends NodeId, T>(
  nodes: Node<Q, T>[],
  byId: Map<Q, Node<Q, T>>,
  maxDepth: number
): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];

  for (const node of nodes) {
    let depth = 0;
    let parentId = node.getParentId();
    while (parentId !== null) {
      depth++;
      parentId = byId.get(parentId)?.getParentId() ?? null;
    }
    if (depth > maxDepth) {
      warnings.push({
        type: 'deep_nesting',
        nodeId: String(node.getNodeId()),
        message: `Node exceeds maximum depth of ${maxDepth} (current: ${depth})`,
        details: { maxDepth, currentDepth: depth },
      });
    }
  }

  return warnings;
}
