/**
 * Shared constants and small enum-like types for tree operations
 */

/**
 * Identifier types a node may carry. Both survive a JSON round trip and
 * compare with `===`.
 */
export type NodeId = string | number;

/**
 * What happens to a removed node's descendants
 */
export const NodeRemovalStrategy = {
  /** Re-attach the removed node's children to its former parent */
  RetainChildren: 'retain-children',
  /** Delete the node together with every descendant */
  RemoveNodeAndChildren: 'remove-node-and-children',
} as const;

export type NodeRemovalStrategy = (typeof NodeRemovalStrategy)[keyof typeof NodeRemovalStrategy];

export const TraversalStrategy = {
  PreOrder: 'pre-order',
  PostOrder: 'post-order',
  /** First child's subtree, then the node, then each remaining child and its subtree */
  InOrder: 'in-order',
} as const;

export type TraversalStrategy = (typeof TraversalStrategy)[keyof typeof TraversalStrategy];

/**
 * Glyphs used by the outline renderer
 */
export const OUTLINE_GLYPHS = {
  BRANCH: '├── ',
  LAST_BRANCH: '└── ',
  CONTINUATION: '│   ',
  INDENT: '    ',
  NAME_UNDERLINE: '*',
} as const;
