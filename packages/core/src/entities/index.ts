export { Node, type NodeRecord, type NodeFormatOptions } from './Node.js';
export { NodeCollection } from './NodeCollection.js';
export { RecordCell } from './RecordCell.js';
export { Tree, type SubTree } from './Tree.js';
export {
  type NodeId,
  NodeRemovalStrategy,
  TraversalStrategy,
  OUTLINE_GLYPHS,
} from './TreeConstants.js';
export { renderTree, type PrintableTree, type RenderOptions } from './TreePrinter.js';
export {
  validateTree,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
  type ValidationOptions,
} from './TreeValidation.js';
export {
  collectSubtree,
  traverseTree,
  type NodeLookup,
  type SubtreeEntry,
} from './traversal.js';
