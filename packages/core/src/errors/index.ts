/**
 * Centralized error handling for Canopy
 */

export { CanopyError, isCanopyError, extractErrorDetails } from './base.js';

export {
  TreeError,
  RootNodeAlreadyPresentError,
  NodeNotFoundError,
  InvalidOperationError,
  FormatError,
  AccessConflictError,
  DeserializationError,
} from './tree.js';
