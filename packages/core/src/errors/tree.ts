/**
 * Tree-specific error classes
 *
 * Recoverable failures raised by tree, node and codec operations.
 */

import { CanopyError } from './base.js';

/**
 * Base class for errors raised while operating on a tree
 */
export abstract class TreeError extends CanopyError {
  constructor(
    message: string,
    component: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, `tree.${component}`, operation, context);
  }
}

/**
 * Thrown when a parentless node is added to a tree that already has a root
 */
export class RootNodeAlreadyPresentError extends TreeError {
  constructor(operation = 'addNode', context?: Record<string, unknown>) {
    super(
      'Root node already present in the tree. You cannot add another root node.',
      'structure',
      operation,
      context
    );
  }
}

/**
 * Thrown when a lookup by id finds no node
 */
export class NodeNotFoundError extends TreeError {
  constructor(
    public readonly nodeId: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(`Node ${nodeId} not found in the tree.`, 'lookup', operation, { ...context, nodeId });
  }
}

/**
 * Thrown for structurally illegal requests, such as removing the root while
 * retaining its children
 */
export class InvalidOperationError extends TreeError {
  constructor(
    public readonly reason: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(reason, 'structure', operation, context);
  }
}

/**
 * Thrown when a tree cannot be rendered
 */
export class FormatError extends TreeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'display', 'render', cause === undefined ? undefined : { cause });
  }
}

/**
 * Thrown when a node record is accessed while an exclusive access on the same
 * record is in progress, e.g. reading a node from inside its own
 * `updateValue` callback
 */
export class AccessConflictError extends TreeError {
  constructor(
    public readonly nodeId: string,
    public readonly requested: 'shared' | 'exclusive',
    context?: Record<string, unknown>
  ) {
    super(
      `Node ${nodeId} is already exclusively held; ${requested} access refused.`,
      'node',
      'access',
      { ...context, nodeId, requested }
    );
  }
}

/**
 * Thrown when a serialized record cannot be turned into a valid tree
 */
export class DeserializationError extends TreeError {
  constructor(
    message: string,
    public readonly issues: string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'codec', 'decode', { ...context, issues });
  }
}
