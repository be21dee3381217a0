/**
 * Base error classes for Canopy
 *
 * Every error raised by the tree, codec and node layers derives from
 * `CanopyError`, so callers can branch on a single type and still read the
 * module and operation that failed.
 */

/**
 * Base error class for all Canopy errors
 */
export abstract class CanopyError extends Error {
  /**
   * Module where the error originated
   */
  public readonly module: string;

  /**
   * Operation being performed when the error occurred
   */
  public readonly operation?: string | undefined;

  /**
   * Additional context information
   */
  public readonly context?: Record<string, unknown> | undefined;

  public readonly timestamp: Date;

  constructor(
    message: string,
    module: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.module = module;
    this.operation = operation;
    this.context = context;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Copy of this error carrying extra context. The copy keeps the concrete
   * class, message and operation of the original.
   */
  withContext(additionalContext: Record<string, unknown>): CanopyError {
    const copy: CanopyError = Object.create(Object.getPrototypeOf(this), {
      ...Object.getOwnPropertyDescriptors(this),
      context: {
        value: { ...this.context, ...additionalContext },
        enumerable: true,
      },
    });
    return copy;
  }

  /**
   * Convert error to a structured object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      module: this.module,
      operation: this.operation,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

export function isCanopyError(error: unknown): error is CanopyError {
  return error instanceof CanopyError;
}

/**
 * Extract error details for logging
 */
export function extractErrorDetails(error: unknown): {
  message: string;
  module?: string | undefined;
  operation?: string | undefined;
  context?: Record<string, unknown> | undefined;
  stack?: string | undefined;
} {
  if (error instanceof CanopyError) {
    return {
      message: error.message,
      module: error.module,
      operation: error.operation,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
