/**
 * Base error classes for keyed-tree
 *
 * Every failure raised by the tree core derives from {@link TreeError} so
 * callers can tell tree failures apart from anything else with one check.
 */

/**
 * Base error class for all tree errors
 */
export abstract class TreeError extends Error {
  /**
   * Module where the error originated
   */
  public readonly module: string;

  /**
   * Operation being performed when error occurred
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

/**
 * Type guard to check if an error is a TreeError
 */
export function isTreeError(error: unknown): error is TreeError {
  return error instanceof TreeError;
}

/**
 * Extract error details for logging
 */
export function extractErrorDetails(error: unknown): {
  name?: string | undefined;
  message: string;
  module?: string | undefined;
  operation?: string | undefined;
  context?: Record<string, unknown> | undefined;
  stack?: string | undefined;
} {
  if (error instanceof TreeError) {
    return {
      name: error.name,
      message: error.message,
      module: error.module,
      operation: error.operation,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
