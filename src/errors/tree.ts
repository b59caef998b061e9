/**
 * Tree-specific error classes
 *
 * Errors raised by node construction, keyed lookups and positional access.
 */

import { TreeError } from './base.js';

/**
 * Base class for errors raised by tree nodes
 */
export abstract class NodeError extends TreeError {
  constructor(message: string, operation?: string, context?: Record<string, unknown>) {
    super(message, 'tree.node', operation, context);
  }
}

/**
 * Error thrown when a node key cannot be used, e.g. because it contains the
 * path separator
 */
export class KeyValidationError extends NodeError {
  constructor(
    public readonly key: string,
    public readonly issues: string[],
    context?: Record<string, unknown>
  ) {
    super(`Invalid node key "${key}": ${issues.join('; ')}`, 'construct', {
      ...context,
      key,
      issues,
    });
  }
}

export interface NodeNotFoundDetails {
  /** Key of the node whose children were searched */
  parentKey?: string;
  /** Full path being resolved when the lookup failed */
  path?: string;
  [extra: string]: unknown;
}

/**
 * Error thrown when a keyed lookup finds no matching child.
 * `key` is undefined when the search was by predicate.
 */
export class NodeNotFoundException extends NodeError {
  public readonly parentKey?: string | undefined;
  public readonly path?: string | undefined;

  constructor(
    public readonly key: string | undefined,
    operation: string,
    details: NodeNotFoundDetails = {}
  ) {
    super(describeMissingNode(key, details), operation, { ...details, key });
    this.parentKey = details.parentKey;
    this.path = details.path;
  }
}

function describeMissingNode(key: string | undefined, details: NodeNotFoundDetails): string {
  let message =
    key === undefined ? 'No child node matches the predicate' : `Node "${key}" not found`;
  if (details.parentKey !== undefined) {
    message += ` under "${details.parentKey}"`;
  }
  if (details.path !== undefined) {
    message += ` while resolving path "${details.path}"`;
  }
  return message;
}

/**
 * Error thrown when a positional accessor is used on a node without children
 */
export class ChildrenNotFoundException extends NodeError {
  constructor(
    public readonly key: string,
    operation: string
  ) {
    super(`Node "${key}" has no children`, operation, { key });
  }
}

/**
 * Error thrown when a positional operation receives an index outside
 * `[min, max]`
 */
export class IndexOutOfRangeError extends NodeError {
  constructor(
    public readonly index: number,
    public readonly min: number,
    public readonly max: number,
    operation: string,
    context?: Record<string, unknown>
  ) {
    super(
      max < min
        ? `Index ${index} out of range: no valid positions`
        : `Index ${index} out of range [${min}, ${max}]`,
      operation,
      { ...context, index, min, max }
    );
  }
}
