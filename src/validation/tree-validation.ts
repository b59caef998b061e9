import type { IndexedNode } from '../entities/IndexedNode.js';
import { VALIDATION_CONFIG } from '../entities/TreeConstants.js';
import { joinPath } from '../utils/path.js';

/**
 * Tree validation - checks that a tree still honours its structural rules
 *
 * The tree itself never re-checks these on mutation (`add` does not reject
 * duplicate keys, `remove` keeps stale back-references), so this is how
 * callers audit a tree after a batch of direct manipulation.
 */

export interface ValidationResult {
  isValid: boolean;
  errors: TreeValidationError[];
  warnings: TreeValidationWarning[];
}

export interface TreeValidationError {
  type: 'parent_mismatch' | 'duplicate_key' | 'cycle';
  /** Path of the offending node, as seen from the validated node */
  path: string;
  key: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface TreeValidationWarning {
  type: 'deep_nesting';
  path: string;
  key: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationOptions {
  maxDepth?: number;
}

/**
 * Validate the subtree rooted at `node`. Never throws on an inconsistent
 * tree; every problem is reported in the result.
 */
export function validateTree<T>(
  node: IndexedNode<T>,
  options: ValidationOptions = {}
): ValidationResult {
  const maxDepth = options.maxDepth ?? VALIDATION_CONFIG.DEFAULT_MAX_DEPTH;
  const errors: TreeValidationError[] = [];
  const warnings: TreeValidationWarning[] = [];
  const descent = new Set<IndexedNode<T>>();

  const visit = (current: IndexedNode<T>, keys: string[]): void => {
    const path = joinPath(keys);

    if (descent.has(current)) {
      errors.push({
        type: 'cycle',
        path,
        key: current.key,
        message: `Node "${current.key}" is its own ancestor`,
      });
      return;
    }

    const depth = keys.length;
    if (depth > maxDepth) {
      warnings.push({
        type: 'deep_nesting',
        path,
        key: current.key,
        message: `Node exceeds maximum depth of ${maxDepth} (current: ${depth})`,
        details: { maxDepth, currentDepth: depth },
      });
    }

    descent.add(current);
    const seenKeys = new Set<string>();

    for (const child of current.children) {
      const childKeys = [...keys, child.key];
      const childPath = joinPath(childKeys);

      if (child.parent !== current) {
        errors.push({
          type: 'parent_mismatch',
          path: childPath,
          key: child.key,
          message: `Node "${child.key}" is listed under "${current.key}" but its parent is ${
            child.parent === null ? 'null' : `"${child.parent.key}"`
          }`,
          details: { listedUnder: current.key, parentKey: child.parent?.key ?? null },
        });
      }

      if (seenKeys.has(child.key)) {
        errors.push({
          type: 'duplicate_key',
          path: childPath,
          key: child.key,
          message: `Key "${child.key}" appears more than once under "${current.key}"`,
        });
      }
      seenKeys.add(child.key);

      visit(child, childKeys);
    }

    descent.delete(current);
  };

  visit(node, []);

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}
