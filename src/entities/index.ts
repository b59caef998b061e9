/**
 * @fileoverview Entities module - ordered, keyed tree nodes
 *
 * @module entities
 */

export { Node } from './Node.js';
export {
  IndexedNode,
  type IndexedNodeOptions,
  type NodePredicate,
  type NodeVisitor,
} from './IndexedNode.js';
export { TREE_KEYS, ROOT_KEY, PATH_SEPARATOR, VALIDATION_CONFIG } from './TreeConstants.js';
