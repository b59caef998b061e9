/**
 * Centralized error handling for keyed-tree
 */

export { TreeError, isTreeError, extractErrorDetails } from './base.js';

export {
  NodeError,
  KeyValidationError,
  NodeNotFoundException,
  ChildrenNotFoundException,
  IndexOutOfRangeError,
  type NodeNotFoundDetails,
} from './tree.js';
