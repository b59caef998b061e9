/**
 * keyed-tree - A mutable, ordered tree of keyed nodes with path addressing
 *
 * Nodes own an ordered list of children, carry a key unique among their
 * siblings and resolve descendants from dotted key paths such as
 * `"settings.display.theme"`.
 */

// Tree nodes
export {
  Node,
  IndexedNode,
  type IndexedNodeOptions,
  type NodePredicate,
  type NodeVisitor,
  TREE_KEYS,
  ROOT_KEY,
  PATH_SEPARATOR,
} from './entities/index.js';

// Path utilities
export { nodeKeySchema, validateNodeKey, splitPath, joinPath } from './utils/path.js';
export { generateNodeKey } from './utils/nodeKey.js';

// Structural validation
export {
  validateTree,
  type ValidationResult,
  type TreeValidationError,
  type TreeValidationWarning,
  type ValidationOptions,
} from './validation/index.js';

// Errors
export {
  TreeError,
  NodeError,
  KeyValidationError,
  NodeNotFoundException,
  ChildrenNotFoundException,
  IndexOutOfRangeError,
  isTreeError,
  extractErrorDetails,
  type NodeNotFoundDetails,
} from './errors/index.js';

// Configuration and logging
export { cfg, parseConfig, type AppConfig } from './config/index.js';
export { logger, createLogger, createModuleLogger, logError } from './utils/logger.js';
