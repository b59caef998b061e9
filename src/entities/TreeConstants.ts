/**
 * Reserved values shared by every tree node
 */
export const TREE_KEYS = {
  /** Key given to nodes created through the root factory */
  ROOT_KEY: '/',

  /** Character that joins sibling keys into a path */
  PATH_SEPARATOR: '.',
} as const;

export const { ROOT_KEY, PATH_SEPARATOR } = TREE_KEYS;

/**
 * Tree validation configuration constants
 */
export const VALIDATION_CONFIG = {
  /** Depth beyond which validation reports a deep_nesting warning */
  DEFAULT_MAX_DEPTH: 32,
} as const;
