import { z } from 'zod';
import { PATH_SEPARATOR } from '../entities/TreeConstants.js';
import { KeyValidationError } from '../errors/tree.js';

/**
 * Schema for keys supplied by callers. A key becomes a path token, so it
 * cannot be empty or contain the separator.
 */
export const nodeKeySchema = z
  .string()
  .min(1, 'Key must not be empty')
  .refine((key) => !key.includes(PATH_SEPARATOR), {
    message: `Key must not contain the path separator "${PATH_SEPARATOR}"`,
  });

/**
 * Throws {@link KeyValidationError} unless `key` is usable as a node key
 */
export function validateNodeKey(key: string): string {
  const result = nodeKeySchema.safeParse(key);
  if (!result.success) {
    throw new KeyValidationError(
      key,
      result.error.issues.map((issue) => issue.message)
    );
  }
  return result.data;
}

/**
 * Split a path into its key tokens. Empty tokens are dropped, so leading,
 * trailing and doubled separators are ignored.
 */
export function splitPath(path: string): string[] {
  return path.split(PATH_SEPARATOR).filter((token) => token.length > 0);
}

export function joinPath(keys: readonly string[]): string {
  return keys.join(PATH_SEPARATOR);
}
