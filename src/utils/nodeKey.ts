import { randomUUID } from 'node:crypto';

// Random per-process prefix plus a counter keeps generated keys unique for
// the lifetime of the process, whichever parent a node ends up under.
const processPrefix = randomUUID().slice(0, 8);
let counter = 0;

/**
 * Generate a key for a node constructed without one
 */
export function generateNodeKey(): string {
  counter += 1;
  return `${processPrefix}-${counter.toString(36)}`;
}
