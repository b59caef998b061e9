import { joinPath } from '../utils/path.js';

/**
 * Node - Contract shared by every tree node, whatever the child storage
 *
 * A node knows its key and its parent. Everything else here (root, path,
 * level) is derived by walking parent references, so it costs O(depth) and
 * is always in step with the latest structural change.
 *
 * `N` is the concrete node type, which lets derived views such as `root`
 * and `parent` come back as that type rather than as a bare `Node`.
 */
export abstract class Node<T, N extends Node<T, N>> {
  /** Unique among siblings; never changes after construction */
  abstract readonly key: string;

  /** Non-owning back-reference; null only for a root */
  abstract parent: N | null;

  /** Payload carried by the node */
  abstract readonly data: T | undefined;

  abstract get childrenAsList(): readonly N[];

  /**
   * The ascendant with no parent. A node without a parent is its own root.
   */
  get root(): N | this {
    let current: N | this = this;
    while (current.parent !== null) {
      current = current.parent;
    }
    return current;
  }

  get isRoot(): boolean {
    return this.parent === null;
  }

  get isLeaf(): boolean {
    return this.length === 0;
  }

  /** Number of direct children */
  abstract get length(): number;

  /** Number of ancestors; 0 for a root */
  get level(): number {
    return this.pathKeys.length;
  }

  /**
   * Keys from the root down to this node. The root's own key is left out,
   * so a root yields an empty list.
   */
  get pathKeys(): string[] {
    const keys: string[] = [];
    let current: N | this = this;
    while (current.parent !== null) {
      keys.unshift(current.key);
      current = current.parent;
    }
    return keys;
  }

  /**
   * Address of this node from its root. A root is addressed by its own
   * key, which path resolution treats as "stay here".
   */
  get path(): string {
    return this.parent === null ? this.key : joinPath(this.pathKeys);
  }

  toString(): string {
    const parentKey = this.parent === null ? 'null' : this.parent.key;
    return `${this.constructor.name}{key: ${this.key}, children: ${this.length}, parent: ${parentKey}}`;
  }
}
