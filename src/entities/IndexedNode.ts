import { cfg } from '../config/index.js';
import {
  ChildrenNotFoundException,
  IndexOutOfRangeError,
  NodeNotFoundException,
} from '../errors/tree.js';
import { createModuleLogger } from '../utils/logger.js';
import { generateNodeKey } from '../utils/nodeKey.js';
import { splitPath, validateNodeKey } from '../utils/path.js';
import { Node } from './Node.js';
import { ROOT_KEY } from './TreeConstants.js';

const logger = createModuleLogger('IndexedNode');

export interface IndexedNodeOptions<T> {
  /** Must be unique among the siblings; generated when omitted */
  key?: string;
  /** Sets the back-reference only; the node is not added to the parent's children */
  parent?: IndexedNode<T> | null;
  data?: T;
  meta?: Record<string, unknown>;
}

export type NodePredicate<T> = (node: IndexedNode<T>) => boolean;
export type NodeVisitor<T> = (node: IndexedNode<T>) => void;

/**
 * IndexedNode - Node that keeps its children in an ordered list
 *
 * Insertion order is the display and traversal order. Children are matched
 * by key, not by identity, in every keyed operation.
 *
 * Attaching (`add`, `insert*`, the `first`/`last` setters) sets the child's
 * `parent` but never detaches it from a previous parent, and removal
 * (`remove*`, `clear`) leaves the removed node's `parent` untouched. Moving a
 * node is therefore `oldParent.remove(node)` followed by `newParent.add(node)`.
 *
 * @example
 * ```typescript
 * const root = IndexedNode.root();
 * root.addAll([new IndexedNode({ key: 'docs' }), new IndexedNode({ key: 'src' })]);
 * root.first.add(new IndexedNode({ key: 'guide' }));
 *
 * root.elementAt('docs.guide').path; // 'docs.guide'
 * ```
 */
export class IndexedNode<T = unknown> extends Node<T, IndexedNode<T>> {
  readonly key: string;
  parent: IndexedNode<T> | null;
  data: T | undefined;

  /**
   * Caller-attached data; never read or written by the tree itself
   */
  meta: Record<string, unknown> | undefined;

  private readonly _children: IndexedNode<T>[] = [];

  constructor(options: IndexedNodeOptions<T> = {}) {
    super();
    this.key = options.key === undefined ? generateNodeKey() : validateNodeKey(options.key);
    this.parent = options.parent ?? null;
    this.data = options.data;
    this.meta = options.meta;
  }

  /**
   * Create a node carrying the reserved root key
   */
  static root<T = unknown>(options: Pick<IndexedNodeOptions<T>, 'data' | 'meta'> = {}): IndexedNode<T> {
    return new IndexedNode<T>({ ...options, key: ROOT_KEY });
  }

  /**
   * The live children list. Read-only at compile time only: it is the
   * backing array, so it changes with every mutation. Take
   * {@link childrenAsList} for a snapshot.
   */
  get children(): readonly IndexedNode<T>[] {
    return this._children;
  }

  get length(): number {
    return this._children.length;
  }

  /** Frozen snapshot of the children */
  get childrenAsList(): readonly IndexedNode<T>[] {
    return Object.freeze([...this._children]);
  }

  get first(): IndexedNode<T> {
    return this._children[this.boundaryIndex('first', 'first')] ?? this.missingChildren('first');
  }

  set first(value: IndexedNode<T>) {
    this.replaceAt(this.boundaryIndex('first', 'setFirst'), value, 'setFirst');
  }

  get last(): IndexedNode<T> {
    return this._children[this.boundaryIndex('last', 'last')] ?? this.missingChildren('last');
  }

  set last(value: IndexedNode<T>) {
    this.replaceAt(this.boundaryIndex('last', 'setLast'), value, 'setLast');
  }

  /**
   * Child at `index`
   */
  at(index: number): IndexedNode<T> {
    this.assertIndex(index, this._children.length - 1, 'at');
    return this._children[index] ?? this.outOfRange(index, this._children.length - 1, 'at');
  }

  /**
   * First direct child matching `test`. Falls back to `orElse` when nothing
   * matches, otherwise throws {@link NodeNotFoundException}.
   */
  firstWhere(test: NodePredicate<T>, orElse?: () => IndexedNode<T>): IndexedNode<T> {
    const found = this._children.find((child) => test(child));
    if (found !== undefined) return found;
    if (orElse) return orElse();
    throw new NodeNotFoundException(undefined, 'firstWhere', { parentKey: this.key });
  }

  /**
   * Last direct child matching `test`, with the same fallback rules as
   * {@link firstWhere}.
   */
  lastWhere(test: NodePredicate<T>, orElse?: () => IndexedNode<T>): IndexedNode<T> {
    for (let i = this._children.length - 1; i >= 0; i--) {
      const child = this._children[i];
      if (child !== undefined && test(child)) return child;
    }
    if (orElse) return orElse();
    throw new NodeNotFoundException(undefined, 'lastWhere', { parentKey: this.key });
  }

  /**
   * Index of the first child at or after `start` matching `test`, or -1
   */
  indexWhere(test: NodePredicate<T>, start = 0): number {
    for (let i = Math.max(start, 0); i < this._children.length; i++) {
      const child = this._children[i];
      if (child !== undefined && test(child)) return i;
    }
    return -1;
  }

  /**
   * Append `node` as the last child. Sibling keys are not checked for
   * duplicates.
   */
  add(node: IndexedNode<T>): void {
    this.adopt(node, 'add');
    this._children.push(node);
    logger.debug({ operation: 'add', parent: this.key, child: node.key }, 'Child appended');
  }

  /**
   * Append every node of `nodes`, keeping their relative order
   */
  addAll(nodes: Iterable<IndexedNode<T>>): void {
    for (const node of Array.from(nodes)) {
      this.adopt(node, 'addAll');
      this._children.push(node);
    }
    logger.debug({ operation: 'addAll', parent: this.key, length: this._children.length }, 'Children appended');
  }

  /**
   * Insert `node` at `index`; `index` may equal the current length
   */
  insert(index: number, node: IndexedNode<T>): void {
    this.assertIndex(index, this._children.length, 'insert');
    this.adopt(node, 'insert');
    this._children.splice(index, 0, node);
    logger.debug({ operation: 'insert', parent: this.key, child: node.key, index }, 'Child inserted');
  }

  /**
   * Insert `node` right after the child keyed like `after`
   *
   * @returns the index `node` was inserted at
   */
  insertAfter(after: IndexedNode<T>, node: IndexedNode<T>): number {
    const index = this.requireIndexOfKey(after.key, 'insertAfter') + 1;
    this.insert(index, node);
    return index;
  }

  /**
   * Insert `node` right before the child keyed like `before`
   *
   * @returns the index `node` was inserted at
   */
  insertBefore(before: IndexedNode<T>, node: IndexedNode<T>): number {
    const index = this.requireIndexOfKey(before.key, 'insertBefore');
    this.insert(index, node);
    return index;
  }

  /**
   * Insert `nodes` contiguously starting at `index`
   */
  insertAll(index: number, nodes: Iterable<IndexedNode<T>>): void {
    this.assertIndex(index, this._children.length, 'insertAll');
    const batch = Array.from(nodes);
    for (const node of batch) {
      this.adopt(node, 'insertAll');
    }
    this._children.splice(index, 0, ...batch);
    logger.debug({ operation: 'insertAll', parent: this.key, index, count: batch.length }, 'Children inserted');
  }

  /**
   * Detach this node from its parent. A root has no parent to leave, so it
   * clears its own children instead.
   */
  delete(): void {
    if (this.parent === null) {
      this.clear();
      return;
    }
    this.parent.remove(this);
  }

  /**
   * Remove the first child keyed like `node`. The removed node keeps its
   * `parent` reference.
   */
  remove(node: IndexedNode<T>): void {
    const index = this.requireIndexOfKey(node.key, 'remove');
    this._children.splice(index, 1);
    logger.debug({ operation: 'remove', parent: this.key, child: node.key, index }, 'Child removed');
  }

  /**
   * Remove and return the child at `index`
   */
  removeAt(index: number): IndexedNode<T> {
    this.assertIndex(index, this._children.length - 1, 'removeAt');
    const [removed] = this._children.splice(index, 1);
    if (removed === undefined) {
      return this.outOfRange(index, this._children.length - 1, 'removeAt');
    }
    logger.debug({ operation: 'removeAt', parent: this.key, child: removed.key, index }, 'Child removed');
    return removed;
  }

  /**
   * Remove each of `nodes` in turn. `nodes` is read in full first, so
   * passing `this.children` empties the node. Not transactional: when a
   * node is missing, the removals before it stay applied and the thrown
   * error reports them as `removedBeforeFailure`.
   *
   * @returns the number of nodes removed
   */
  removeAll(nodes: Iterable<IndexedNode<T>>): number {
    let removed = 0;
    for (const node of Array.from(nodes)) {
      const index = this.indexOfKey(node.key);
      if (index < 0) {
        throw new NodeNotFoundException(node.key, 'removeAll', {
          parentKey: this.key,
          removedBeforeFailure: removed,
        });
      }
      this._children.splice(index, 1);
      removed++;
    }
    logger.debug({ operation: 'removeAll', parent: this.key, removed }, 'Children removed');
    return removed;
  }

  /**
   * Remove every direct child matching `test` in a single pass
   *
   * @returns the number of nodes removed
   */
  removeWhere(test: NodePredicate<T>): number {
    // Children stay untouched until every predicate call has returned
    const kept = this._children.filter((child) => !test(child));
    const removed = this._children.length - kept.length;
    this._children.splice(0, this._children.length, ...kept);
    logger.debug({ operation: 'removeWhere', parent: this.key, removed }, 'Children removed');
    return removed;
  }

  /**
   * Remove all children. Their `parent` references are left as they are.
   */
  clear(): void {
    const removed = this._children.length;
    this._children.length = 0;
    logger.debug({ operation: 'clear', parent: this.key, removed }, 'Children cleared');
  }

  /**
   * Resolve a descendant from a separator-delimited list of keys.
   *
   * A token equal to the current node's own key is skipped, so a path may
   * restate the start node (`'/.docs'` from a root works like `'docs'`).
   *
   * @example
   * ```typescript
   * root.elementAt('0C.0C1C'); // grandchild keyed 0C1C under child 0C
   * ```
   */
  elementAt(path: string): IndexedNode<T> {
    let current: IndexedNode<T> = this;
    for (const key of splitPath(path)) {
      if (key === current.key) continue;
      const next = current._children.find((child) => child.key === key);
      if (next === undefined) {
        throw new NodeNotFoundException(key, 'elementAt', { parentKey: current.key, path });
      }
      current = next;
    }
    return current;
  }

  /**
   * Shorthand for {@link elementAt}
   */
  get(path: string): IndexedNode<T> {
    return this.elementAt(path);
  }

  // Traversal methods
  walkDepthFirst(visitor: NodeVisitor<T>): void {
    visitor(this);
    for (const child of this._children) {
      child.walkDepthFirst(visitor);
    }
  }

  walkBreadthFirst(visitor: NodeVisitor<T>): void {
    const queue: IndexedNode<T>[] = [this];

    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;
      visitor(current);
      queue.push(...current._children);
    }
  }

  private adopt(node: IndexedNode<T>, operation: string): void {
    const previous = node.parent;
    if (
      cfg.TREE_WARN_ON_REATTACH &&
      previous !== null &&
      previous !== this &&
      previous._children.includes(node)
    ) {
      logger.warn(
        { operation, child: node.key, previousParent: previous.key, parent: this.key },
        'Node attached while its previous parent still lists it'
      );
    }
    node.parent = this;
  }

  private indexOfKey(key: string): number {
    return this.indexWhere((child) => child.key === key);
  }

  private requireIndexOfKey(key: string, operation: string): number {
    const index = this.indexOfKey(key);
    if (index < 0) {
      throw new NodeNotFoundException(key, operation, { parentKey: this.key });
    }
    return index;
  }

  private boundaryIndex(end: 'first' | 'last', operation: string): number {
    if (this._children.length === 0) {
      throw new ChildrenNotFoundException(this.key, operation);
    }
    return end === 'first' ? 0 : this._children.length - 1;
  }

  private replaceAt(index: number, node: IndexedNode<T>, operation: string): void {
    this.adopt(node, operation);
    this._children[index] = node;
    logger.debug({ operation, parent: this.key, child: node.key, index }, 'Child replaced');
  }

  private assertIndex(index: number, max: number, operation: string): void {
    if (!Number.isInteger(index) || index < 0 || index > max) {
      this.outOfRange(index, max, operation);
    }
  }

  private outOfRange(index: number, max: number, operation: string): never {
    throw new IndexOutOfRangeError(index, 0, max, operation, { key: this.key });
  }

  private missingChildren(operation: string): never {
    throw new ChildrenNotFoundException(this.key, operation);
  }
}
