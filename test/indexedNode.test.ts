import { beforeEach, describe, expect, it } from 'vitest';
import { IndexedNode } from '../src/entities/IndexedNode.js';
import { ROOT_KEY } from '../src/entities/TreeConstants.js';
import {
  ChildrenNotFoundException,
  IndexOutOfRangeError,
  KeyValidationError,
  NodeNotFoundException,
} from '../src/errors/index.js';

const node = (key: string) => new IndexedNode<string>({ key });

describe('IndexedNode', () => {
  let root: IndexedNode<string>;
  let a: IndexedNode<string>;
  let b: IndexedNode<string>;
  let c: IndexedNode<string>;

  beforeEach(() => {
    root = node('root');
    a = node('0A');
    b = node('0B');
    c = node('0A1A');
    root.addAll([a, b]);
    a.add(c);
  });

  describe('Construction', () => {
    it('creates a standalone node with no parent and no children', () => {
      const standalone = node('solo');

      expect(standalone.key).toBe('solo');
      expect(standalone.parent).toBeNull();
      expect(standalone.children).toHaveLength(0);
      expect(standalone.meta).toBeUndefined();
    });

    it('generates distinct keys when none is given', () => {
      const first = new IndexedNode();
      const second = new IndexedNode();

      expect(first.key).toMatch(/^[0-9a-f]{8}-[0-9a-z]+$/);
      expect(second.key).not.toBe(first.key);
    });

    it('rejects keys containing the path separator', () => {
      expect(() => node('a.b')).toThrow(KeyValidationError);
      expect(() => node('a.b')).toThrow(
        'Invalid node key "a.b": Key must not contain the path separator "."'
      );
    });

    it('rejects empty keys', () => {
      expect(() => node('')).toThrow('Invalid node key "": Key must not be empty');
    });

    it('creates roots with the reserved root key', () => {
      const tree = IndexedNode.root<number>({ data: 7 });

      expect(tree.key).toBe(ROOT_KEY);
      expect(tree.parent).toBeNull();
      expect(tree.data).toBe(7);
    });

    it('sets only the back-reference when a parent is passed', () => {
      const child = new IndexedNode<string>({ key: 'loose', parent: root });

      expect(child.parent).toBe(root);
      expect(root.children).not.toContain(child);
    });

    it('keeps data and meta as given', () => {
      const meta = { expanded: true };
      const withData = new IndexedNode<string>({ key: 'd', data: 'payload', meta });

      expect(withData.data).toBe('payload');
      expect(withData.meta).toBe(meta);
    });
  });

  describe('Positional accessors', () => {
    it('returns the first and last children', () => {
      expect(root.first).toBe(a);
      expect(root.last).toBe(b);
    });

    it('replaces the first and last children and adopts them', () => {
      const x = node('X');
      const y = node('Y');

      root.first = x;
      root.last = y;

      expect(root.children).toEqual([x, y]);
      expect(x.parent).toBe(root);
      expect(y.parent).toBe(root);
    });

    it('throws ChildrenNotFoundException on an empty node', () => {
      const empty = node('empty');

      expect(() => empty.first).toThrow(ChildrenNotFoundException);
      expect(() => empty.last).toThrow('Node "empty" has no children');
      expect(() => {
        empty.first = node('x');
      }).toThrow(ChildrenNotFoundException);
      expect(() => {
        empty.last = node('x');
      }).toThrow(ChildrenNotFoundException);
      expect(empty.children).toHaveLength(0);
    });

    it('reads children by index', () => {
      expect(root.at(0)).toBe(a);
      expect(root.at(1)).toBe(b);
    });

    it('rejects indexes outside [0, length)', () => {
      expect(() => root.at(-1)).toThrow(IndexOutOfRangeError);
      expect(() => root.at(2)).toThrow('Index 2 out of range [0, 1]');
      expect(() => node('empty').at(0)).toThrow('Index 0 out of range: no valid positions');
    });
  });

  describe('Predicate lookups', () => {
    beforeEach(() => {
      root.add(node('1A'));
    });

    it('finds the first and last matching direct children', () => {
      const startsWithZero = (n: IndexedNode<string>) => n.key.startsWith('0');

      expect(root.firstWhere(startsWithZero)).toBe(a);
      expect(root.lastWhere(startsWithZero)).toBe(b);
    });

    it('does not search below direct children', () => {
      expect(() => root.firstWhere((n) => n.key === '0A1A')).toThrow(NodeNotFoundException);
    });

    it('uses the fallback when nothing matches', () => {
      const fallback = node('fallback');

      expect(root.firstWhere(() => false, () => fallback)).toBe(fallback);
      expect(root.lastWhere(() => false, () => fallback)).toBe(fallback);
    });

    it('throws when nothing matches and no fallback is given', () => {
      expect(() => root.lastWhere(() => false)).toThrow(
        'No child node matches the predicate under "root"'
      );
    });

    it('returns indexes from a start position, or -1', () => {
      const startsWithZero = (n: IndexedNode<string>) => n.key.startsWith('0');

      expect(root.indexWhere(startsWithZero)).toBe(0);
      expect(root.indexWhere(startsWithZero, 1)).toBe(1);
      expect(root.indexWhere(startsWithZero, 2)).toBe(-1);
      expect(root.indexWhere((n) => n.key === 'nope')).toBe(-1);
    });

    it('returns the same result on repeated reads', () => {
      const isB = (n: IndexedNode<string>) => n.key === '0B';

      expect(root.firstWhere(isB)).toBe(root.firstWhere(isB));
      expect(root.lastWhere(isB)).toBe(root.lastWhere(isB));
      expect(root.indexWhere(isB)).toBe(root.indexWhere(isB));
    });
  });

  describe('Keyed insertion', () => {
    it('appends with add and sets the parent', () => {
      const d = node('0D');
      root.add(d);

      expect(d.parent).toBe(root);
      expect(root.children).toEqual([a, b, d]);
    });

    it('does not reject duplicate sibling keys', () => {
      root.add(node('0A'));

      expect(root.children.map((n) => n.key)).toEqual(['0A', '0B', '0A']);
    });

    it('appends every node with addAll in order', () => {
      const x = node('X');
      const y = node('Y');
      root.addAll(new Set([x, y]));

      expect(root.children).toEqual([a, b, x, y]);
      expect(x.parent).toBe(root);
      expect(y.parent).toBe(root);
    });

    it('appends a copy of its own children with addAll', () => {
      root.addAll(root.children);

      expect(root.children).toEqual([a, b, a, b]);
    });

    it('inserts at an index, including at the end', () => {
      const x = node('X');
      const y = node('Y');

      root.insert(0, x);
      root.insert(3, y);

      expect(root.children).toEqual([x, a, b, y]);
      expect(y.parent).toBe(root);
    });

    it('rejects insertion past the end', () => {
      expect(() => root.insert(3, node('X'))).toThrow('Index 3 out of range [0, 2]');
      expect(() => root.insert(-1, node('X'))).toThrow(IndexOutOfRangeError);
      expect(root.children).toEqual([a, b]);
    });

    it('inserts after a sibling and returns the new index', () => {
      const d = node('0D');

      expect(root.insertAfter(a, d)).toBe(1);
      expect(root.children).toEqual([a, d, b]);
      expect(d.parent).toBe(root);
    });

    it('inserts before a sibling and returns the new index', () => {
      const d = node('0D');

      expect(root.insertBefore(b, d)).toBe(1);
      expect(root.children).toEqual([a, d, b]);
    });

    it('matches the anchor by key rather than identity', () => {
      const d = node('0D');

      expect(root.insertAfter(node('0B'), d)).toBe(2);
      expect(root.children).toEqual([a, b, d]);
    });

    it('throws NodeNotFoundException for an unknown anchor', () => {
      expect(() => root.insertBefore(node('zz'), node('0D'))).toThrow(
        'Node "zz" not found under "root"'
      );
      expect(root.children).toEqual([a, b]);
    });

    it('inserts a batch contiguously', () => {
      const x = node('X');
      const y = node('Y');
      root.insertAll(1, [x, y]);

      expect(root.children).toEqual([a, x, y, b]);
      expect(x.parent).toBe(root);
      expect(y.parent).toBe(root);
    });

    it('rejects batch insertion past the end', () => {
      expect(() => root.insertAll(5, [node('X')])).toThrow(IndexOutOfRangeError);
    });
  });

  describe('Removal', () => {
    it('removes by key and keeps the removed node parent', () => {
      const d = node('0D');
      root.add(d);
      root.remove(d);

      expect(root.children).toEqual([a, b]);
      expect(d.parent).toBe(root);
    });

    it('throws when removing a node that is not a child', () => {
      expect(() => root.remove(c)).toThrow(NodeNotFoundException);
      expect(() => root.remove(c)).toThrow('Node "0A1A" not found under "root"');
    });

    it('removes by index and returns the node', () => {
      expect(root.removeAt(0)).toBe(a);
      expect(root.children).toEqual([b]);
    });

    it('rejects removal at an invalid index', () => {
      expect(() => root.removeAt(2)).toThrow(IndexOutOfRangeError);
      expect(() => root.removeAt(-1)).toThrow(IndexOutOfRangeError);
      expect(root.children).toEqual([a, b]);
    });

    it('removes every node with removeAll and reports the count', () => {
      expect(root.removeAll([b, a])).toBe(2);
      expect(root.children).toHaveLength(0);
    });

    it('keeps earlier removals when removeAll fails part way', () => {
      const x = node('X');
      let caught: unknown;

      try {
        root.removeAll([a, x]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(NodeNotFoundException);
      if (caught instanceof NodeNotFoundException) {
        expect(caught.key).toBe('X');
        expect(caught.context?.removedBeforeFailure).toBe(1);
      }
      expect(root.children).toEqual([b]);
    });

    it('empties the node when given its own children to removeAll', () => {
      root.addAll([node('X'), node('Y')]);

      expect(root.removeAll(root.children)).toBe(4);
      expect(root.children).toHaveLength(0);
    });

    it('leaves children untouched when a removeWhere predicate throws', () => {
      root.add(node('0C'));

      expect(() =>
        root.removeWhere((n) => {
          if (n.key === '0C') throw new Error('predicate failed');
          return n.key === '0A';
        })
      ).toThrow('predicate failed');
      expect(root.children.map((n) => n.key)).toEqual(['0A', '0B', '0C']);
    });

    it('removes every match with removeWhere', () => {
      root.add(node('1A'));

      expect(root.removeWhere((n) => n.key.startsWith('0'))).toBe(2);
      expect(root.children.map((n) => n.key)).toEqual(['1A']);
      expect(root.removeWhere(() => false)).toBe(0);
    });

    it('clears children without touching their parents', () => {
      root.clear();

      expect(root.children).toHaveLength(0);
      expect(a.parent).toBe(root);
      expect(b.parent).toBe(root);
    });

    it('deletes a child from its parent', () => {
      c.delete();

      expect(a.children).toHaveLength(0);
      expect(c.parent).toBe(a);
    });

    it('clears a root on delete', () => {
      root.delete();

      expect(root.children).toHaveLength(0);
      expect(root.parent).toBeNull();
    });

    it('throws when deleting a node its parent no longer lists', () => {
      root.remove(b);

      expect(() => b.delete()).toThrow(NodeNotFoundException);
    });

    it('restores the children after add then remove', () => {
      const before = [...root.children];
      const d = node('0D');

      root.add(d);
      root.remove(d);

      expect(root.children).toEqual(before);
      expect(d.parent).toBe(root);
    });

    it('keeps a detached subtree usable', () => {
      root.remove(a);

      expect(a.elementAt('0A1A')).toBe(c);
      expect(c.parent).toBe(a);
    });
  });

  describe('Path resolution', () => {
    it('resolves descendants by key path', () => {
      expect(root.elementAt('0A.0A1A')).toBe(c);
      expect(root.elementAt('0B')).toBe(b);
      expect(root.get('0A')).toBe(a);
    });

    it('treats a token equal to the current key as staying put', () => {
      expect(root.elementAt('root.0A.0A1A')).toBe(c);
      expect(root.elementAt('root')).toBe(root);
      expect(a.elementAt('0A.0A1A')).toBe(c);
    });

    it('resolves paths from a reserved root', () => {
      const tree = IndexedNode.root<string>();
      const docs = node('docs');
      tree.add(docs);

      expect(tree.elementAt('/.docs')).toBe(docs);
      expect(tree.elementAt(tree.path)).toBe(tree);
    });

    it('returns the start node for an empty path', () => {
      expect(root.elementAt('')).toBe(root);
    });

    it('round-trips every node through its path', () => {
      for (const target of [a, b, c]) {
        expect(root.elementAt(target.path)).toBe(target);
      }
    });

    it('reports the missing key and the full path', () => {
      let caught: unknown;

      try {
        root.elementAt('0A.missing');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(NodeNotFoundException);
      if (caught instanceof NodeNotFoundException) {
        expect(caught.key).toBe('missing');
        expect(caught.parentKey).toBe('0A');
        expect(caught.path).toBe('0A.missing');
        expect(caught.message).toBe(
          'Node "missing" not found under "0A" while resolving path "0A.missing"'
        );
      }
    });
  });

  describe('Scenario', () => {
    it('builds, inserts and removes as a UI tree would', () => {
      const d = node('0D');

      expect(root.elementAt('0A.0A1A')).toBe(c);
      expect(root.insertBefore(b, d)).toBe(1);
      expect(root.children).toEqual([a, d, b]);

      root.remove(d);
      expect(root.children).toEqual([a, b]);
    });
  });

  describe('Traversal', () => {
    it('walks depth first in pre-order', () => {
      const keys: string[] = [];
      root.walkDepthFirst((n) => keys.push(n.key));

      expect(keys).toEqual(['root', '0A', '0A1A', '0B']);
    });

    it('walks breadth first by level', () => {
      b.add(node('0B1A'));
      const keys: string[] = [];
      root.walkBreadthFirst((n) => keys.push(n.key));

      expect(keys).toEqual(['root', '0A', '0B', '0A1A', '0B1A']);
    });
  });

  describe('Children views', () => {
    it('returns a frozen snapshot from childrenAsList', () => {
      const snapshot = root.childrenAsList;
      root.add(node('X'));

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(snapshot).toEqual([a, b]);
      expect(root.children).toHaveLength(3);
    });
  });

  describe('Reattachment', () => {
    it('moves the back-reference without detaching from the old parent', () => {
      const other = node('other');
      other.add(a);

      expect(a.parent).toBe(other);
      expect(root.children).toContain(a);
      expect(other.children).toEqual([a]);
    });
  });
});
