/**
 * Tests for FlatTree construction, queries and mutation
 */

import { describe, it, expect } from 'vitest';
import { FlatTree, ConstructionError } from './index';

const VALUES = ['root', 'child1', 'child2', 'grand0', 'grand1', 'grand2', 'grand3', 'grand4'];
const PARENTS = [0, 0, 0, 1, 1, 1, 2, 2];

function sample(): FlatTree<string> {
  return FlatTree.from(VALUES, PARENTS);
}

describe('FlatTree', () => {
  describe('construction', () => {
    it('should create a tree holding only the root', () => {
      const tree = new FlatTree('root');

      expect(tree.size).toBe(1);
      expect(tree.isTrivial()).toBe(true);
      expect([...tree]).toEqual(['root']);
      expect([...tree.parents()]).toEqual([0]);
    });

    it('should build from matching arrays and keep storage order', () => {
      const names = ['coco', 'moly', 'acra', 'cricket'];
      const result = FlatTree.fromSequences(names, [0, 0, 0, 2]);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.tree.size).toBe(4);
      expect(result.tree.isTrivial()).toBe(false);
      expect([...result.tree]).toEqual(names);
    });

    it('should accept any iterable for values and parents', () => {
      function* parents() {
        yield 0;
        yield 0;
        yield 0;
        yield 2;
      }
      const fromSet = FlatTree.from(new Set(['coco', 'moly', 'acra', 'cricket']), parents());
      const fromTyped = FlatTree.from(['coco', 'moly', 'acra', 'cricket'], Uint32Array.of(0, 0, 0, 2));

      expect([...fromSet]).toEqual(['coco', 'moly', 'acra', 'cricket']);
      expect([...fromSet.parents()]).toEqual([0, 0, 0, 2]);
      expect([...fromTyped.values()]).toEqual(['coco', 'moly', 'acra', 'cricket']);
    });

    it('should report a length mismatch', () => {
      const result = FlatTree.fromSequences(['a', 'b'], [0]);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ConstructionError);
      expect(result.error.kind).toBe('LengthMismatch');
    });

    it('should report a malformed root', () => {
      const moved = FlatTree.fromSequences(['a', 'b'], [1, 0]);
      const empty = FlatTree.fromSequences<string>([], []);

      expect(moved.ok ? null : moved.error.kind).toBe('InvalidRoot');
      expect(empty.ok ? null : empty.error.kind).toBe('InvalidRoot');
    });

    it('should report parents that are not existing indices', () => {
      for (const bad of [5, -1, 0.5, 2]) {
        const result = FlatTree.fromSequences(['a', 'b'], [0, bad]);
        expect(result.ok ? null : result.error.kind).toBe('InvalidParent');
      }
    });

    it('should throw from `from` on bad input', () => {
      expect(() => FlatTree.from(['a'], [0, 0])).toThrow(ConstructionError);
    });

    it('should validate options', () => {
      expect(() => new FlatTree('r', { parallelism: 0 })).toThrow(RangeError);
      expect(() => new FlatTree('r', { parallelThreshold: -1 })).toThrow(RangeError);
      expect(() => new FlatTree('r', { waitTimeoutMs: 0 })).toThrow(RangeError);
      expect(new FlatTree('r', { parallelThreshold: Infinity }).options.parallelThreshold).toBe(Infinity);
    });

    it('should clone independently', () => {
      const tree = sample();
      const copy = tree.clone();

      copy.insert(3, 'great');
      copy.set(1, 'renamed');

      expect(tree.size).toBe(8);
      expect(tree.get(1)).toBe('child1');
      expect(copy.size).toBe(9);
      expect(copy.parentIndex(8)).toBe(3);
      expect(copy.options).toEqual(tree.options);
    });
  });

  describe('iteration', () => {
    it('should iterate forward and backward in storage order', () => {
      const tree = FlatTree.from(['coco', 'moly', 'acra', 'cricket'], [0, 0, 0, 2]);

      expect([...tree.valuesReversed()]).toEqual(['cricket', 'acra', 'moly', 'coco']);
      expect([...tree.entries()]).toEqual([
        [0, 'coco', 0],
        [1, 'moly', 0],
        [2, 'acra', 0],
        [3, 'cricket', 2],
      ]);
    });

    it('should restart iteration on each call', () => {
      const tree = sample();

      expect([...tree]).toEqual(VALUES);
      expect([...tree]).toEqual(VALUES);
    });
  });

  describe('structural queries', () => {
    it('should answer the worked example', () => {
      const tree = sample();

      expect(tree.descendantCount(0)).toBe(2);
      expect(tree.descendantCount(1)).toBe(3);
      expect(tree.descendantCount(2)).toBe(2);
      expect(tree.isLeaf(3)).toBe(true);
      expect(tree.isLeaf(0)).toBe(false);
      expect(tree.parentIndex(5)).toBe(1);
    });

    it('should treat indexExists as a has-children test', () => {
      const tree = sample();

      expect(tree.indexExists(0)).toBe(true);
      expect(tree.indexExists(1)).toBe(true);
      expect(tree.indexExists(3)).toBe(false);
      expect(tree.indexExists(99)).toBe(false);
      expect(tree.indexExists(-1)).toBe(false);
    });

    it('should not count the root as its own child', () => {
      const tree = new FlatTree('root');

      expect(tree.descendantCount(0)).toBe(0);
      expect(tree.isLeaf(0)).toBe(true);
      expect(tree.indexExists(0)).toBe(false);
    });

    it('should return the root as its own parent', () => {
      const tree = sample();

      expect(tree.parentIndex(0)).toBe(0);
      expect([1, 2, 3, 4, 5, 6, 7].map(i => tree.parentIndex(i))).toEqual([0, 0, 1, 1, 1, 2, 2]);
    });

    it('should fail fast on out-of-range indices', () => {
      const tree = sample();

      expect(() => tree.isLeaf(8)).toThrow(RangeError);
      expect(() => tree.parentIndex(-1)).toThrow(RangeError);
      expect(() => tree.get(8)).toThrow(RangeError);
      expect(() => tree.set(1.5, 'x')).toThrow(RangeError);
    });

    it('should collect immediate children, including the root\'s', () => {
      const tree = sample();
      const kids: number[] = [];

      expect(tree.childrenOf(1, kids)).toBe(true);
      expect(kids).toEqual([3, 4, 5]);

      const rootKids: number[] = [];
      expect(tree.childrenOf(0, rootKids)).toBe(true);
      expect(rootKids).toEqual([1, 2]);
    });

    it('should leave the output untouched when there are no children', () => {
      const tree = sample();
      const out = [42];

      expect(tree.childrenOf(3, out)).toBe(false);
      expect(tree.childrenOf(99, out)).toBe(false);
      expect(out).toEqual([42]);
    });

    it('should list every non-root node as the root\'s descendants', () => {
      const tree = sample();
      const out: number[] = [];

      expect(tree.allDescendants(0, out)).toBe(true);
      expect(out).toEqual([1, 2, 3, 4, 5, 6, 7]);
      expect(new FlatTree('root').allDescendants(0, [])).toBe(false);
    });

    it('should collect descendants in first-discovered order', () => {
      // a(1) -> b(2), e(5); b -> d(4) -> f(6); e -> g(7); c(3) hangs off the root
      const tree = FlatTree.from(['r', 'a', 'b', 'c', 'd', 'e', 'f', 'g'], [0, 0, 1, 0, 2, 1, 4, 5]);
      const out: number[] = [];

      expect(tree.allDescendants(1, out)).toBe(true);
      expect(out).toEqual([2, 5, 4, 7, 6]);
      expect(tree.allDescendants(3, [])).toBe(false);
    });

    it('should follow parents stored after their children', () => {
      const tree = FlatTree.from(['r', 'x', 'p', 'y'], [0, 2, 0, 1]);
      const out: number[] = [];

      expect(tree.allDescendants(2, out)).toBe(true);
      expect(out).toEqual([1, 3]);
    });

    it('should append after existing output entries', () => {
      const tree = sample();
      const out = [100];

      tree.allDescendants(2, out);
      expect(out).toEqual([100, 6, 7]);
    });
  });

  describe('insertion', () => {
    it('should append under an existing parent', () => {
      const tree = new FlatTree('root');

      expect(tree.insert(0, 'child1')).toBe(true);
      expect(tree.insert(1, 'grand')).toBe(true);
      expect(tree.size).toBe(3);
      expect(tree.parentIndex(2)).toBe(1);
      expect(tree.get(2)).toBe('grand');
    });

    it('should reject a missing parent without mutating', () => {
      const tree = sample();

      expect(tree.insert(8, 'x')).toBe(false);
      expect(tree.insert(-1, 'x')).toBe(false);
      expect(tree.insertMany(8, ['x', 'y'])).toBe(false);
      expect(tree.size).toBe(8);
    });

    it('should insert siblings in input order', () => {
      const tree = new FlatTree('root');

      expect(tree.insertMany(0, new Set(['a', 'b', 'c']))).toBe(true);
      expect([...tree]).toEqual(['root', 'a', 'b', 'c']);
      expect([...tree.parents()]).toEqual([0, 0, 0, 0]);
    });

    it('should chain appends', () => {
      const tree = new FlatTree('root')
        .append(0, 'child1')
        .append(0, 'child2')
        .append(1, 'grand child 0')
        .appendMany(1, ['grand child 1', 'grand child 2'])
        .appendMany(2, ['grand child 3', 'grand child 4']);

      expect(tree.size).toBe(8);
      expect(tree.descendantCount(0)).toBe(2);
      expect(tree.descendantCount(1)).toBe(3);
      expect([...tree.parents()]).toEqual(PARENTS);
      expect(() => tree.append(99, 'x')).toThrow(RangeError);
    });

    it('should not bump the generation', () => {
      const tree = sample();
      tree.insert(0, 'x');

      expect(tree.generation).toBe(0);
    });

    it('should grow the parent column past its capacity', () => {
      const tree = FlatTree.from(['a', 'b'], [0, 0]);
      expect(tree.capacity).toBe(2);

      for (let i = 0; i < 40; i++) tree.insert(1, `n${i}`);

      expect(tree.size).toBe(42);
      expect(tree.capacity).toBeGreaterThanOrEqual(42);
      expect(tree.descendantCount(1)).toBe(40);
    });
  });

  describe('indexed access', () => {
    it('should read and overwrite values in place', () => {
      const tree = sample();

      expect(tree.get(1)).toBe('child1');
      tree.set(1, 'changed_name');
      expect(tree.get(1)).toBe('changed_name');
      expect(tree.descendantCount(1)).toBe(3);
    });
  });

  describe('removal', () => {
    it('should never remove the root', () => {
      const tree = sample();

      expect(tree.remove(0)).toBe(false);
      expect(tree.size).toBe(8);
      expect(tree.generation).toBe(0);
      expect([...tree]).toEqual(VALUES);
    });

    it('should reject out-of-range targets', () => {
      const tree = sample();

      expect(tree.remove(8)).toBe(false);
      expect(tree.remove(-1)).toBe(false);
      expect(tree.remove(1.5)).toBe(false);
      expect(tree.size).toBe(8);
    });

    it('should remove a node with its subtree by swapping from the end', () => {
      const tree = sample();

      expect(tree.remove(1)).toBe(true);
      expect([...tree]).toEqual(['root', 'grand3', 'child2', 'grand4']);
      expect([...tree.parents()]).toEqual([0, 2, 0, 2]);
      expect(tree.descendantCount(2)).toBe(2);
      expect(tree.generation).toBe(1);
    });

    it('should re-assign indices after removal', () => {
      const tree = sample();
      const held = 6;
      expect(tree.get(held)).toBe('grand3');

      tree.remove(1);

      expect(tree.size).toBe(4);
      expect(() => tree.get(held)).toThrow(RangeError);
      expect(tree.get(1)).toBe('grand3');
    });

    it('should remove a leaf directly', () => {
      const tree = sample();

      expect(tree.remove(7)).toBe(true);
      expect(tree.size).toBe(7);
      expect(tree.descendantCount(2)).toBe(1);
      expect([...tree]).toEqual(VALUES.slice(0, 7));
    });

    it('should re-point children of the node moved into the freed slot', () => {
      // p (index 4) is stored after its children x and y
      const tree = FlatTree.from(['r', 'a', 'x', 'y', 'p'], [0, 0, 4, 4, 0]);

      expect(tree.remove(1)).toBe(true);
      expect([...tree]).toEqual(['r', 'p', 'x', 'y']);
      expect([...tree.parents()]).toEqual([0, 0, 1, 1]);

      const kids: number[] = [];
      tree.childrenOf(1, kids);
      expect(kids).toEqual([2, 3]);
    });

    it('should remove several targets in turn', () => {
      const tree = sample();

      expect(tree.removeMany([7, 6])).toBe(true);
      expect(tree.size).toBe(6);
      expect(tree.isLeaf(2)).toBe(true);
    });

    it('should report a partial failure from removeMany', () => {
      const tree = sample();

      expect(tree.removeMany([7, 7])).toBe(false);
      expect(tree.size).toBe(7);
    });
  });

  describe('capacity', () => {
    it('should reserve and shrink the parent column', () => {
      const tree = new FlatTree('root');
      expect(tree.capacity).toBe(16);

      tree.reserve(100);
      expect(tree.capacity).toBe(100);

      tree.shrinkToFit();
      expect(tree.capacity).toBe(1);
      expect(tree.insert(0, 'again')).toBe(true);
    });

    it('should clear back to the original root', () => {
      const tree = sample();
      tree.clear();

      expect(tree.size).toBe(1);
      expect(tree.get(0)).toBe('root');
      expect([...tree.parents()]).toEqual([0]);
      expect(tree.generation).toBe(1);
    });

    it('should extend with a fill value under the root', () => {
      const tree = sample();
      tree.resize(10, 'new');

      expect(tree.size).toBe(10);
      expect(tree.get(9)).toBe('new');
      expect(tree.parentIndex(9)).toBe(0);
      expect(tree.descendantCount(0)).toBe(4);
      expect(tree.generation).toBe(1);
    });

    it('should truncate both columns', () => {
      const tree = sample();
      tree.resize(3, 'unused');

      expect([...tree]).toEqual(['root', 'child1', 'child2']);
      expect([...tree.parents()]).toEqual([0, 0, 0]);
    });

    it('should refuse to resize below a root', () => {
      const tree = sample();

      expect(() => tree.resize(0, 'x')).toThrow(RangeError);
      expect(tree.size).toBe(8);
    });
  });
});
