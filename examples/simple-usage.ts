/**
 * Simple usage - build, query, mutate and traverse a flat tree
 */

import { FlatTree, Execution } from '../packages/core/src/index';

console.log('=== FlatTree: one array of values, one array of parents ===\n');

// ===== Build =====
console.log('1️⃣ Build from a root and inserts');
const tree = new FlatTree('root')
  .append(0, 'child1')
  .append(0, 'child2')
  .append(1, 'grand child 0')
  .appendMany(1, ['grand child 1', 'grand child 2'])
  .appendMany(2, ['grand child 3', 'grand child 4']);

console.log('size:', tree.size);
console.log('simple dump:', tree.dumpSimple());
console.log('grouped dump:\n' + tree.dumpGrouped());

// ===== Queries =====
console.log('2️⃣ Structural queries');
console.log('children of root:', tree.descendantCount(0));
console.log('children of child1:', tree.descendantCount(1));
console.log('is "grand child 0" a leaf:', tree.isLeaf(3));
console.log('parent of node 5:', tree.parentIndex(5));

const descendants: number[] = [];
tree.allDescendants(1, descendants);
console.log('descendants of child1:', descendants);

// ===== Indexed update =====
console.log('\n3️⃣ Rename a node in place');
tree.set(1, 'changed_name');
console.log('node 1:', tree.get(1));

// ===== Traverse =====
console.log('\n4️⃣ Traverse');
tree.traverse(1, Execution.Sequential, value => `${value}_`);
console.log(tree.dumpGrouped());

let counter = 0;
await tree.traverse(0, Execution.Parallel, value => `${value}#${counter++}`);
console.log(tree.dumpGrouped());

// ===== Remove =====
console.log('5️⃣ Remove child1 and its subtree');
const before = tree.generation;
tree.remove(1);
console.log(tree.dumpGrouped());
console.log('generation changed:', tree.generation !== before, '← held indices are stale');

// ===== From sequences =====
console.log('\n6️⃣ Build from sequences');
const result = FlatTree.fromSequences(['coco', 'moly', 'acra', 'cricket'], [0, 0, 0, 2]);
if (result.ok) {
  console.log([...result.tree]);
} else {
  console.log('construction failed:', result.error.kind);
}

const broken = FlatTree.fromSequences(['a', 'b'], [0]);
console.log('mismatched input:', broken.ok ? 'ok' : broken.error.kind);
