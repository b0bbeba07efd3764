/**
 * Benchmark: FlatTree vs pointer-linked nodes vs Immer nested tree
 */

import { bench, describe } from 'vitest';
import { produce as immerProduce } from 'immer';
import { FlatTree } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 10_000;

interface LinkedNode {
  value: number;
  children: LinkedNode[];
}

// Same shape everywhere: node i hangs off floor((i - 1) / 4)
function parentOf(i: number): number {
  return i === 0 ? 0 : Math.floor((i - 1) / 4);
}

function buildFlat(size: number): FlatTree<number> {
  const tree = new FlatTree(0, { parallelThreshold: Infinity });
  tree.reserve(size);
  for (let i = 1; i < size; i++) tree.insert(parentOf(i), i);
  return tree;
}

function buildLinked(size: number): LinkedNode[] {
  const nodes: LinkedNode[] = [{ value: 0, children: [] }];
  for (let i = 1; i < size; i++) {
    const node: LinkedNode = { value: i, children: [] };
    nodes[parentOf(i)].children.push(node);
    nodes.push(node);
  }
  return nodes;
}

function countLinked(node: LinkedNode): number {
  let n = 0;
  for (const child of node.children) n += 1 + countLinked(child);
  return n;
}

const flat = buildFlat(SIZE);
const linked = buildLinked(SIZE);
const nested: LinkedNode = buildLinked(2_000)[0];

// Keeps results observable so the measured work is not optimized away
let sink: unknown;

// ===== Build =====
describe(`Build ${SIZE} nodes`, () => {
  bench('Linked nodes', () => {
    buildLinked(SIZE);
  });

  bench('FlatTree', () => {
    buildFlat(SIZE);
  });
});

// ===== Queries =====
describe('Immediate children of node 100', () => {
  bench('Linked nodes', () => {
    sink = linked[100].children.length;
  });

  bench('FlatTree (sequential scan)', () => {
    sink = flat.descendantCount(100);
  });
});

describe('All descendants of node 1', () => {
  bench('Linked nodes (recursive)', () => {
    sink = countLinked(linked[1]);
  });

  bench('FlatTree', () => {
    const out: number[] = [];
    flat.allDescendants(1, out);
    sink = out.length;
  });
});

// ===== Updates =====
describe('Increment every value under node 1', () => {
  bench('FlatTree traverse', () => {
    flat.traverse(1, 'sequential', v => v + 1);
  });

  bench('Immer produce() on nested tree', () => {
    sink = immerProduce(nested, draft => {
      const stack = [...draft.children[0].children];
      while (stack.length > 0) {
        const node = stack.pop();
        if (!node) break;
        node.value += 1;
        stack.push(...node.children);
      }
    });
  });
});

// ===== Removal =====
describe('Remove a subtree from a fresh clone', () => {
  bench('FlatTree remove', () => {
    const tree = flat.clone();
    tree.remove(2);
  });
});
