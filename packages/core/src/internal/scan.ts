/**
 * Parent-column scans
 *
 * Slot 0 (the root's self-reference) is never counted as a child.
 */

import { ROOT } from './constants';

export type ScanOp = 'count' | 'exists';

export interface Range {
  start: number;
  end: number;
}

export function countChildren(parents: Uint32Array, parent: number): number {
  let n = 0;
  for (let i = ROOT + 1; i < parents.length; i++) {
    if (parents[i] === parent) n++;
  }
  return n;
}

export function hasChild(parents: Uint32Array, parent: number): boolean {
  for (let i = ROOT + 1; i < parents.length; i++) {
    if (parents[i] === parent) return true;
  }
  return false;
}

export function scanSequential(parents: Uint32Array, op: ScanOp, parent: number): number {
  return op === 'count' ? countChildren(parents, parent) : Number(hasChild(parents, parent));
}

/**
 * Split the non-root slots [1, length) into at most `chunks` contiguous ranges.
 */
export function partition(length: number, chunks: number): Range[] {
  const total = length - 1;
  if (total <= 0) return [];
  const n = Math.max(1, Math.min(chunks, total));
  const base = Math.floor(total / n);
  const extra = total % n;
  const ranges: Range[] = [];
  let start = ROOT + 1;
  for (let i = 0; i < n; i++) {
    const end = start + base + (i < extra ? 1 : 0);
    ranges.push({ start, end });
    start = end;
  }
  return ranges;
}
