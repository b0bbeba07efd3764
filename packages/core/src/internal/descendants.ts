/**
 * Child and descendant collection over the parent column
 */

import { ROOT } from './constants';

/**
 * Append the immediate children of `parent` in ascending storage order.
 */
export function collectChildren(parents: Uint32Array, parent: number, out: number[]): boolean {
  const before = out.length;
  for (let i = ROOT + 1; i < parents.length; i++) {
    if (parents[i] === parent) out.push(i);
  }
  return out.length > before;
}

/**
 * Append every descendant of `parent` (never `parent` itself).
 *
 * From the root this is simply every non-root slot in storage order. Otherwise the
 * output doubles as the work queue: `parent`'s children first, then the children of
 * each appended node as it is reached, i.e. first-discovered order.
 */
export function collectDescendants(parents: Uint32Array, parent: number, out: number[]): boolean {
  const size = parents.length;
  if (parent === ROOT) {
    for (let i = ROOT + 1; i < size; i++) out.push(i);
    return size > 1;
  }

  // Child lists in CSR form: children of p are children[offsets[p] .. offsets[p + 1])
  const offsets = new Uint32Array(size + 1);
  for (let i = ROOT + 1; i < size; i++) {
    const p = parents[i];
    if (p < size) offsets[p + 1]++;
  }
  for (let p = 0; p < size; p++) offsets[p + 1] += offsets[p];
  const children = new Uint32Array(offsets[size]);
  const cursor = offsets.slice(0, size);
  for (let i = ROOT + 1; i < size; i++) {
    const p = parents[i];
    if (p < size) children[cursor[p]++] = i;
  }

  // A cycle can only come from a caller-side resize; never emit a slot twice
  const seen = new Uint8Array(size);
  seen[parent] = 1;

  const first = out.length;
  let next = parent;
  let read = first;
  for (;;) {
    for (let c = offsets[next]; c < offsets[next + 1]; c++) {
      const child = children[c];
      if (seen[child]) continue;
      seen[child] = 1;
      out.push(child);
    }
    if (read >= out.length) break;
    next = out[read++];
  }
  return out.length > first;
}
