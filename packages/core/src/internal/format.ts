/**
 * Text dumps of the value / parent columns
 */

import type { Formatter } from './types';
import { collectChildren } from './descendants';

export function defaultFormat<T>(value: T): string {
  return String(value);
}

/**
 * `v0 {p0}, v1 {p1}, ...` in storage order.
 */
export function dumpSimple<T>(values: readonly T[], parents: Uint32Array, format: Formatter<T>): string {
  let out = '';
  for (let i = 0; i < values.length; i++) {
    if (i > 0) out += ', ';
    out += `${format(values[i])} {${parents[i]}}`;
  }
  return out;
}

/**
 * One `parent: child,child` line per distinct parent index, ascending.
 */
export function dumpGrouped<T>(values: readonly T[], parents: Uint32Array, format: Formatter<T>): string {
  const distinct = [...new Set(parents)].filter(p => p < values.length).sort((a, b) => a - b);

  let out = '';
  const kids: number[] = [];
  for (const p of distinct) {
    kids.length = 0;
    collectChildren(parents, p, kids);
    out += `${format(values[p])}: ${kids.map(k => format(values[k])).join(',')}\n`;
  }
  return out;
}
