/**
 * Core type definitions
 */

// Position of a node in the value / parent columns. Not stable across removals.
export type Index = number;

export const Execution = {
  Sequential: 'sequential',
  Parallel: 'parallel',
} as const;

export type Execution = (typeof Execution)[keyof typeof Execution];

export interface FlatTreeOptions {
  /**
   * Node count at which `indexExists` / `descendantCount` switch to worker threads.
   * Every parallel scan starts fresh workers, so loops issuing one query per node on a
   * large tree should raise this.
   */
  parallelThreshold?: number;
  /** Number of workers (and traversal chunks) used on the parallel path. */
  parallelism?: number;
  /** How long a parallel scan may block before it is reported as failed. */
  waitTimeoutMs?: number;
}

export type ResolvedOptions = Required<FlatTreeOptions>;

export type Visitor<T> = (value: T, index: Index) => T;
export type AsyncVisitor<T> = (value: T, index: Index) => T | Promise<T>;

export type Formatter<T> = (value: T) => string;

// One entry of the storage-order listing
export type Entry<T> = [index: Index, value: T, parent: Index];
