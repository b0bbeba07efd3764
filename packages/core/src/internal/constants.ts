/**
 * Core constants for the flat tree
 */

import { availableParallelism } from 'node:os';

// Index 0 always holds the root; its parent slot points at itself
export const ROOT = 0;

// Above this many nodes, scans fan out to worker threads
export const PARALLEL_THRESHOLD = 2_000;

// Worker count for parallel scans (capped, one chunk per worker)
export const MAX_PARALLELISM = 8;
export const DEFAULT_PARALLELISM = Math.max(1, Math.min(availableParallelism(), MAX_PARALLELISM));

// Upper bound on how long the calling thread blocks waiting for scan workers
export const DEFAULT_WAIT_TIMEOUT_MS = 30_000;

// Parent column sizing
export const INITIAL_CAPACITY = 16;
export const GROW = (n: number): number => Math.max(INITIAL_CAPACITY, n << 1);

// Largest index a Uint32Array parent slot can hold
export const MAX_INDEX = 0xffff_ffff;

// Workers poll the shared "found" flag every this many slots
export const FOUND_POLL_STRIDE = 1024;
