/**
 * Internal modules barrel export
 */

// Constants
export {
  ROOT,
  PARALLEL_THRESHOLD,
  MAX_PARALLELISM,
  DEFAULT_PARALLELISM,
  DEFAULT_WAIT_TIMEOUT_MS,
  INITIAL_CAPACITY,
  MAX_INDEX,
  FOUND_POLL_STRIDE,
} from './constants';

// Errors
export {
  ConstructionError,
  ParallelExecutionError,
  invalidIndex,
  type ConstructionErrorKind,
} from './errors';

// Parent column
export { ParentColumn } from './parent-column';

// Scans
export {
  countChildren,
  hasChild,
  scanSequential,
  partition,
  type ScanOp,
  type Range,
} from './scan';
export {
  forkJoin,
  scanParallel,
  type TaskData,
  type ScanTask,
  type ForkJoinOptions,
  type ForkJoinWorkerData,
  type ParallelScanOptions,
} from './parallel';

// Descendants
export { collectChildren, collectDescendants } from './descendants';

// Dumps
export { dumpSimple, dumpGrouped, defaultFormat } from './format';

// Types
export { Execution } from './types';
export type {
  Index,
  FlatTreeOptions,
  ResolvedOptions,
  Visitor,
  AsyncVisitor,
  Formatter,
  Entry,
} from './types';
