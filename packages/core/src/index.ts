/**
 * Flat tree – every node in one dense sequence, linked only by parent index
 *
 * - values[i]   → node payload
 * - parentOf[i] → index of the node's parent (the root at 0 points at itself)
 * - no child lists, no sibling links: structure queries are scans of the parent column
 * - removal swaps the last node into the freed slot, so indices are handles that stay
 *   valid only until the next remove / clear / resize (watch `generation`)
 */

import {
  ROOT,
  PARALLEL_THRESHOLD,
  DEFAULT_PARALLELISM,
  DEFAULT_WAIT_TIMEOUT_MS,
  MAX_INDEX,
  ConstructionError,
  invalidIndex,
  ParentColumn,
  scanSequential,
  scanParallel,
  collectChildren,
  collectDescendants,
  dumpSimple,
  dumpGrouped,
  defaultFormat,
  type ConstructionErrorKind,
  type ScanOp,
  type Index,
  type FlatTreeOptions,
  type ResolvedOptions,
  type Visitor,
  type AsyncVisitor,
  type Formatter,
  type Entry,
  type Execution,
} from './internal';

export { ConstructionError, ParallelExecutionError, Execution, PARALLEL_THRESHOLD } from './internal';
export type {
  ConstructionErrorKind,
  Index,
  FlatTreeOptions,
  Visitor,
  AsyncVisitor,
  Formatter,
  Entry,
} from './internal';

export type ConstructionResult<T> =
  | { ok: true; tree: FlatTree<T> }
  | { ok: false; error: ConstructionError };

// =====================================================
// Helpers
// =====================================================

function isIndex(index: number, size: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < size;
}

function resolveOptions(options: FlatTreeOptions = {}): ResolvedOptions {
  const parallelThreshold = options.parallelThreshold ?? PARALLEL_THRESHOLD;
  const parallelism = options.parallelism ?? DEFAULT_PARALLELISM;
  const waitTimeoutMs = options.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;

  if (Number.isNaN(parallelThreshold) || parallelThreshold < 0) {
    throw new RangeError(`parallelThreshold must be >= 0, got ${parallelThreshold}`);
  }
  if (!Number.isInteger(parallelism) || parallelism < 1) {
    throw new RangeError(`parallelism must be a positive integer, got ${parallelism}`);
  }
  if (Number.isNaN(waitTimeoutMs) || waitTimeoutMs <= 0) {
    throw new RangeError(`waitTimeoutMs must be > 0, got ${waitTimeoutMs}`);
  }
  return { parallelThreshold, parallelism, waitTimeoutMs };
}

function failure<T>(kind: ConstructionErrorKind, message: string): ConstructionResult<T> {
  return { ok: false, error: new ConstructionError(kind, message) };
}

// Contiguous, near-equal slices; never more slices than items
function slices(items: readonly number[], count: number): number[][] {
  const n = Math.max(1, Math.min(count, items.length));
  const size = Math.ceil(items.length / n);
  const out: number[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

// =====================================================
// FlatTree
// =====================================================

export class FlatTree<T> implements Iterable<T> {
  readonly options: Readonly<ResolvedOptions>;

  private _values: T[];
  private _parents: ParentColumn;
  private _generation = 0;

  /**
   * A tree holding only `root`.
   */
  constructor(root: T, options?: FlatTreeOptions) {
    this.options = Object.freeze(resolveOptions(options));
    this._values = [root];
    this._parents = new ParentColumn();
    this._parents.push(ROOT);
  }

  /**
   * Build a tree from matching value / parent-index sequences (any iterables, each
   * consumed once). Node `i` gets `values[i]` and parent `parentOf[i]`; `parentOf[0]`
   * must be 0 and every other entry an existing index.
   *
   * Acyclicity is not checked.
   */
  static fromSequences<T>(
    values: Iterable<T>,
    parentOf: Iterable<number>,
    options?: FlatTreeOptions,
  ): ConstructionResult<T> {
    const vals = Array.from(values);
    const parents = Array.from(parentOf);

    if (vals.length !== parents.length) {
      return failure('LengthMismatch', `got ${vals.length} values but ${parents.length} parent indices`);
    }
    if (vals.length === 0) {
      return failure('InvalidRoot', 'a tree needs at least a root node');
    }
    if (parents[0] !== ROOT) {
      return failure('InvalidRoot', `root must be its own parent (index 0), got ${parents[0]}`);
    }
    if (vals.length - 1 > MAX_INDEX) {
      return failure('InvalidParent', `a tree holds at most ${MAX_INDEX + 1} nodes`);
    }
    for (let i = 1; i < parents.length; i++) {
      if (!isIndex(parents[i], parents.length)) {
        return failure('InvalidParent', `node ${i} has out-of-range parent ${parents[i]}`);
      }
    }

    const tree = new FlatTree(vals[0], options);
    tree._values = vals;
    tree._parents = ParentColumn.from(parents);
    return { ok: true, tree };
  }

  /**
   * Like `fromSequences`, but throws the `ConstructionError`.
   */
  static from<T>(values: Iterable<T>, parentOf: Iterable<number>, options?: FlatTreeOptions): FlatTree<T> {
    const result = FlatTree.fromSequences(values, parentOf, options);
    if (!result.ok) throw result.error;
    return result.tree;
  }

  clone(): FlatTree<T> {
    const copy = new FlatTree(this._values[ROOT], this.options);
    copy._values = this._values.slice();
    copy._parents = this._parents.clone();
    return copy;
  }

  // =====================================================
  // Capacity
  // =====================================================

  get size(): number {
    return this._values.length;
  }

  /** Parent slots allocated before the column has to grow. */
  get capacity(): number {
    return this._parents.capacity;
  }

  /** Bumped whenever held indices may now name a different node. */
  get generation(): number {
    return this._generation;
  }

  /** Only the root is left. */
  isTrivial(): boolean {
    return this._values.length === 1;
  }

  reserve(capacity: number): void {
    this._parents.reserve(capacity);
  }

  shrinkToFit(): void {
    this._parents.shrinkToFit();
  }

  /** Drop every node but the root, keeping its value. */
  clear(): void {
    this._values.length = 1;
    this._parents.resize(1, ROOT);
    this._parents.set(ROOT, ROOT);
    this._generation++;
  }

  /**
   * Truncate or extend both columns to `count` nodes. New nodes hold `fill` and hang off
   * the root. Truncation can leave survivors pointing past the end: the caller must
   * re-point them before using the structure queries.
   */
  resize(count: number, fill: T): void {
    if (!Number.isInteger(count) || count < 1 || count - 1 > MAX_INDEX) {
      throw new RangeError(`Invalid tree size ${count}`);
    }
    const size = this._values.length;
    if (count < size) {
      this._values.length = count;
    } else {
      for (let i = size; i < count; i++) this._values.push(fill);
    }
    this._parents.resize(count, ROOT);
    this._generation++;
  }

  // =====================================================
  // Iteration (storage order, not tree order)
  // =====================================================

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  *values(): IterableIterator<T> {
    const values = this._values;
    for (let i = 0; i < values.length; i++) yield values[i];
  }

  *valuesReversed(): IterableIterator<T> {
    const values = this._values;
    for (let i = values.length - 1; i >= 0; i--) yield values[i];
  }

  *parents(): IterableIterator<Index> {
    const parents = this._parents;
    for (let i = 0; i < parents.length; i++) yield parents.at(i);
  }

  *entries(): IterableIterator<Entry<T>> {
    const values = this._values;
    for (let i = 0; i < values.length; i++) yield [i, values[i], this._parents.at(i)];
  }

  // =====================================================
  // Indexed access
  // =====================================================

  get(index: Index): T {
    this.assertIndex(index);
    return this._values[index];
  }

  set(index: Index, value: T): void {
    this.assertIndex(index);
    this._values[index] = value;
  }

  // =====================================================
  // Structural queries
  // =====================================================

  /**
   * Whether `index` is the parent of at least one node. This is a child test, not a
   * bounds test: a leaf answers false.
   */
  indexExists(index: Index): boolean {
    return this.scan('exists', index) === 1;
  }

  /** Number of immediate children of `parent`. */
  descendantCount(parent: Index): number {
    return this.scan('count', parent);
  }

  isLeaf(index: Index): boolean {
    this.assertIndex(index);
    return this.descendantCount(index) === 0;
  }

  /** The root is its own parent. */
  parentIndex(index: Index): Index {
    this.assertIndex(index);
    return index > ROOT ? this._parents.at(index) : ROOT;
  }

  /**
   * Append the immediate children of `parent` to `out`, ascending by index.
   * Returns false, leaving `out` untouched, when there are none.
   */
  childrenOf(parent: Index, out: Index[]): boolean {
    if (!this.isValid() || !isIndex(parent, this.size)) return false;
    return collectChildren(this._parents.view(), parent, out);
  }

  /**
   * Append every descendant of `parent` (excluding `parent`) to `out`.
   *
   * For the root that is every other node in storage order. For any other node the
   * order is first-discovered: its children, then the children of each appended node
   * in turn. Returns false when there are no descendants.
   */
  allDescendants(parent: Index, out: Index[]): boolean {
    if (!this.isValid() || !isIndex(parent, this.size)) return false;
    return collectDescendants(this._parents.view(), parent, out);
  }

  // =====================================================
  // Mutation
  // =====================================================

  /** Append `value` under `parent`; it lands at index `size - 1`. */
  insert(parent: Index, value: T): boolean {
    if (!this.canInsertUnder(parent)) return false;
    this._values.push(value);
    this._parents.push(parent);
    return true;
  }

  /** Append each value as a sibling under `parent`, in input order. */
  insertMany(parent: Index, values: Iterable<T>): boolean {
    if (!this.canInsertUnder(parent)) return false;
    const items = Array.from(values);
    if (this._values.length + items.length - 1 > MAX_INDEX) return false;
    for (const value of items) {
      this._values.push(value);
      this._parents.push(parent);
    }
    return true;
  }

  /**
   * Chaining insert: `tree.append(0, 'a').append(1, 'b')`. Throws when the insert fails.
   */
  append(parent: Index, value: T): this {
    if (!this.insert(parent, value)) throw new RangeError(`Cannot insert under node ${parent}`);
    return this;
  }

  appendMany(parent: Index, values: Iterable<T>): this {
    if (!this.insertMany(parent, values)) throw new RangeError(`Cannot insert under node ${parent}`);
    return this;
  }

  /**
   * Remove `target` and its whole subtree. The root cannot be removed.
   *
   * Each slot is freed by moving the last node into it and popping, highest index
   * first, so no pending slot is ever the one moved. Children of a moved node are
   * re-pointed at its new slot. Any index held across this call may now name another
   * node.
   */
  remove(target: Index): boolean {
    if (!this.isValid() || target === ROOT || !isIndex(target, this.size)) return false;

    const doomed: Index[] = [target];
    collectDescendants(this._parents.view(), target, doomed);
    doomed.sort((a, b) => b - a);
    for (const index of doomed) this.removeSlot(index);

    this._generation++;
    return true;
  }

  /**
   * Remove each target in turn. Later targets are read against the tree as the earlier
   * removals left it. True only if every removal succeeded.
   */
  removeMany(targets: Iterable<Index>): boolean {
    let ok = true;
    for (const target of Array.from(targets)) {
      ok = this.remove(target) && ok;
    }
    return ok;
  }

  // =====================================================
  // Traversal
  // =====================================================

  /**
   * Apply `visit` to every descendant of `start` (not `start` itself) and store what it
   * returns in that node.
   *
   * 'sequential' runs in discovery order, one visit at a time.
   * 'parallel' splits the descendants into disjoint chunks (one below the parallel
   * threshold, `parallelism` above it) that run concurrently; the promise settles once
   * every chunk is done. Each node is visited exactly once, in no particular order.
   *
   * A sequential visit that throws leaves every value untouched; results are written
   * back only once all visits have returned.
   */
  traverse(start: Index, execution: 'sequential', visit: Visitor<T>): void;
  traverse(start: Index, execution: 'parallel', visit: AsyncVisitor<T>): Promise<void>;
  traverse(start: Index, execution: Execution, visit: Visitor<T>): void | Promise<void>;
  traverse(start: Index, execution: Execution, visit: AsyncVisitor<T>): void | Promise<void> {
    return execution === 'parallel' ? this.traverseParallel(start, visit) : this.traverseSequential(start, visit);
  }

  private traverseSequential(start: Index, visit: AsyncVisitor<T>): void {
    const targets: Index[] = [];
    if (!this.allDescendants(start, targets)) return;

    const values = this._values;
    const results: T[] = [];
    for (const index of targets) {
      const next = visit(values[index], index);
      if (next instanceof Promise) {
        throw new TypeError(`sequential visitor returned a promise for node ${index}; use 'parallel'`);
      }
      results.push(next);
    }
    targets.forEach((index, i) => {
      values[index] = results[i];
    });
  }

  private async traverseParallel(start: Index, visit: AsyncVisitor<T>): Promise<void> {
    const targets: Index[] = [];
    if (!this.allDescendants(start, targets)) return;

    const values = this._values;
    const chunks = this.size < this.options.parallelThreshold ? 1 : this.options.parallelism;
    const settled = await Promise.allSettled(
      slices(targets, chunks).map(async chunk => {
        for (const index of chunk) {
          values[index] = await visit(values[index], index);
        }
      }),
    );
    const rejected = settled.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (rejected) throw rejected.reason;
  }

  // =====================================================
  // Output
  // =====================================================

  /** `value {parent}` pairs in storage order, comma separated. */
  dumpSimple(format: Formatter<T> = defaultFormat): string {
    return dumpSimple(this._values, this._parents.view(), format);
  }

  /** One `parent: child,child` line per parent, ascending by parent index. */
  dumpGrouped(format: Formatter<T> = defaultFormat): string {
    return dumpGrouped(this._values, this._parents.view(), format);
  }

  toString(): string {
    return this.dumpSimple();
  }

  // =====================================================
  // Internal
  // =====================================================

  private isValid(): boolean {
    return this._values.length === this._parents.length && this._parents.at(ROOT) === ROOT;
  }

  private assertIndex(index: Index): void {
    if (!isIndex(index, this.size)) throw invalidIndex(index, this.size);
  }

  private canInsertUnder(parent: Index): boolean {
    return this.isValid() && isIndex(parent, this.size) && this.size <= MAX_INDEX;
  }

  private scan(op: ScanOp, target: Index): number {
    // Slots hold unsigned 32-bit integers; anything else can never match
    if (!Number.isInteger(target) || target < 0 || target > MAX_INDEX) return 0;

    const parents = this._parents;
    if (parents.length < this.options.parallelThreshold) {
      return scanSequential(parents.view(), op, target);
    }
    return scanParallel(parents, op, target, this.options);
  }

  // Move the last node into `index` and pop
  private removeSlot(index: Index): void {
    const last = this._values.length - 1;
    if (index !== last) {
      this._values[index] = this._values[last];
      this._parents.set(index, this._parents.at(last));
      this._parents.repoint(last, index);
    }
    this._values.pop();
    this._parents.pop();
  }
}
