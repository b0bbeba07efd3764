/**
 * Fork-join scans over the shared parent column
 *
 * Each call spawns one worker per chunk. Workers read the parent slots straight out
 * of the SharedArrayBuffer, write their partial result into a shared Int32Array and
 * decrement a pending counter; the calling thread blocks in Atomics.wait until the
 * counter reaches zero. Workers are unref'd and exit as soon as their chunk is done.
 */

import { MessageChannel, Worker, receiveMessageOnPort, type MessagePort } from 'node:worker_threads';
import { FOUND_POLL_STRIDE } from './constants';
import { ParallelExecutionError } from './errors';
import type { ParentColumn } from './parent-column';
import { partition, type ScanOp } from './scan';

// Control word layout (Int32 slots)
const PENDING = 0;
const FAILED = 1;
const FOUND = 2;
const CONTROL_SLOTS = 3;

/** Structured-cloneable payload handed to one worker. */
export type TaskData = Record<string, number | string | SharedArrayBuffer>;

export interface ForkJoinWorkerData<D extends TaskData> {
  control: SharedArrayBuffer;
  results: SharedArrayBuffer;
  report: MessagePort;
  slot: number;
  task: D;
}

export interface ForkJoinOptions {
  waitTimeoutMs: number;
}

export interface ParallelScanOptions extends ForkJoinOptions {
  parallelism: number;
}

export interface ScanTask extends TaskData {
  parents: SharedArrayBuffer;
  op: ScanOp;
  target: number;
  start: number;
  end: number;
  stride: number;
}

// Wraps a `(task, control) => number` function source into a worker script.
// Plain script: eval'd workers load without any TypeScript tooling.
function workerSource(body: string): string {
  return `
const { workerData } = require('node:worker_threads');
const { control, results, report, slot, task } = workerData;
const ctl = new Int32Array(control);
try {
  const run = ${body};
  Atomics.store(new Int32Array(results), slot, run(task, ctl));
} catch (err) {
  report.postMessage(err instanceof Error && err.stack ? err.stack : String(err));
  Atomics.store(ctl, ${FAILED}, slot + 1);
} finally {
  if (Atomics.sub(ctl, ${PENDING}, 1) === 1) Atomics.notify(ctl, ${PENDING});
}
`;
}

const SCAN_BODY = `(task, ctl) => {
  const { parents, op, target, start, end, stride } = task;
  const slots = new Uint32Array(parents);
  let n = 0;
  if (op === 'count') {
    for (let i = start; i < end; i++) {
      if (slots[i] === target) n++;
    }
    return n;
  }
  for (let i = start; i < end; i++) {
    if (slots[i] === target) {
      Atomics.store(ctl, ${FOUND}, 1);
      return 1;
    }
    if ((i - start) % stride === 0 && Atomics.load(ctl, ${FOUND}) === 1) break;
  }
  return 0;
}`;

function shared(slots: number): { buffer: SharedArrayBuffer; view: Int32Array } {
  const buffer = new SharedArrayBuffer(slots * Int32Array.BYTES_PER_ELEMENT);
  return { buffer, view: new Int32Array(buffer) };
}

/**
 * Run `body`, the source of a `(task, control) => number` function, on one worker per
 * task and block until every worker has reported. Returns the per-task results in
 * task order.
 *
 * A worker that throws fails the whole join with a ParallelExecutionError whose cause
 * carries the worker's stack. A join that outlives `waitTimeoutMs` fails the same way.
 */
export function forkJoin<D extends TaskData>(body: string, tasks: readonly D[], options: ForkJoinOptions): number[] {
  if (tasks.length === 0) return [];

  const source = workerSource(body);
  const control = shared(CONTROL_SLOTS);
  const results = shared(tasks.length);
  const reports: MessagePort[] = [];
  Atomics.store(control.view, PENDING, tasks.length);

  try {
    tasks.forEach((task, slot) => {
      const { port1, port2 } = new MessageChannel();
      reports.push(port1);
      const workerData: ForkJoinWorkerData<D> = {
        control: control.buffer,
        results: results.buffer,
        report: port2,
        slot,
        task,
      };
      let worker: Worker;
      try {
        worker = new Worker(source, { eval: true, workerData, transferList: [port2] });
      } catch (err) {
        throw new ParallelExecutionError(`failed to start worker ${slot}`, err instanceof Error ? err : undefined);
      }
      // The caller is blocked until the join ends, so 'error' events are only delivered
      // afterwards; failures inside the task come back through `report` instead.
      worker.once('error', () => undefined);
      worker.unref();
    });

    awaitWorkers(control.view, options.waitTimeoutMs);

    const failed = Atomics.load(control.view, FAILED);
    if (failed !== 0) {
      const slot = failed - 1;
      throw new ParallelExecutionError(`worker ${slot} failed`, reported(reports[slot]));
    }

    return tasks.map((_, slot) => Atomics.load(results.view, slot));
  } finally {
    for (const port of reports) port.close();
  }
}

function reported(port: MessagePort | undefined): Error | undefined {
  if (!port) return undefined;
  const report: unknown = receiveMessageOnPort(port)?.message;
  return typeof report === 'string' ? new Error(report) : undefined;
}

/**
 * Run `op` for `target` across the column's non-root slots on worker threads and
 * reduce the partial results: a sum for 'count', a logical OR (0 / 1) for 'exists'.
 */
export function scanParallel(
  column: ParentColumn,
  op: ScanOp,
  target: number,
  options: ParallelScanOptions,
): number {
  const tasks = partition(column.length, options.parallelism).map(
    ({ start, end }): ScanTask => ({
      parents: column.buffer,
      op,
      target,
      start,
      end,
      stride: FOUND_POLL_STRIDE,
    }),
  );
  if (tasks.length === 0) return 0;

  const total = forkJoin(SCAN_BODY, tasks, options).reduce((sum, n) => sum + n, 0);
  return op === 'count' ? total : Number(total > 0);
}

function awaitWorkers(control: Int32Array, timeoutMs: number): void {
  const deadline = Date.now() + timeoutMs;
  let pending: number;
  while ((pending = Atomics.load(control, PENDING)) !== 0) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new ParallelExecutionError(`${pending} worker(s) did not report within ${timeoutMs}ms`);
    }
    Atomics.wait(control, PENDING, pending, remaining);
  }
}
