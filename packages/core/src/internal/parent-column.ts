/**
 * ParentColumn - dense parent-index storage on a SharedArrayBuffer
 *
 * Only the first `length` slots are meaningful; the rest is spare capacity.
 * Backing memory is shared so scan workers can read it without copying.
 */

import { GROW, INITIAL_CAPACITY } from './constants';

interface Allocation {
  buffer: SharedArrayBuffer;
  slots: Uint32Array;
}

function allocate(capacity: number): Allocation {
  const buffer = new SharedArrayBuffer(Math.max(1, capacity) * Uint32Array.BYTES_PER_ELEMENT);
  return { buffer, slots: new Uint32Array(buffer) };
}

export class ParentColumn {
  private _buffer: SharedArrayBuffer;
  private _slots: Uint32Array;
  private _length = 0;

  constructor(initialCapacity = INITIAL_CAPACITY) {
    const { buffer, slots } = allocate(initialCapacity);
    this._buffer = buffer;
    this._slots = slots;
  }

  static from(parents: ArrayLike<number>): ParentColumn {
    const column = new ParentColumn(parents.length);
    column._slots.set(parents);
    column._length = parents.length;
    return column;
  }

  // ---- accessors
  get length(): number {
    return this._length;
  }
  get capacity(): number {
    return this._slots.length;
  }
  get buffer(): SharedArrayBuffer {
    return this._buffer;
  }

  /** Live view over the used slots; invalidated by any growth or shrink. */
  view(): Uint32Array {
    return this._slots.subarray(0, this._length);
  }

  at(index: number): number {
    return this._slots[index] ?? 0;
  }

  set(index: number, parent: number): void {
    this._slots[index] = parent;
  }

  push(parent: number): void {
    if (this._length >= this._slots.length) this.reallocate(GROW(this._slots.length));
    this._slots[this._length++] = parent;
  }

  pop(): void {
    if (this._length > 0) this._length--;
  }

  reserve(capacity: number): void {
    if (capacity > this._slots.length) this.reallocate(capacity);
  }

  shrinkToFit(): void {
    if (this._slots.length > this._length) this.reallocate(this._length);
  }

  /** Truncate or extend; new slots read as `fill`. */
  resize(length: number, fill: number): void {
    if (length > this._slots.length) this.reallocate(length);
    if (length > this._length) this._slots.fill(fill, this._length, length);
    this._length = length;
  }

  /** Point every slot holding `from` at `to`. */
  repoint(from: number, to: number): void {
    const slots = this._slots;
    for (let i = 1; i < this._length; i++) {
      if (slots[i] === from) slots[i] = to;
    }
  }

  clone(): ParentColumn {
    const copy = new ParentColumn(this._slots.length);
    copy._slots.set(this.view());
    copy._length = this._length;
    return copy;
  }

  private reallocate(capacity: number): void {
    const { buffer, slots } = allocate(capacity);
    slots.set(this._slots.subarray(0, Math.min(this._length, slots.length)));
    this._buffer = buffer;
    this._slots = slots;
  }
}
