/**
 * Error types
 */

export type ConstructionErrorKind = 'LengthMismatch' | 'InvalidRoot' | 'InvalidParent';

/**
 * Raised (or returned) when value / parent sequences cannot form a tree.
 */
export class ConstructionError extends Error {
  constructor(
    public readonly kind: ConstructionErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ConstructionError';
  }
}

/**
 * A worker of a parallel scan failed or never reported back.
 */
export class ParallelExecutionError extends Error {
  constructor(message: string, public override readonly cause?: Error) {
    super(message);
    this.name = 'ParallelExecutionError';
  }
}

export function invalidIndex(index: number, size: number): RangeError {
  return new RangeError(`Invalid index ${index} (tree has ${size} nodes)`);
}
