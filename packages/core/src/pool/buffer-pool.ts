/**
 * Scratch-buffer pools shared by the parsers.
 *
 * A parse rents a buffer, fills it, copies out what it keeps and returns
 * the buffer before the enclosing call exits. Rented buffers are never
 * zeroed; callers only read what they wrote.
 */

import { ContractViolationError } from '../errors/errors.js';

export interface BufferPool<B> {
  /** Rent a buffer that can hold at least `minLength` elements. */
  rent(minLength: number): B;
  /** Give a rented buffer back. Returning a foreign buffer is allowed and simply retained. */
  return(buffer: B): void;
}

const MIN_CHAR_BUCKET = 64;
const DEFAULT_RETAINED_PER_BUCKET = 8;

function assertLength(minLength: number): void {
  if (!Number.isInteger(minLength) || minLength < 0) {
    throw new ContractViolationError('minLength', `expected a non-negative integer, got ${minLength}`);
  }
}

function bucketSize(minLength: number): number {
  let size = MIN_CHAR_BUCKET;
  while (size < minLength) size *= 2;
  return size;
}

/** Pool of UTF-16 code-unit buffers, bucketed by power-of-two capacity. */
export class CharBufferPool implements BufferPool<Uint16Array> {
  private readonly buckets = new Map<number, Uint16Array[]>();

  constructor(private readonly retainedPerBucket = DEFAULT_RETAINED_PER_BUCKET) {}

  rent(minLength: number): Uint16Array {
    assertLength(minLength);
    const size = bucketSize(minLength);
    const cached = this.buckets.get(size)?.pop();
    return cached ?? new Uint16Array(size);
  }

  return(buffer: Uint16Array): void {
    // Only exact bucket sizes are pooled; anything else is left to the GC.
    if (buffer.length !== bucketSize(buffer.length)) return;
    let bucket = this.buckets.get(buffer.length);
    if (!bucket) {
      bucket = [];
      this.buckets.set(buffer.length, bucket);
    }
    if (bucket.length < this.retainedPerBucket) {
      bucket.push(buffer);
    }
  }

  /** Number of buffers currently held for reuse. */
  get retainedCount(): number {
    let count = 0;
    for (const bucket of this.buckets.values()) count += bucket.length;
    return count;
  }
}

/** Pool of plain arrays used as temporary lists. Arrays come back empty. */
export class ListPool<T> implements BufferPool<T[]> {
  private readonly free: T[][] = [];

  constructor(private readonly retained = DEFAULT_RETAINED_PER_BUCKET) {}

  rent(minLength = 0): T[] {
    assertLength(minLength);
    return this.free.pop() ?? [];
  }

  return(buffer: T[]): void {
    buffer.length = 0;
    if (this.free.length < this.retained) {
      this.free.push(buffer);
    }
  }

  get retainedCount(): number {
    return this.free.length;
  }
}

/**
 * Rent a buffer for the duration of `use`. The buffer goes back to the
 * pool on every exit path, including a throw from `use`.
 */
export function usePooled<B, R>(pool: BufferPool<B>, minLength: number, use: (buffer: B) => R): R {
  const buffer = pool.rent(minLength);
  try {
    return use(buffer);
  } finally {
    pool.return(buffer);
  }
}

/** Process-wide pool for string materialization. */
export const sharedCharBufferPool = new CharBufferPool();
