/**
 * Fail-fast forward iterator over a ring queue
 */

import { ConcurrentModificationError } from './errors.mjs';

/**
 * Read access to the queue state an iterator walks over.
 * Values are read on every step so the iterator always sees the live store.
 */
export interface RingQueueCursorSource<T> {
  generation(): number;
  count(): number;
  front(): number;
  capacity(): number;
  slot(index: number): T;
}

/**
 * Walks the live elements front-to-back.
 *
 * The queue generation is captured when the iterator is created; any push or
 * pop after that makes every later `next()` or `reset()` throw
 * {@link ConcurrentModificationError}. Once all elements have been produced
 * the iterator stays done until `reset()` is called.
 */
export class RingQueueIterator<T> implements IterableIterator<T> {
  private readonly expectedGeneration: number;
  private position = 0;
  private produced = 0;
  private currentValue: T | undefined = undefined;

  constructor(private readonly source: RingQueueCursorSource<T>) {
    this.expectedGeneration = source.generation();
    this.position = source.front();
  }

  /**
   * Last element produced by `next()`
   */
  get current(): T | undefined {
    return this.currentValue;
  }

  next(): IteratorResult<T, undefined> {
    this.assertUnchanged();

    // index comparison alone cannot tell a full lap from an empty one
    if (this.produced >= this.source.count()) {
      this.currentValue = undefined;
      return { done: true, value: undefined };
    }

    const value = this.source.slot(this.position);
    this.position = (this.position + 1) % this.source.capacity();
    this.produced++;
    this.currentValue = value;

    return { done: false, value };
  }

  /**
   * Restart from the oldest element
   */
  reset(): void {
    this.assertUnchanged();
    this.position = this.source.front();
    this.produced = 0;
    this.currentValue = undefined;
  }

  [Symbol.iterator](): RingQueueIterator<T> {
    return this;
  }

  private assertUnchanged(): void {
    const actual = this.source.generation();
    if (actual !== this.expectedGeneration) {
      throw new ConcurrentModificationError(this.expectedGeneration, actual);
    }
  }
}
