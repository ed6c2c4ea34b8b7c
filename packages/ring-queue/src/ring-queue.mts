/**
 * Growable circular buffer queue
 *
 * FIFO queue over a ring buffer with amortized O(1) push and pop. The backing
 * store doubles whenever a push finds it full and never shrinks.
 */

import {
  EmptyQueueError,
  IndexOutOfRangeError,
  InsufficientCapacityError,
  InvalidArgumentError,
  NullArgumentError,
} from './errors.mjs';
import { RingQueueIterator } from './ring-queue-iterator.mjs';
import type { QueueLogger } from './logger.mjs';

export const DEFAULT_CAPACITY = 50;

export interface RingQueueOptions {
  /** Receives a `debug` entry whenever the backing store grows */
  logger?: QueueLogger;
}

/**
 * A FIFO queue backed by a growable circular buffer.
 *
 * Not synchronized: callers sharing an instance must serialize access.
 */
export class RingQueue<T> implements Iterable<T> {
  private buffer: T[];
  private head = 0;
  private tail = 0;
  private size = 0;
  // bumped on every structural change, checked by iterators
  private generation = 0;
  private readonly logger?: QueueLogger;

  /**
   * @param capacity Initial number of slots, a hint rather than a limit
   * @throws {InvalidArgumentError} if capacity is not a positive integer
   */
  constructor(capacity: number = DEFAULT_CAPACITY, options: RingQueueOptions = {}) {
    assertCapacity(capacity);
    this.buffer = new Array<T>(capacity);
    this.logger = options.logger;
  }

  /**
   * Build a queue by pushing every element of `source` in order
   *
   * @throws {InvalidArgumentError} if capacity is not a positive integer
   * @throws {NullArgumentError} if source is null or undefined
   */
  static from<T>(
    source: Iterable<T>,
    capacity: number = DEFAULT_CAPACITY,
    options?: RingQueueOptions
  ): RingQueue<T> {
    const queue = new RingQueue<T>(capacity, options);
    if (source == null) {
      throw new NullArgumentError('source');
    }

    for (const element of source) {
      queue.push(element);
    }

    return queue;
  }

  /**
   * Add an element at the back
   * O(1) amortized, O(n) when the store has to grow
   */
  push(element: T): void {
    this.generation++;
    if (this.size === this.buffer.length) {
      this.resize(this.buffer.length * 2);
    }

    this.buffer[this.tail] = element;
    this.tail = (this.tail + 1) % this.buffer.length;
    this.size++;
  }

  /**
   * Get the oldest element without removing it
   * @throws {EmptyQueueError}
   */
  front(): T {
    if (this.size === 0) {
      throw new EmptyQueueError('front');
    }
    return this.buffer[this.head];
  }

  /**
   * Remove and return the oldest element
   * @throws {EmptyQueueError}
   */
  pop(): T {
    if (this.size === 0) {
      throw new EmptyQueueError('pop');
    }

    this.generation++;
    const element = this.buffer[this.head];
    // release the reference
    delete this.buffer[this.head];
    this.head = (this.head + 1) % this.buffer.length;
    this.size--;

    return element;
  }

  get count(): number {
    return this.size;
  }

  /**
   * Current number of slots in the backing store
   */
  get capacity(): number {
    return this.buffer.length;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * True when the next push will grow the store
   */
  isFull(): boolean {
    return this.size === this.buffer.length;
  }

  /**
   * Copy the live elements front-to-back into `destination`, starting at
   * `index`. Slots outside the copied range are left untouched.
   *
   * @throws {NullArgumentError} if destination is null or undefined
   * @throws {IndexOutOfRangeError} if index is not inside the destination,
   *   which is always the case for a zero-length destination
   * @throws {InsufficientCapacityError} if fewer than `count` slots follow index
   */
  copyTo(destination: T[], index: number): void {
    if (destination == null) {
      throw new NullArgumentError('destination');
    }
    if (!Number.isInteger(index) || index < 0 || index >= destination.length) {
      throw new IndexOutOfRangeError(index, destination.length);
    }
    if (destination.length - index < this.size) {
      throw new InsufficientCapacityError(destination.length - index, this.size);
    }

    this.copyLiveElements(destination, index);
  }

  /**
   * Get all elements as an array, oldest first
   * O(n) operation
   */
  toArray(): T[] {
    const result = new Array<T>(this.size);
    this.copyLiveElements(result, 0);
    return result;
  }

  /**
   * Remove all elements, keeping the current capacity
   */
  clear(): void {
    this.generation++;
    this.buffer = new Array<T>(this.buffer.length);
    this.head = 0;
    this.tail = 0;
    this.size = 0;
  }

  /**
   * Iterator that throws once the queue is pushed to or popped from
   */
  iterator(): RingQueueIterator<T> {
    return new RingQueueIterator<T>({
      generation: () => this.generation,
      count: () => this.size,
      front: () => this.head,
      capacity: () => this.buffer.length,
      slot: (index) => this.buffer[index],
    });
  }

  [Symbol.iterator](): RingQueueIterator<T> {
    return this.iterator();
  }

  /**
   * Move the live elements into a new store of `capacity` slots, starting at 0.
   * `capacity` must be at least `count`.
   */
  private resize(capacity: number): void {
    const previous = this.buffer.length;
    const next = new Array<T>(capacity);
    this.copyLiveElements(next, 0);

    this.head = 0;
    this.tail = this.size % capacity;
    this.buffer = next;

    this.logger?.debug('Ring queue resized', {
      from: previous,
      to: capacity,
      count: this.size,
    });
  }

  private copyLiveElements(target: T[], offset: number): void {
    if (this.head < this.tail || this.size === 0) {
      copyRange(this.buffer, this.head, target, offset, this.size);
      return;
    }

    // wrapped (or full): head to end of store, then start of store to tail
    const firstLength = this.buffer.length - this.head;
    copyRange(this.buffer, this.head, target, offset, firstLength);
    copyRange(this.buffer, 0, target, offset + firstLength, this.tail);
  }
}

function copyRange<T>(
  source: T[],
  sourceIndex: number,
  target: T[],
  targetIndex: number,
  length: number
): void {
  for (let i = 0; i < length; i++) {
    target[targetIndex + i] = source[sourceIndex + i];
  }
}

function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new InvalidArgumentError('capacity', capacity);
  }
}
