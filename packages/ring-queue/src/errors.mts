/**
 * Error classes thrown by the ring queue
 */

export type RingQueueErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NULL_ARGUMENT'
  | 'EMPTY_QUEUE'
  | 'INDEX_OUT_OF_RANGE'
  | 'INSUFFICIENT_CAPACITY'
  | 'CONCURRENT_MODIFICATION';

/**
 * Base error class for all ring queue errors
 */
export class RingQueueError extends Error {
  constructor(
    message: string,
    public readonly code: RingQueueErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RingQueueError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a capacity is not a positive integer
 */
export class InvalidArgumentError extends RingQueueError {
  constructor(
    public readonly argument: string,
    public readonly value: unknown
  ) {
    super(
      `${argument} must be a positive integer, got ${String(value)}`,
      'INVALID_ARGUMENT',
      { argument, value }
    );
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Thrown when a required source or destination is null or undefined
 */
export class NullArgumentError extends RingQueueError {
  constructor(public readonly argument: string) {
    super(`${argument} is null or undefined`, 'NULL_ARGUMENT', { argument });
    this.name = 'NullArgumentError';
  }
}

/**
 * Thrown by front() and pop() on an empty queue
 */
export class EmptyQueueError extends RingQueueError {
  constructor(public readonly operation: 'front' | 'pop') {
    super(`Cannot ${operation} an empty queue`, 'EMPTY_QUEUE', { operation });
    this.name = 'EmptyQueueError';
  }
}

export class IndexOutOfRangeError extends RingQueueError {
  constructor(
    public readonly index: number,
    public readonly length: number
  ) {
    super(
      `Index ${index} is out of range for a destination of length ${length}`,
      'INDEX_OUT_OF_RANGE',
      { index, length }
    );
    this.name = 'IndexOutOfRangeError';
  }
}

/**
 * Thrown when the destination has fewer free slots after the index than
 * the queue holds elements
 */
export class InsufficientCapacityError extends RingQueueError {
  constructor(
    public readonly available: number,
    public readonly required: number
  ) {
    super(
      `Destination has room for ${available} elements but ${required} are required`,
      'INSUFFICIENT_CAPACITY',
      { available, required }
    );
    this.name = 'InsufficientCapacityError';
  }
}

/**
 * Thrown when an iterator is advanced or reset after the queue it walks
 * was pushed to or popped from
 */
export class ConcurrentModificationError extends RingQueueError {
  constructor(
    public readonly expectedGeneration: number,
    public readonly actualGeneration: number
  ) {
    super(
      'Queue was modified during iteration',
      'CONCURRENT_MODIFICATION',
      { expectedGeneration, actualGeneration }
    );
    this.name = 'ConcurrentModificationError';
  }
}

export function isRingQueueError(error: unknown): error is RingQueueError {
  return error instanceof RingQueueError;
}
