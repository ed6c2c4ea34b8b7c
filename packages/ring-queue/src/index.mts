/**
 * Growable ring-buffer FIFO queue with fail-fast iteration
 *
 * @packageDocumentation
 */

export { RingQueue, DEFAULT_CAPACITY } from './ring-queue.mjs';
export type { RingQueueOptions } from './ring-queue.mjs';

export { RingQueueIterator } from './ring-queue-iterator.mjs';
export type { RingQueueCursorSource } from './ring-queue-iterator.mjs';

export {
  RingQueueError,
  InvalidArgumentError,
  NullArgumentError,
  EmptyQueueError,
  IndexOutOfRangeError,
  InsufficientCapacityError,
  ConcurrentModificationError,
  isRingQueueError,
} from './errors.mjs';
export type { RingQueueErrorCode } from './errors.mjs';

export { createQueueLogger } from './logger.mjs';
export type {
  QueueLogger,
  QueueLoggerOptions,
  QueueLogLevel,
  QueueLogMessage,
  QueueLogMeta,
} from './logger.mjs';
