import { describe, it, expect } from 'vitest';

import {
  DEFAULT_CAPACITY,
  EmptyQueueError,
  RingQueue,
  RingQueueIterator,
  createQueueLogger,
  isRingQueueError,
} from './index.mjs';

describe('package entry point', () => {
  it('should export the queue and its iterator', () => {
    const queue = RingQueue.from(['a', 'b', 'c'], 1);

    expect(queue.iterator()).toBeInstanceOf(RingQueueIterator);
    expect([...queue]).toEqual(['a', 'b', 'c']);
    expect(queue.capacity).toBe(4);
    expect(DEFAULT_CAPACITY).toBe(50);
  });

  it('should export the error taxonomy', () => {
    const queue = new RingQueue<string>();

    let caught: unknown;
    try {
      queue.pop();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EmptyQueueError);
    expect(isRingQueueError(caught)).toBe(true);
  });

  it('should export the logger factory', () => {
    expect(typeof createQueueLogger).toBe('function');
  });
});
