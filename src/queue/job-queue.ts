/**
 * FIFO holding area for submitted jobs that have not been dispatched yet.
 */

import type { Job } from '../types/index.js';
import type { JobResult } from '../result/job-result.js';

/**
 * A submitted job paired with the result its submitter is holding.
 */
export interface QueuedJob<A, B> {
  job: Job<A>;
  result: JobResult<B>;
}

/**
 * Ordered job queue. Every mutation is a single synchronous call, so no
 * other task can observe the queue halfway through one.
 */
export class JobQueue<A, B> {
  private entries: QueuedJob<A, B>[] = [];

  /**
   * Appends an entry at the tail.
   */
  enqueue(entry: QueuedJob<A, B>): void {
    this.entries.push(entry);
  }

  /**
   * Removes and returns up to `count` entries from the head.
   */
  take(count: number): QueuedJob<A, B>[] {
    if (count <= 0) {
      return [];
    }
    return this.entries.splice(0, count);
  }

  /**
   * Removes and returns every entry, leaving the queue empty.
   */
  drain(): QueuedJob<A, B>[] {
    const drained = this.entries;
    this.entries = [];
    return drained;
  }

  get length(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }
}
