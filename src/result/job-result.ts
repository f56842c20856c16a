/**
 * Single-assignment handle for one job's output.
 */

import { BatcherError, BatcherErrorKind } from '../errors/index.js';
import type { JobId } from '../types/index.js';

type Outcome<B> =
  | { status: 'fulfilled'; value: B }
  | { status: 'rejected'; reason: unknown };

interface Waiter<B> {
  resolve: (value: B) => void;
  reject: (reason: unknown) => void;
}

/**
 * Returned by `addJob`. Written once by the dispatcher, read any number of
 * times by the submitter.
 *
 * @example
 * ```typescript
 * const result = batcher.addJob({ id: 1, data: 'hello' });
 * const output = await result.get();
 * ```
 */
export class JobResult<B> {
  /** Identifier of the job this result belongs to. */
  public readonly jobId: JobId;
  private outcome?: Outcome<B>;
  private waiters: Waiter<B>[] = [];

  constructor(jobId: JobId) {
    this.jobId = jobId;
  }

  /**
   * Whether the output (or failure) has been delivered.
   */
  get isSettled(): boolean {
    return this.outcome !== undefined;
  }

  /**
   * Waits for the job's output. Once settled, every call yields the same
   * value without waiting.
   * @throws {BatcherError} Of kind `ProcessingFailed` if the processor failed.
   */
  get(): Promise<B> {
    const outcome = this.outcome;
    if (outcome) {
      return outcome.status === 'fulfilled'
        ? Promise.resolve(outcome.value)
        : Promise.reject(outcome.reason);
    }
    return new Promise<B>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Delivers the job's output.
   * @throws {BatcherError} If the result was already settled.
   */
  resolve(value: B): void {
    this.settle({ status: 'fulfilled', value });
  }

  /**
   * Delivers a processing failure. Only callers of `get()` observe it.
   * @throws {BatcherError} If the result was already settled.
   */
  reject(reason: unknown): void {
    this.settle({ status: 'rejected', reason });
  }

  private settle(outcome: Outcome<B>): void {
    if (this.outcome) {
      throw new BatcherError(
        BatcherErrorKind.ResultAlreadySettled,
        `Result for job ${this.jobId} has already been settled`,
        { jobId: this.jobId }
      );
    }
    this.outcome = outcome;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (outcome.status === 'fulfilled') {
        waiter.resolve(outcome.value);
      } else {
        waiter.reject(outcome.reason);
      }
    }
  }
}
