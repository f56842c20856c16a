/**
 * Core types shared across the batcher.
 * @module types
 */

/** Caller-assigned job identifier. Uniqueness is the caller's concern. */
export type JobId = string | number;

/**
 * A unit of work submitted to the batcher.
 */
export interface Job<A> {
  /** Identifier chosen by the submitter. */
  id: JobId;
  /** Payload handed to the processor. */
  data: A;
}

/**
 * Caller-supplied function that turns one job's payload into its output.
 */
export type Processor<A, B> = (data: A) => B | Promise<B>;

/**
 * What caused a batch to be flushed.
 */
export type BatchTrigger = 'size' | 'timer' | 'shutdown';

/**
 * Point-in-time counters for a batcher.
 */
export interface BatcherMetrics {
  /** Jobs waiting in the queue. */
  jobsQueued: number;
  /** Jobs dispatched whose processor has not finished. */
  jobsInFlight: number;
  /** Jobs whose processor returned a value. */
  jobsCompleted: number;
  /** Jobs whose processor threw or rejected. */
  jobsFailed: number;
  /** Submissions refused because the batcher was shutting down. */
  jobsRejected: number;
  /** Flushes performed, including empty timer flushes. */
  batchesDispatched: number;
}
