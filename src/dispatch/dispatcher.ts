/**
 * Fans a batch out to one processor invocation per job.
 */

import { BatcherError } from '../errors/index.js';
import { logError, type Logger } from '../observability/logging.js';
import { MetricNames, type MetricsCollector } from '../observability/metrics.js';
import type { QueuedJob } from '../queue/job-queue.js';
import type { BatchTrigger, Processor } from '../types/index.js';

/**
 * Running totals kept by the dispatcher.
 */
export interface DispatchCounts {
  batchesDispatched: number;
  jobsCompleted: number;
  jobsFailed: number;
}

/**
 * Starts an independent invocation for every job in a batch and routes each
 * output to that job's result. There is no batch-level join and no bound on
 * invocations in flight.
 */
export class Dispatcher<A, B> {
  private readonly processor: Processor<A, B>;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly running = new Set<Promise<void>>();
  private counts: DispatchCounts = {
    batchesDispatched: 0,
    jobsCompleted: 0,
    jobsFailed: 0,
  };

  constructor(processor: Processor<A, B>, logger: Logger, metrics: MetricsCollector) {
    this.processor = processor;
    this.logger = logger;
    this.metrics = metrics;
  }

  /** Invocations started and not yet finished. */
  get inFlight(): number {
    return this.running.size;
  }

  getCounts(): DispatchCounts {
    return { ...this.counts };
  }

  /**
   * Dispatches a batch. Returns before any processor call has run.
   */
  dispatch(batch: QueuedJob<A, B>[], trigger: BatchTrigger): void {
    this.counts.batchesDispatched++;
    this.metrics.incrementCounter(MetricNames.BATCHES_DISPATCHED, 1, { trigger });
    this.metrics.recordHistogram(MetricNames.BATCH_SIZE, batch.length, { trigger });

    for (const entry of batch) {
      const task: Promise<void> = this.invoke(entry)
        .catch((error: unknown) => {
          // Background task: the job's result is already settled.
          console.error('Job observer failed:', error);
        })
        .finally(() => {
          this.running.delete(task);
        });
      this.running.add(task);
    }
  }

  /**
   * Resolves once every invocation dispatched so far has finished.
   */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
  }

  /**
   * Runs the processor for one job. The job's result is settled before any
   * logger or metrics call, so a failing observer cannot leave it pending.
   */
  private async invoke(entry: QueuedJob<A, B>): Promise<void> {
    const { job, result } = entry;
    // Yield first so a synchronous processor never runs inside the caller's turn.
    await Promise.resolve();

    const startedAt = Date.now();
    let outcome: { ok: true; value: B } | { ok: false; error: unknown };
    try {
      outcome = { ok: true, value: await this.processor(job.data) };
    } catch (error) {
      outcome = { ok: false, error };
    }
    const durationMs = Date.now() - startedAt;

    if (outcome.ok) {
      this.counts.jobsCompleted++;
      result.resolve(outcome.value);
      this.metrics.incrementCounter(MetricNames.JOBS_COMPLETED, 1);
    } else {
      this.counts.jobsFailed++;
      result.reject(BatcherError.processingFailed(job.id, outcome.error));
      this.metrics.incrementCounter(MetricNames.JOBS_FAILED, 1);
      logError(this.logger, 'Job processing failed', outcome.error, { jobId: job.id });
    }
    this.metrics.recordHistogram(MetricNames.JOB_DURATION_MS, durationMs);
  }
}
