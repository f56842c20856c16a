/**
 * Micro-batching engine.
 *
 * Jobs are queued on submission and flushed to the processor when either
 * `batchSize` jobs are waiting or `frequencyMs` has elapsed since the last
 * flush, whichever comes first.
 */

import { configFromEnv, validateConfig, type BatcherConfig } from '../config/index.js';
import { BatcherError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { MetricNames, NoopMetricsCollector, type MetricsCollector } from '../observability/metrics.js';
import { Dispatcher } from '../dispatch/dispatcher.js';
import { JobQueue, type QueuedJob } from '../queue/job-queue.js';
import { JobResult } from '../result/job-result.js';
import { WakeSignal } from '../scheduler/wake-signal.js';
import { PeriodicTimer } from '../timer/periodic-timer.js';
import type { BatchTrigger, BatcherMetrics, Job, Processor } from '../types/index.js';

/**
 * Groups submitted jobs into batches and hands each job to the processor.
 *
 * @example
 * ```typescript
 * const batcher = new Batcher((text: string) => text.toUpperCase(), {
 *   batchSize: 2,
 *   frequencyMs: 500,
 * });
 * const running = batcher.start();
 *
 * const result = batcher.addJob({ id: 1, data: 'hello world' });
 * console.log(await result.get()); // 'HELLO WORLD'
 *
 * batcher.shutdown();
 * await running;
 * ```
 */
export class Batcher<A, B> {
  readonly batchSize: number;
  readonly frequencyMs: number;

  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly queue = new JobQueue<A, B>();
  private readonly dispatcher: Dispatcher<A, B>;
  private readonly timer: PeriodicTimer;
  private readonly wake = new WakeSignal();
  private shuttingDown = false;
  private tickPending = false;
  private jobsRejected = 0;
  private loop?: Promise<void>;
  private finished = false;

  /**
   * @throws {BatcherError} Of kind `InvalidConfiguration` if `batchSize` or
   *   `frequencyMs` is not a positive number.
   */
  constructor(processor: Processor<A, B>, config: BatcherConfig) {
    const validated = validateConfig(config);
    this.batchSize = validated.batchSize;
    this.frequencyMs = validated.frequencyMs;
    this.logger = validated.logger ?? new NoopLogger();
    this.metrics = validated.metrics ?? new NoopMetricsCollector();
    this.dispatcher = new Dispatcher(processor, this.logger, this.metrics);
    this.timer = new PeriodicTimer(this.frequencyMs, () => {
      this.tickPending = true;
      this.wake.notify();
    });
  }

  /** Jobs queued and not yet dispatched. */
  get pendingCount(): number {
    return this.queue.length;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /** True between `start()` and the end of the shutdown drain. */
  get isRunning(): boolean {
    return this.loop !== undefined && !this.finished;
  }

  /**
   * Queues a job and returns the handle its output will arrive on.
   * @throws {BatcherError} Of kind `SubmissionRejected` once shutdown has been requested.
   */
  addJob(job: Job<A>): JobResult<B> {
    if (this.shuttingDown) {
      this.jobsRejected++;
      this.metrics.incrementCounter(MetricNames.JOBS_REJECTED, 1);
      this.logger.warn('Job rejected: batcher is shutting down', { jobId: job.id });
      throw BatcherError.submissionRejected(job.id);
    }

    const result = new JobResult<B>(job.id);
    this.queue.enqueue({ job, result });
    this.metrics.incrementCounter(MetricNames.JOBS_SUBMITTED, 1);
    this.metrics.setGauge(MetricNames.QUEUE_DEPTH, this.queue.length);

    if (this.queue.length >= this.batchSize) {
      this.wake.notify();
    }
    return result;
  }

  /**
   * Runs the scheduling loop until shutdown has been requested and the
   * queue drained. Calling it again returns the same promise.
   */
  start(): Promise<void> {
    if (!this.loop) {
      this.logger.debug('Batcher started', {
        batchSize: this.batchSize,
        frequencyMs: this.frequencyMs,
      });
      this.timer.start();
      this.loop = this.run();
    }
    return this.loop;
  }

  /**
   * Stops admitting jobs and asks the loop to flush what is queued.
   * Returns immediately and does not cancel jobs already dispatched.
   */
  shutdown(): void {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.wake.notify();
  }

  /**
   * Shuts down, then waits for the final drain and for every dispatched
   * job to finish.
   */
  async stop(): Promise<void> {
    this.shutdown();
    await this.start();
    await this.dispatcher.whenIdle();
  }

  getMetrics(): BatcherMetrics {
    const counts = this.dispatcher.getCounts();
    return {
      jobsQueued: this.queue.length,
      jobsInFlight: this.dispatcher.inFlight,
      jobsCompleted: counts.jobsCompleted,
      jobsFailed: counts.jobsFailed,
      jobsRejected: this.jobsRejected,
      batchesDispatched: counts.batchesDispatched,
    };
  }

  private async run(): Promise<void> {
    for (;;) {
      if (this.shuttingDown) {
        this.timer.stop();
        this.flush(this.queue.drain(), 'shutdown');
        this.finished = true;
        this.logger.info('Batcher drained', { ...this.getMetrics() });
        return;
      }

      if (this.queue.length >= this.batchSize) {
        this.flush(this.queue.take(this.batchSize), 'size');
        // The next timer flush gets a full interval after a size flush.
        this.timer.reset();
        this.tickPending = false;
        continue;
      }

      if (this.tickPending) {
        this.tickPending = false;
        this.flush(this.queue.drain(), 'timer');
        continue;
      }

      await this.wake.wait();
    }
  }

  private flush(batch: QueuedJob<A, B>[], trigger: BatchTrigger): void {
    this.dispatcher.dispatch(batch, trigger);
    this.metrics.setGauge(MetricNames.QUEUE_DEPTH, this.queue.length);
    this.logger.debug('Batch dispatched', {
      trigger,
      size: batch.length,
      remaining: this.queue.length,
    });
  }
}

/**
 * Creates a batcher.
 */
export function createBatcher<A, B>(
  processor: Processor<A, B>,
  config: BatcherConfig
): Batcher<A, B> {
  return new Batcher(processor, config);
}

/**
 * Creates a batcher configured from `MICROBATCH_BATCH_SIZE` and
 * `MICROBATCH_FREQUENCY_MS`.
 */
export function createBatcherFromEnv<A, B>(
  processor: Processor<A, B>,
  options: Pick<BatcherConfig, 'logger' | 'metrics'> = {},
  env: NodeJS.ProcessEnv = process.env
): Batcher<A, B> {
  return new Batcher(processor, { ...configFromEnv(env), ...options });
}
