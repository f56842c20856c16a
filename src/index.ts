/**
 * micro-batcher
 *
 * Groups individually submitted jobs into batches, flushed when enough jobs
 * are waiting or when a time window elapses, and delivers each job's output
 * back to its submitter.
 *
 * @example
 * ```typescript
 * import { createBatcher } from 'micro-batcher';
 *
 * const batcher = createBatcher((text: string) => text.toUpperCase(), {
 *   batchSize: 10,
 *   frequencyMs: 250,
 * });
 * const running = batcher.start();
 *
 * const result = batcher.addJob({ id: 'greeting', data: 'hello world' });
 * await result.get(); // 'HELLO WORLD'
 *
 * await batcher.stop();
 * await running;
 * ```
 */

// Batcher exports
export { Batcher, createBatcher, createBatcherFromEnv } from './batcher/batcher.js';

// Building blocks
export { JobResult } from './result/job-result.js';
export { JobQueue, type QueuedJob } from './queue/job-queue.js';
export { Dispatcher, type DispatchCounts } from './dispatch/dispatcher.js';
export { PeriodicTimer, type TickHandler } from './timer/periodic-timer.js';
export { WakeSignal } from './scheduler/wake-signal.js';

// Configuration exports
export {
  type BatcherConfig,
  BatcherConfigBuilder,
  createDefaultConfig,
  validateConfig,
  configFromEnv,
  DEFAULT_BATCH_SIZE,
  DEFAULT_FREQUENCY_MS,
  MAX_FREQUENCY_MS,
  ENV_BATCH_SIZE,
  ENV_FREQUENCY_MS,
} from './config/index.js';

// Error exports
export { BatcherError, BatcherErrorKind, isBatcherError } from './errors/index.js';

// Type exports
export type { Job, JobId, Processor, BatchTrigger, BatcherMetrics } from './types/index.js';

// Observability exports
export * from './observability/index.js';
