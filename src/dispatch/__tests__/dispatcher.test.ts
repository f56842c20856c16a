import { describe, it, expect, vi } from 'vitest';
import { Dispatcher } from '../dispatcher.js';
import { JobResult } from '../../result/job-result.js';
import { BatcherErrorKind, isBatcherError } from '../../errors/index.js';
import { NoopLogger, type Logger } from '../../observability/logging.js';
import { InMemoryMetricsCollector, MetricNames } from '../../observability/metrics.js';
import type { QueuedJob } from '../../queue/job-queue.js';

function entry<A, B>(id: number, data: A): QueuedJob<A, B> {
  return { job: { id, data }, result: new JobResult<B>(id) };
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const upper = (text: string): string => text.toUpperCase();

describe('Dispatcher', () => {
  it('routes each output to its own job result', async () => {
    const dispatcher = new Dispatcher(upper, new NoopLogger(), new InMemoryMetricsCollector());
    const a = entry<string, string>(1, 'hello world');
    const b = entry<string, string>(2, 'foobar');

    dispatcher.dispatch([a, b], 'size');

    await expect(a.result.get()).resolves.toBe('HELLO WORLD');
    await expect(b.result.get()).resolves.toBe('FOOBAR');
  });

  it('never runs the processor inside the dispatching call', async () => {
    const processor = vi.fn(upper);
    const dispatcher = new Dispatcher(processor, new NoopLogger(), new InMemoryMetricsCollector());

    dispatcher.dispatch([entry<string, string>(1, 'a')], 'timer');

    expect(processor).not.toHaveBeenCalled();
    expect(dispatcher.inFlight).toBe(1);

    await dispatcher.whenIdle();
    expect(processor).toHaveBeenCalledWith('a');
    expect(dispatcher.inFlight).toBe(0);
  });

  it('lets jobs of one batch finish in any order', async () => {
    const gates = new Map([
      ['slow', deferred<void>()],
      ['fast', deferred<void>()],
    ]);
    const finished: string[] = [];
    const processor = async (key: string): Promise<string> => {
      await gates.get(key)?.promise;
      finished.push(key);
      return key;
    };
    const dispatcher = new Dispatcher(processor, new NoopLogger(), new InMemoryMetricsCollector());
    const slow = entry<string, string>(1, 'slow');
    const fast = entry<string, string>(2, 'fast');

    dispatcher.dispatch([slow, fast], 'size');
    gates.get('fast')?.resolve();
    await fast.result.get();

    expect(finished).toEqual(['fast']);
    expect(slow.result.isSettled).toBe(false);

    gates.get('slow')?.resolve();
    await expect(slow.result.get()).resolves.toBe('slow');
    expect(finished).toEqual(['fast', 'slow']);
  });

  it('rejects the result of a failed job and keeps the rest of the batch', async () => {
    const logger: Logger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const processor = (text: string): string => {
      if (text === 'bad') {
        throw new Error('boom');
      }
      return text.toUpperCase();
    };
    const dispatcher = new Dispatcher(processor, logger, new InMemoryMetricsCollector());
    const ok = entry<string, string>(1, 'ok');
    const bad = entry<string, string>(2, 'bad');

    dispatcher.dispatch([ok, bad], 'size');
    await dispatcher.whenIdle();

    await expect(ok.result.get()).resolves.toBe('OK');
    const failure = await bad.result.get().then(
      () => undefined,
      (error: unknown) => error
    );
    expect(isBatcherError(failure, BatcherErrorKind.ProcessingFailed)).toBe(true);
    expect(failure instanceof Error && failure.message).toBe('Processing failed for job 2: boom');
    expect(logger.error).toHaveBeenCalledWith(
      'Job processing failed',
      expect.objectContaining({ jobId: 2, errorMessage: 'boom' })
    );
    expect(dispatcher.getCounts()).toEqual({
      batchesDispatched: 1,
      jobsCompleted: 1,
      jobsFailed: 1,
    });
  });

  it('records batch metrics by trigger', async () => {
    const metrics = new InMemoryMetricsCollector();
    const dispatcher = new Dispatcher(upper, new NoopLogger(), metrics);

    dispatcher.dispatch([entry<string, string>(1, 'a'), entry<string, string>(2, 'b')], 'size');
    dispatcher.dispatch([], 'timer');
    await dispatcher.whenIdle();

    expect(metrics.getCounter(MetricNames.BATCHES_DISPATCHED, { trigger: 'size' })).toBe(1);
    expect(metrics.getCounter(MetricNames.BATCHES_DISPATCHED, { trigger: 'timer' })).toBe(1);
    expect(metrics.getHistogram(MetricNames.BATCH_SIZE, { trigger: 'size' })).toEqual([2]);
    expect(metrics.getHistogram(MetricNames.BATCH_SIZE, { trigger: 'timer' })).toEqual([0]);
    expect(metrics.getCounter(MetricNames.JOBS_COMPLETED)).toBe(2);
    expect(metrics.getHistogram(MetricNames.JOB_DURATION_MS)).toHaveLength(2);
  });

  it('settles a failed job even when the logger throws', async () => {
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const loggerFailure = new Error('log sink down');
    const logger: Logger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: () => {
        throw loggerFailure;
      },
    };
    const processor = (): string => {
      throw new Error('boom');
    };
    const dispatcher = new Dispatcher(processor, logger, new InMemoryMetricsCollector());
    const job = entry<string, string>(1, 'a');

    dispatcher.dispatch([job], 'timer');
    await dispatcher.whenIdle();

    const failure = await job.result.get().then(
      () => undefined,
      (error: unknown) => error
    );
    expect(isBatcherError(failure, BatcherErrorKind.ProcessingFailed)).toBe(true);
    expect(consoleErrorSpy).toHaveBeenCalledWith('Job observer failed:', loggerFailure);
    expect(dispatcher.inFlight).toBe(0);
  });

  it('settles a completed job even when the metrics collector throws', async () => {
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    class FailingDurationMetrics extends InMemoryMetricsCollector {
      override recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
        if (name === MetricNames.JOB_DURATION_MS) {
          throw new Error('metrics sink down');
        }
        super.recordHistogram(name, value, labels);
      }
    }
    const dispatcher = new Dispatcher(upper, new NoopLogger(), new FailingDurationMetrics());
    const job = entry<string, string>(1, 'hello');

    dispatcher.dispatch([job], 'size');
    await dispatcher.whenIdle();

    await expect(job.result.get()).resolves.toBe('HELLO');
    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    expect(dispatcher.getCounts().jobsCompleted).toBe(1);
  });

  it('resolves whenIdle immediately with nothing in flight', async () => {
    const dispatcher = new Dispatcher(upper, new NoopLogger(), new InMemoryMetricsCollector());

    await expect(dispatcher.whenIdle()).resolves.toBeUndefined();
  });
});
