import { describe, it, expect } from 'vitest';
import { JobResult } from '../job-result.js';
import { BatcherError, BatcherErrorKind, isBatcherError } from '../../errors/index.js';

describe('JobResult', () => {
  it('exposes the job id and starts unsettled', () => {
    const result = new JobResult<string>('job-1');

    expect(result.jobId).toBe('job-1');
    expect(result.isSettled).toBe(false);
  });

  it('delivers a value to a reader that is already waiting', async () => {
    const result = new JobResult<string>(1);
    const pending = result.get();

    result.resolve('HELLO WORLD');

    await expect(pending).resolves.toBe('HELLO WORLD');
    expect(result.isSettled).toBe(true);
  });

  it('returns the cached value on every read', async () => {
    const result = new JobResult<{ upper: string }>(1);
    const output = { upper: 'FOOBAR' };
    result.resolve(output);

    const first = await result.get();
    const second = await result.get();

    expect(first).toBe(output);
    expect(second).toBe(first);
  });

  it('wakes every concurrent reader with the same value', async () => {
    const result = new JobResult<number>(1);
    const readers = [result.get(), result.get(), result.get()];

    result.resolve(42);

    await expect(Promise.all(readers)).resolves.toEqual([42, 42, 42]);
  });

  it('delivers a failure to readers', async () => {
    const result = new JobResult<number>(2);
    const pending = result.get();
    const failure = BatcherError.processingFailed(2, new Error('boom'));

    result.reject(failure);

    await expect(pending).rejects.toBe(failure);
    await expect(result.get()).rejects.toBe(failure);
  });

  it('refuses a second write', () => {
    const result = new JobResult<number>(3);
    result.resolve(1);

    let caught: unknown;
    try {
      result.resolve(2);
    } catch (error) {
      caught = error;
    }

    expect(isBatcherError(caught, BatcherErrorKind.ResultAlreadySettled)).toBe(true);
    expect(() => result.reject(new Error('late'))).toThrow(
      'Result for job 3 has already been settled'
    );
  });

  it('keeps the first value after a refused write', async () => {
    const result = new JobResult<number>(3);
    result.resolve(1);

    expect(() => result.resolve(2)).toThrow(BatcherError);

    await expect(result.get()).resolves.toBe(1);
  });
});
