/**
 * Configuration types for the batcher.
 * @module config
 */

import { z } from 'zod';
import { BatcherError, BatcherErrorKind } from '../errors/index.js';
import type { Logger } from '../observability/logging.js';
import type { MetricsCollector } from '../observability/metrics.js';

/** Default number of queued jobs that triggers an immediate flush. */
export const DEFAULT_BATCH_SIZE = 10;

/** Default interval between timer-triggered flushes, in milliseconds. */
export const DEFAULT_FREQUENCY_MS = 1000;

/**
 * Longest interval a Node timer can hold. Larger delays are clamped to 1 ms.
 */
export const MAX_FREQUENCY_MS = 2_147_483_647;

/** Environment variable holding the batch size. */
export const ENV_BATCH_SIZE = 'MICROBATCH_BATCH_SIZE';

/** Environment variable holding the flush frequency in milliseconds. */
export const ENV_FREQUENCY_MS = 'MICROBATCH_FREQUENCY_MS';

/**
 * Batcher configuration.
 */
export interface BatcherConfig {
  /** Queue length at which a batch is flushed without waiting for the timer. */
  batchSize: number;
  /** Interval between timer-triggered flushes, in milliseconds (1 to `MAX_FREQUENCY_MS`). */
  frequencyMs: number;
  /** Logger; defaults to a no-op logger. */
  logger?: Logger;
  /** Metrics sink; defaults to a no-op collector. */
  metrics?: MetricsCollector;
}

const batchingSchema = z.object({
  batchSize: z.number().int().positive(),
  frequencyMs: z.number().min(1).max(MAX_FREQUENCY_MS),
});

const envSchema = z.object({
  [ENV_BATCH_SIZE]: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
  [ENV_FREQUENCY_MS]: z.coerce.number().min(1).max(MAX_FREQUENCY_MS).default(DEFAULT_FREQUENCY_MS),
});

function toConfigError(source: string, error: z.ZodError): BatcherError {
  const details = error.issues
    .map((issue) => `${issue.path.join('.') || source}: ${issue.message}`)
    .join('; ');
  return new BatcherError(
    BatcherErrorKind.InvalidConfiguration,
    `Invalid batcher configuration: ${details}`,
    { cause: error }
  );
}

/**
 * Creates a default batcher configuration.
 */
export function createDefaultConfig(): BatcherConfig {
  return {
    batchSize: DEFAULT_BATCH_SIZE,
    frequencyMs: DEFAULT_FREQUENCY_MS,
  };
}

/**
 * Validates a batcher configuration.
 * @throws {BatcherError} If `batchSize` or `frequencyMs` is not usable.
 */
export function validateConfig(config: BatcherConfig): BatcherConfig {
  const result = batchingSchema.safeParse({
    batchSize: config.batchSize,
    frequencyMs: config.frequencyMs,
  });
  if (!result.success) {
    throw toConfigError('config', result.error);
  }
  return { ...config, ...result.data };
}

/**
 * Reads batch size and frequency from the environment.
 * Missing variables fall back to the defaults.
 * @throws {BatcherError} If a variable is set to an unusable value.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): BatcherConfig {
  const result = envSchema.safeParse({
    [ENV_BATCH_SIZE]: env[ENV_BATCH_SIZE] || undefined,
    [ENV_FREQUENCY_MS]: env[ENV_FREQUENCY_MS] || undefined,
  });
  if (!result.success) {
    throw toConfigError('env', result.error);
  }
  return {
    batchSize: result.data[ENV_BATCH_SIZE],
    frequencyMs: result.data[ENV_FREQUENCY_MS],
  };
}

/**
 * Builder for BatcherConfig.
 */
export class BatcherConfigBuilder {
  private config: BatcherConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the size threshold.
   */
  batchSize(size: number): this {
    this.config.batchSize = size;
    return this;
  }

  /**
   * Sets the flush interval in milliseconds.
   */
  frequencyMs(ms: number): this {
    this.config.frequencyMs = ms;
    return this;
  }

  logger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  metrics(metrics: MetricsCollector): this {
    this.config.metrics = metrics;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {BatcherError} If the configuration is invalid.
   */
  build(): BatcherConfig {
    return validateConfig({ ...this.config });
  }

  /**
   * Creates a builder seeded from an existing config.
   */
  static from(config: BatcherConfig): BatcherConfigBuilder {
    const builder = new BatcherConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}
