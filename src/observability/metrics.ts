/**
 * Metrics collection for monitoring and observability
 */

export type MetricLabels = Record<string, string>;

export interface MetricsCollector {
  incrementCounter(name: string, value: number, labels?: MetricLabels): void;
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;
  setGauge(name: string, value: number, labels?: MetricLabels): void;
}

/**
 * Series key: metric name, then labels sorted by key.
 * `microbatch.batches.dispatched:trigger=size`
 */
export function seriesKey(name: string, labels?: MetricLabels): string {
  if (!labels) {
    return name;
  }
  const pairs = Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`);
  return pairs.length === 0 ? name : `${name}:${pairs.join(',')}`;
}

/**
 * In-memory metrics collector, used by tests and local runs
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, number[]>();
  private readonly gauges = new Map<string, number>();

  incrementCounter(name: string, value: number, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    const samples = this.histograms.get(key);
    if (samples) {
      samples.push(value);
    } else {
      this.histograms.set(key, [value]);
    }
  }

  setGauge(name: string, value: number, labels?: MetricLabels): void {
    this.gauges.set(seriesKey(name, labels), value);
  }

  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: MetricLabels): number[] {
    return [...(this.histograms.get(seriesKey(name, labels)) ?? [])];
  }

  getGauge(name: string, labels?: MetricLabels): number | undefined {
    return this.gauges.get(seriesKey(name, labels));
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
  }
}

/**
 * Discards every sample; the batcher's default
 */
export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value: number, _labels?: MetricLabels): void {}
  recordHistogram(_name: string, _value: number, _labels?: MetricLabels): void {}
  setGauge(_name: string, _value: number, _labels?: MetricLabels): void {}
}

/**
 * Metric names emitted by the batcher
 */
export const MetricNames = {
  JOBS_SUBMITTED: 'microbatch.jobs.submitted',
  JOBS_REJECTED: 'microbatch.jobs.rejected',
  JOBS_COMPLETED: 'microbatch.jobs.completed',
  JOBS_FAILED: 'microbatch.jobs.failed',
  JOB_DURATION_MS: 'microbatch.jobs.duration_ms',
  /** Labelled with `trigger`. */
  BATCHES_DISPATCHED: 'microbatch.batches.dispatched',
  /** Labelled with `trigger`. */
  BATCH_SIZE: 'microbatch.batches.size',
  QUEUE_DEPTH: 'microbatch.queue.depth',
} as const;
