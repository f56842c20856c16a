/**
 * Observability exports for metrics and logging
 */

// Metrics exports
export {
  type MetricsCollector,
  type MetricLabels,
  seriesKey,
  InMemoryMetricsCollector,
  NoopMetricsCollector,
  MetricNames,
} from './metrics.js';

// Logging exports
export {
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
  type LogContext,
  type LogRecord,
  type Logger,
  createDefaultLoggingConfig,
  formatPretty,
  formatJson,
  ConsoleLogger,
  NoopLogger,
  logError,
} from './logging.js';
