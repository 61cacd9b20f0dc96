/**
 * Infrastructure Module
 * =====================
 *
 * Logging and metrics shared by the ingestion and retrieval paths.
 */

export {
  MetricsCollector,
  createMetricsCollector,
  LOG_THRESHOLDS,
  type MetricType,
  type MetricValue,
  type LogLevel,
  type LogThreshold,
  type LogEntry,
  type LogSink,
  type HistogramStats,
  type MetricsCollectorOptions,
} from './metrics.js';
