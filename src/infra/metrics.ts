/**
 * Observability
 * =============
 *
 * Structured logging, counters, gauges and timers for the
 * ingestion and retrieval paths.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Metric type.
 */
export type MetricType = 'counter' | 'gauge' | 'histogram';

/**
 * A metric value.
 */
export interface MetricValue {
  name: string;
  type: MetricType;
  value: number;
  labels: Record<string, string>;
  timestamp: number;
}

/**
 * Log level.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimum level to print. 'silent' keeps entries in memory only.
 */
export type LogThreshold = LogLevel | 'silent';

export const LOG_THRESHOLDS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Structured log entry.
 */
export interface LogEntry {
  /**
   * Log level.
   */
  level: LogLevel;

  /**
   * Message.
   */
  message: string;

  /**
   * Timestamp.
   */
  timestamp: number;

  /**
   * Component/source.
   */
  component: string;

  /**
   * Additional context.
   */
  context?: Record<string, unknown>;
}

/**
 * Collector options.
 */
export interface MetricsCollectorOptions {
  /**
   * Minimum level printed to the sink.
   * @default 'info'
   */
  level?: LogThreshold;

  /**
   * Maximum log entries kept in memory.
   * @default 1000
   */
  maxLogs?: number;

  /**
   * Where printed entries go.
   * @default console
   */
  sink?: LogSink;
}

/**
 * Console-like output target.
 */
export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

/**
 * Histogram summary.
 */
export interface HistogramStats {
  count: number;
  sum: number;
  avg: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
}

// =============================================================================
// Metrics Collector
// =============================================================================

/**
 * Metrics collector and logger for one component.
 */
export class MetricsCollector {
  private counters: Map<string, { value: number; labels: Record<string, string> }> = new Map();
  private gauges: Map<string, { value: number; labels: Record<string, string> }> = new Map();
  private histograms: Map<string, { values: number[]; labels: Record<string, string> }> = new Map();
  private logs: LogEntry[] = [];

  readonly component: string;
  private readonly level: LogThreshold;
  private readonly maxLogs: number;
  private readonly sink: LogSink;

  constructor(component: string, options: MetricsCollectorOptions = {}) {
    this.component = component;
    this.level = options.level ?? 'info';
    this.maxLogs = options.maxLogs ?? 1000;
    this.sink = options.sink ?? console;
  }

  // ===========================================================================
  // Counters
  // ===========================================================================

  /**
   * Increment a counter.
   */
  increment(name: string, value: number = 1, labels: Record<string, string> = {}): void {
    const key = this.buildKey(name, labels);
    const existing = this.counters.get(key);

    if (existing) {
      existing.value += value;
    } else {
      this.counters.set(key, { value, labels });
    }
  }

  /**
   * Get counter value.
   */
  getCounter(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(this.buildKey(name, labels))?.value ?? 0;
  }

  // ===========================================================================
  // Gauges
  // ===========================================================================

  setGauge(name: string, value: number, labels: Record<string, string> = {}): void {
    this.gauges.set(this.buildKey(name, labels), { value, labels });
  }

  getGauge(name: string, labels: Record<string, string> = {}): number | undefined {
    return this.gauges.get(this.buildKey(name, labels))?.value;
  }

  // ===========================================================================
  // Histograms
  // ===========================================================================

  /**
   * Record a histogram value.
   */
  recordHistogram(name: string, value: number, labels: Record<string, string> = {}): void {
    const key = this.buildKey(name, labels);
    const existing = this.histograms.get(key);

    if (existing) {
      existing.values.push(value);
      // Keep only last 1000 values
      if (existing.values.length > 1000) {
        existing.values = existing.values.slice(-1000);
      }
    } else {
      this.histograms.set(key, { values: [value], labels });
    }
  }

  /**
   * Get histogram statistics.
   */
  getHistogramStats(name: string, labels: Record<string, string> = {}): HistogramStats | null {
    const histogram = this.histograms.get(this.buildKey(name, labels));
    if (!histogram || histogram.values.length === 0) {
      return null;
    }

    const sorted = [...histogram.values].sort((a, b) => a - b);
    const count = sorted.length;
    const sum = sorted.reduce((a, b) => a + b, 0);

    return {
      count,
      sum,
      avg: sum / count,
      min: sorted[0] ?? 0,
      max: sorted[count - 1] ?? 0,
      p50: sorted[Math.floor(count * 0.5)] ?? 0,
      p95: sorted[Math.floor(count * 0.95)] ?? 0,
    };
  }

  // ===========================================================================
  // Timers
  // ===========================================================================

  /**
   * Start a timer. The returned function records and returns the duration.
   */
  startTimer(name: string, labels: Record<string, string> = {}): () => number {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.recordHistogram(name, duration, labels);
      return duration;
    };
  }

  /**
   * Time an async operation.
   */
  async timeAsync<T>(
    name: string,
    fn: () => Promise<T>,
    labels: Record<string, string> = {}
  ): Promise<T> {
    const endTimer = this.startTimer(name, labels);
    try {
      return await fn();
    } finally {
      endTimer();
    }
  }

  // ===========================================================================
  // Logging
  // ===========================================================================

  /**
   * Log a message.
   */
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      component: this.component,
    };
    if (context) entry.context = context;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const prefix = `[${this.component}]`;
    switch (level) {
      case 'debug':
        this.sink.debug(prefix, message, context ?? '');
        break;
      case 'info':
        this.sink.log(prefix, message, context ?? '');
        break;
      case 'warn':
        this.sink.warn(prefix, message, context ?? '');
        break;
      case 'error':
        this.sink.error(prefix, message, context ?? '');
        break;
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Get logs, optionally filtered by level.
   */
  getLogs(level?: LogLevel, limit?: number): LogEntry[] {
    let logs = this.logs;
    if (level) {
      logs = logs.filter((l) => l.level === level);
    }
    if (limit) {
      logs = logs.slice(-limit);
    }
    return logs;
  }

  // ===========================================================================
  // Export
  // ===========================================================================

  /**
   * Get all metrics as array.
   */
  collectMetrics(): MetricValue[] {
    const metrics: MetricValue[] = [];
    const now = Date.now();

    for (const [key, data] of this.counters.entries()) {
      metrics.push({ name: this.nameOf(key), type: 'counter', value: data.value, labels: data.labels, timestamp: now });
    }

    for (const [key, data] of this.gauges.entries()) {
      metrics.push({ name: this.nameOf(key), type: 'gauge', value: data.value, labels: data.labels, timestamp: now });
    }

    // Histograms export their average
    for (const [key, data] of this.histograms.entries()) {
      if (data.values.length > 0) {
        const avg = data.values.reduce((a, b) => a + b, 0) / data.values.length;
        metrics.push({ name: this.nameOf(key), type: 'histogram', value: avg, labels: data.labels, timestamp: now });
      }
    }

    return metrics;
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private buildKey(name: string, labels: Record<string, string>): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}|${labelStr}`;
  }

  private nameOf(key: string): string {
    return key.split('|')[0] ?? key;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a metrics collector.
 */
export function createMetricsCollector(
  component: string,
  options: MetricsCollectorOptions = {}
): MetricsCollector {
  return new MetricsCollector(component, options);
}
