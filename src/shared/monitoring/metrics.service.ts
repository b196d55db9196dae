/**
 * =============================================================================
 * METRICS SERVICE - Application Performance Monitoring
 * =============================================================================
 *
 * Collects and exposes metrics for Prometheus scraping.
 *
 * METRICS COLLECTED:
 * - gRPC call count by method and status code
 * - gRPC call duration (histogram)
 * - Active calls
 * - Stream messages in/out per method
 * - Feature store size, note registry size
 * - Memory usage, event loop lag
 *
 * ENDPOINT: GET /metrics (Prometheus format, served by health.routes.ts)
 * =============================================================================
 */

import { Request, Response } from 'express';
import { logger } from '../services/logger.service';

// =============================================================================
// METRIC TYPES
// =============================================================================

interface CounterMetric {
  name: string;
  help: string;
  labels: Record<string, number>;
}

interface GaugeMetric {
  name: string;
  help: string;
  value: number;
  /** Read on export instead of being pushed */
  source?: () => number;
}

interface HistogramMetric {
  name: string;
  help: string;
  buckets: number[];
  bucketCounts: Map<string, number[]>; // label -> cumulative counts per bucket +Inf
  sum: Map<string, number>;
  count: Map<string, number>;
}

// =============================================================================
// METRICS STORAGE
// =============================================================================

export class MetricsService {
  private counters: Map<string, CounterMetric> = new Map();
  private gauges: Map<string, GaugeMetric> = new Map();
  private histograms: Map<string, HistogramMetric> = new Map();
  private systemTimer: NodeJS.Timeout | null = null;

  // Pre-defined histogram buckets (in milliseconds for latency)
  private readonly latencyBuckets = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000];

  constructor() {
    this.initializeDefaultMetrics();
  }

  /**
   * Initialize default metrics
   */
  private initializeDefaultMetrics(): void {
    this.counters.set('grpc_requests_total', {
      name: 'grpc_requests_total',
      help: 'Total number of completed gRPC calls',
      labels: {}
    });

    this.counters.set('grpc_stream_messages_total', {
      name: 'grpc_stream_messages_total',
      help: 'Messages received from or sent to clients',
      labels: {}
    });

    this.histograms.set('grpc_request_duration_ms', {
      name: 'grpc_request_duration_ms',
      help: 'gRPC call duration in milliseconds',
      buckets: this.latencyBuckets,
      bucketCounts: new Map(),
      sum: new Map(),
      count: new Map()
    });

    this.gauges.set('grpc_active_calls', {
      name: 'grpc_active_calls',
      help: 'Number of gRPC calls currently in progress',
      value: 0
    });

    this.gauges.set('nodejs_memory_heap_used_bytes', {
      name: 'nodejs_memory_heap_used_bytes',
      help: 'Node.js heap memory used',
      value: 0
    });

    this.gauges.set('nodejs_memory_heap_total_bytes', {
      name: 'nodejs_memory_heap_total_bytes',
      help: 'Node.js total heap memory',
      value: 0
    });

    this.gauges.set('nodejs_eventloop_lag_ms', {
      name: 'nodejs_eventloop_lag_ms',
      help: 'Node.js event loop lag in milliseconds',
      value: 0
    });
  }

  /**
   * Start collecting system metrics periodically
   */
  startSystemMetricsCollection(intervalMs: number = 15000): void {
    if (this.systemTimer) return;

    this.systemTimer = setInterval(() => {
      const memUsage = process.memoryUsage();
      this.setGauge('nodejs_memory_heap_used_bytes', memUsage.heapUsed);
      this.setGauge('nodejs_memory_heap_total_bytes', memUsage.heapTotal);

      // Measure event loop lag
      const start = process.hrtime.bigint();
      setImmediate(() => {
        const lag = Number(process.hrtime.bigint() - start) / 1e6; // Convert to ms
        this.setGauge('nodejs_eventloop_lag_ms', lag);
      });
    }, intervalMs);
    this.systemTimer.unref();
  }

  stopSystemMetricsCollection(): void {
    if (this.systemTimer) {
      clearInterval(this.systemTimer);
      this.systemTimer = null;
    }
  }

  // ===========================================================================
  // COUNTER METHODS
  // ===========================================================================

  /**
   * Increment a counter
   */
  incrementCounter(name: string, labels: Record<string, string> = {}, value: number = 1): void {
    const counter = this.counters.get(name);
    if (!counter) {
      logger.warn(`Counter ${name} not found`);
      return;
    }

    const labelKey = this.labelsToKey(labels);
    counter.labels[labelKey] = (counter.labels[labelKey] || 0) + value;
  }

  getCounter(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(name)?.labels[this.labelsToKey(labels)] ?? 0;
  }

  // ===========================================================================
  // GAUGE METHODS
  // ===========================================================================

  /**
   * Register a gauge whose value is read from `source` at export time
   */
  registerGauge(name: string, help: string, source: () => number): void {
    this.gauges.set(name, { name, help, value: 0, source });
  }

  /**
   * Set a gauge value
   */
  setGauge(name: string, value: number): void {
    const gauge = this.gauges.get(name);
    if (gauge) {
      gauge.value = value;
    }
  }

  /**
   * Increment a gauge
   */
  incrementGauge(name: string, value: number = 1): void {
    const gauge = this.gauges.get(name);
    if (gauge) {
      gauge.value += value;
    }
  }

  /**
   * Decrement a gauge
   */
  decrementGauge(name: string, value: number = 1): void {
    const gauge = this.gauges.get(name);
    if (gauge) {
      gauge.value = Math.max(0, gauge.value - value);
    }
  }

  getGauge(name: string): number {
    const gauge = this.gauges.get(name);
    if (!gauge) return 0;
    return gauge.source ? gauge.source() : gauge.value;
  }

  // ===========================================================================
  // HISTOGRAM METHODS
  // ===========================================================================

  /**
   * Observe a value in a histogram
   */
  observeHistogram(name: string, value: number, labels: Record<string, string> = {}): void {
    const histogram = this.histograms.get(name);
    if (!histogram) {
      logger.warn(`Histogram ${name} not found`);
      return;
    }

    const labelKey = this.labelsToKey(labels);

    let cumulativeBuckets = histogram.bucketCounts.get(labelKey);
    if (!cumulativeBuckets) {
      cumulativeBuckets = new Array<number>(histogram.buckets.length + 1).fill(0);
      histogram.bucketCounts.set(labelKey, cumulativeBuckets);
    }

    for (let i = 0; i < histogram.buckets.length; i++) {
      if (value <= histogram.buckets[i]) {
        cumulativeBuckets[i] += 1;
      }
    }
    // +Inf bucket is always incremented.
    cumulativeBuckets[histogram.buckets.length] += 1;

    histogram.sum.set(labelKey, (histogram.sum.get(labelKey) ?? 0) + value);
    histogram.count.set(labelKey, (histogram.count.get(labelKey) ?? 0) + 1);
  }

  getHistogramCount(name: string, labels: Record<string, string> = {}): number {
    return this.histograms.get(name)?.count.get(this.labelsToKey(labels)) ?? 0;
  }

  // ===========================================================================
  // PROMETHEUS FORMAT EXPORT
  // ===========================================================================

  /**
   * Export all metrics in Prometheus format
   */
  getPrometheusMetrics(): string {
    const lines: string[] = [];

    // Export counters
    for (const [, counter] of this.counters) {
      lines.push(`# HELP ${counter.name} ${counter.help}`);
      lines.push(`# TYPE ${counter.name} counter`);

      for (const [labelKey, value] of Object.entries(counter.labels)) {
        if (labelKey === '') {
          lines.push(`${counter.name} ${value}`);
        } else {
          lines.push(`${counter.name}{${labelKey}} ${value}`);
        }
      }
    }

    // Export gauges
    for (const [name, gauge] of this.gauges) {
      lines.push(`# HELP ${gauge.name} ${gauge.help}`);
      lines.push(`# TYPE ${gauge.name} gauge`);
      lines.push(`${gauge.name} ${this.getGauge(name)}`);
    }

    // Export histograms
    for (const [, histogram] of this.histograms) {
      lines.push(`# HELP ${histogram.name} ${histogram.help}`);
      lines.push(`# TYPE ${histogram.name} histogram`);

      for (const [labelKey, cumulativeBuckets] of histogram.bucketCounts) {
        const count = histogram.count.get(labelKey) ?? 0;
        const sum = histogram.sum.get(labelKey) ?? 0;
        const labelPart = labelKey ? `${labelKey},` : '';

        for (let i = 0; i < histogram.buckets.length; i++) {
          lines.push(`${histogram.name}_bucket{${labelPart}le="${histogram.buckets[i]}"} ${cumulativeBuckets[i]}`);
        }

        lines.push(`${histogram.name}_bucket{${labelPart}le="+Inf"} ${cumulativeBuckets[histogram.buckets.length]}`);
        if (labelKey) {
          lines.push(`${histogram.name}_sum{${labelKey}} ${sum}`);
          lines.push(`${histogram.name}_count{${labelKey}} ${count}`);
        } else {
          lines.push(`${histogram.name}_sum ${sum}`);
          lines.push(`${histogram.name}_count ${count}`);
        }
      }
    }

    return lines.join('\n');
  }

  /**
   * Prometheus label string, keys sorted: method="GetFeature",code="OK"
   */
  private labelsToKey(labels: Record<string, string>): string {
    return Object.keys(labels)
      .sort()
      .map(key => `${key}="${labels[key]}"`)
      .join(',');
  }
}

export const metrics = new MetricsService();

// =============================================================================
// TRACKING HELPERS
// =============================================================================

/**
 * Record one finished gRPC call
 */
export function trackGrpcCall(method: string, code: string, durationMs: number): void {
  metrics.incrementCounter('grpc_requests_total', { method, code });
  metrics.observeHistogram('grpc_request_duration_ms', durationMs, { method });
}

export function trackStreamMessage(method: string, direction: 'in' | 'out', count: number = 1): void {
  metrics.incrementCounter('grpc_stream_messages_total', { method, direction }, count);
}

/**
 * Metrics endpoint handler
 */
export function metricsHandler(_req: Request, res: Response): void {
  res.set('Content-Type', 'text/plain; version=0.0.4');
  res.send(metrics.getPrometheusMetrics());
}
