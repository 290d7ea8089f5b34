/**
 * METRICS COLLECTION
 *
 * Lightweight in-process metrics, exposed Prometheus-style at /metrics
 *
 * Collected metrics:
 * - Session load latency histogram and loads by outcome
 * - Total request latency
 * - Selection cache hit/miss rates
 * - Unavailable computations by metric
 */

import { Router, Request, Response, NextFunction } from 'express';

// Histogram bucket boundaries (milliseconds)
const LATENCY_BUCKETS = [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

const METRIC_PREFIX = 'telemetry_insights';

interface HistogramData {
  buckets: Map<number, number>;
  sum: number;
  count: number;
}

/**
 * Metrics collector singleton
 */
class MetricsCollector {
  // Histograms
  private sessionLoadLatency: HistogramData;
  private totalRequestLatency: HistogramData;

  // Counters
  private selectionCacheHits: number = 0;
  private selectionCacheMisses: number = 0;
  private sessionLoadsByOutcome: Map<string, number> = new Map();
  private unavailableByMetric: Map<string, number> = new Map();

  // Gauges
  private activeConcurrentRequests: number = 0;

  constructor() {
    this.sessionLoadLatency = this.createHistogram();
    this.totalRequestLatency = this.createHistogram();
  }

  private createHistogram(): HistogramData {
    const buckets = new Map<number, number>();
    LATENCY_BUCKETS.forEach(b => buckets.set(b, 0));
    return { buckets, sum: 0, count: 0 };
  }

  /**
   * Buckets store per-bucket counts; formatting accumulates them
   */
  private recordHistogram(histogram: HistogramData, value: number): void {
    histogram.sum += value;
    histogram.count += 1;

    for (const bucket of LATENCY_BUCKETS) {
      if (value <= bucket) {
        histogram.buckets.set(bucket, (histogram.buckets.get(bucket) || 0) + 1);
        return;
      }
    }
  }

  recordSessionLoadLatency(ms: number): void {
    this.recordHistogram(this.sessionLoadLatency, ms);
  }

  incrementSessionLoad(outcome: string): void {
    this.sessionLoadsByOutcome.set(outcome, (this.sessionLoadsByOutcome.get(outcome) || 0) + 1);
  }

  recordRequestLatency(ms: number): void {
    this.recordHistogram(this.totalRequestLatency, ms);
  }

  incrementSelectionCacheHit(): void {
    this.selectionCacheHits++;
  }

  incrementSelectionCacheMiss(): void {
    this.selectionCacheMisses++;
  }

  incrementUnavailable(metric: string): void {
    this.unavailableByMetric.set(metric, (this.unavailableByMetric.get(metric) || 0) + 1);
  }

  incrementConcurrentRequests(): void {
    this.activeConcurrentRequests++;
  }

  decrementConcurrentRequests(): void {
    this.activeConcurrentRequests = Math.max(0, this.activeConcurrentRequests - 1);
  }

  getSelectionCacheHitRate(): number {
    const total = this.selectionCacheHits + this.selectionCacheMisses;
    return total > 0 ? this.selectionCacheHits / total : 0;
  }

  // Format histogram for Prometheus
  private formatHistogram(name: string, histogram: HistogramData, help: string): string {
    const lines: string[] = [];
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} histogram`);

    let cumulative = 0;
    for (const bucket of LATENCY_BUCKETS) {
      cumulative += histogram.buckets.get(bucket) || 0;
      lines.push(`${name}_bucket{le="${bucket}"} ${cumulative}`);
    }
    lines.push(`${name}_bucket{le="+Inf"} ${histogram.count}`);
    lines.push(`${name}_sum ${histogram.sum}`);
    lines.push(`${name}_count ${histogram.count}`);

    return lines.join('\n');
  }

  private formatLabelled(name: string, label: string, values: Map<string, number>, help: string): string {
    const lines: string[] = [];
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} counter`);
    for (const [key, count] of values) {
      lines.push(`${name}{${label}="${key.replace(/"/g, '\\"')}"} ${count}`);
    }
    if (values.size === 0) {
      lines.push(`${name} 0`);
    }
    return lines.join('\n');
  }

  toPrometheus(): string {
    const sections: string[] = [];

    sections.push(this.formatHistogram(
      `${METRIC_PREFIX}_session_load_latency_ms`,
      this.sessionLoadLatency,
      'Session provider load latency in milliseconds'
    ));

    sections.push(this.formatHistogram(
      `${METRIC_PREFIX}_request_latency_ms`,
      this.totalRequestLatency,
      'Total request latency in milliseconds'
    ));

    sections.push(this.formatLabelled(
      `${METRIC_PREFIX}_session_loads_total`,
      'outcome',
      this.sessionLoadsByOutcome,
      'Session loads by outcome'
    ));

    sections.push(this.formatLabelled(
      `${METRIC_PREFIX}_unavailable_total`,
      'metric',
      this.unavailableByMetric,
      'Computations reported unavailable by metric'
    ));

    sections.push([
      `# HELP ${METRIC_PREFIX}_selection_cache_hits_total Driver dataset cache hits`,
      `# TYPE ${METRIC_PREFIX}_selection_cache_hits_total counter`,
      `${METRIC_PREFIX}_selection_cache_hits_total ${this.selectionCacheHits}`
    ].join('\n'));

    sections.push([
      `# HELP ${METRIC_PREFIX}_selection_cache_misses_total Driver dataset cache misses`,
      `# TYPE ${METRIC_PREFIX}_selection_cache_misses_total counter`,
      `${METRIC_PREFIX}_selection_cache_misses_total ${this.selectionCacheMisses}`
    ].join('\n'));

    sections.push([
      `# HELP ${METRIC_PREFIX}_concurrent_requests Current concurrent requests`,
      `# TYPE ${METRIC_PREFIX}_concurrent_requests gauge`,
      `${METRIC_PREFIX}_concurrent_requests ${this.activeConcurrentRequests}`
    ].join('\n'));

    return sections.join('\n\n') + '\n';
  }

  toJSON(): Record<string, unknown> {
    return {
      session_loads: {
        by_outcome: Object.fromEntries(this.sessionLoadsByOutcome),
        latency: {
          count: this.sessionLoadLatency.count,
          sum_ms: this.sessionLoadLatency.sum,
          avg_ms: this.sessionLoadLatency.count > 0
            ? Math.round(this.sessionLoadLatency.sum / this.sessionLoadLatency.count)
            : 0,
        },
      },
      selection_cache: {
        hits: this.selectionCacheHits,
        misses: this.selectionCacheMisses,
        hit_rate: this.getSelectionCacheHitRate(),
      },
      unavailable_by_metric: Object.fromEntries(this.unavailableByMetric),
      concurrency: {
        current: this.activeConcurrentRequests,
      },
    };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.sessionLoadLatency = this.createHistogram();
    this.totalRequestLatency = this.createHistogram();
    this.selectionCacheHits = 0;
    this.selectionCacheMisses = 0;
    this.sessionLoadsByOutcome.clear();
    this.unavailableByMetric.clear();
    this.activeConcurrentRequests = 0;
  }
}

// Singleton instance
export const metrics = new MetricsCollector();

export function createMetricsRouter(): Router {
  const router = Router();

  router.get('/metrics', (_req: Request, res: Response) => {
    res.set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(metrics.toPrometheus());
  });

  router.get('/metrics/json', (_req: Request, res: Response) => {
    res.json(metrics.toJSON());
  });

  return router;
}

/**
 * Middleware to track request metrics
 */
export function metricsMiddleware() {
  return (_req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    let settled = false;
    metrics.incrementConcurrentRequests();

    // 'close' also fires for connections dropped before the response finished
    const settle = () => {
      if (settled) {
        return;
      }
      settled = true;
      metrics.decrementConcurrentRequests();
      metrics.recordRequestLatency(Date.now() - startTime);
    };
    res.on('finish', settle);
    res.on('close', settle);

    next();
  };
}
