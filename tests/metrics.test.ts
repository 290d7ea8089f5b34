import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import express, { Express, Request, Response } from 'express';
import { Server } from 'http';
import { metrics, metricsMiddleware } from '../src/observability/metrics';

describe('metrics', () => {
  beforeEach(() => {
    metrics.reset();
  });

  it('accumulates histogram buckets', () => {
    metrics.recordSessionLoadLatency(5);
    metrics.recordSessionLoadLatency(30);
    metrics.recordSessionLoadLatency(20000);

    const lines = metrics.toPrometheus().split('\n');
    expect(lines).toContain('telemetry_insights_session_load_latency_ms_bucket{le="10"} 1');
    expect(lines).toContain('telemetry_insights_session_load_latency_ms_bucket{le="25"} 1');
    expect(lines).toContain('telemetry_insights_session_load_latency_ms_bucket{le="50"} 2');
    expect(lines).toContain('telemetry_insights_session_load_latency_ms_bucket{le="10000"} 2');
    expect(lines).toContain('telemetry_insights_session_load_latency_ms_bucket{le="+Inf"} 3');
    expect(lines).toContain('telemetry_insights_session_load_latency_ms_sum 20035');
  });

  it('prints a zero line for empty labelled counters', () => {
    const lines = metrics.toPrometheus().split('\n');
    expect(lines).toContain('telemetry_insights_unavailable_total 0');
  });

  it('summarises as JSON', () => {
    metrics.incrementSessionLoad('loaded');
    metrics.incrementSessionLoad('loaded');
    metrics.incrementSelectionCacheMiss();
    metrics.incrementUnavailable('speed_trace');

    const summary = metrics.toJSON();
    expect(summary.selection_cache).toEqual({ hits: 0, misses: 1, hit_rate: 0 });
    expect(summary.unavailable_by_metric).toEqual({ speed_trace: 1 });
    expect(summary.session_loads).toEqual({
      by_outcome: { loaded: 2 },
      latency: { count: 0, sum_ms: 0, avg_ms: 0 }
    });
  });

  it('never lets the concurrency gauge go negative', () => {
    metrics.decrementConcurrentRequests();
    expect(metrics.toPrometheus().split('\n')).toContain('telemetry_insights_concurrent_requests 0');
  });
});

describe('metricsMiddleware', () => {
  let server: Server | null = null;

  beforeEach(() => {
    metrics.reset();
  });

  afterEach(async () => {
    const running = server;
    server = null;
    if (running) {
      await new Promise<void>(resolve => running.close(() => resolve()));
    }
  });

  async function listen(app: Express): Promise<string> {
    const listening = await new Promise<Server>(resolve => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    server = listening;
    const address = listening.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind a TCP port');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  it('counts a finished request once', async () => {
    let closed: () => void = () => undefined;
    const connectionClosed = new Promise<void>(resolve => {
      closed = resolve;
    });

    const app = express();
    app.use(metricsMiddleware());
    app.get('/ok', (_req: Request, res: Response) => {
      res.on('close', () => closed());
      res.json({ ok: true });
    });
    const baseUrl = await listen(app);

    const res = await fetch(`${baseUrl}/ok`);
    await res.text();
    await connectionClosed;

    expect(metrics.toJSON().concurrency).toEqual({ current: 0 });
    expect(metrics.toPrometheus().split('\n')).toContain('telemetry_insights_request_latency_ms_count 1');
  });

  it('releases the concurrency gauge when the client drops the connection', async () => {
    let reached: () => void = () => undefined;
    const handlerReached = new Promise<void>(resolve => {
      reached = resolve;
    });
    let closed: () => void = () => undefined;
    const connectionClosed = new Promise<void>(resolve => {
      closed = resolve;
    });

    const app = express();
    app.use(metricsMiddleware());
    app.get('/hang', (_req: Request, res: Response) => {
      res.on('close', () => closed());
      reached();
    });
    const baseUrl = await listen(app);

    const abort = new AbortController();
    const request = fetch(`${baseUrl}/hang`, { signal: abort.signal });
    await handlerReached;
    expect(metrics.toJSON().concurrency).toEqual({ current: 1 });

    abort.abort();
    await expect(request).rejects.toThrow();
    await connectionClosed;

    expect(metrics.toJSON().concurrency).toEqual({ current: 0 });
    expect(metrics.toPrometheus().split('\n')).toContain('telemetry_insights_request_latency_ms_count 1');
  });
});
