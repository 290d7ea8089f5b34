import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SelectionCache } from '../src/session/selection-cache';
import { metrics } from '../src/observability/metrics';
import { dataset, lap } from './fixtures/session-fixtures';

describe('SelectionCache', () => {
  beforeEach(() => {
    metrics.reset();
  });

  it('assembles once per key', () => {
    const cache = new SelectionCache();
    const built = dataset({ laps: [lap({ lap_number: 1 })] });
    const assemble = vi.fn(() => built);

    const first = cache.getOrAssemble({ load_id: 'load-1', driver_id: '16' }, assemble);
    const second = cache.getOrAssemble({ load_id: 'load-1', driver_id: '16' }, assemble);

    expect(first).toBe(built);
    expect(second).toBe(first);
    expect(assemble).toHaveBeenCalledTimes(1);
    expect(metrics.getSelectionCacheHitRate()).toBe(0.5);
  });

  it('replaces the entry on a different driver', () => {
    const cache = new SelectionCache();
    const leclerc = dataset({ driver_id: '16' });
    const sainz = dataset({ driver_id: '55' });

    cache.getOrAssemble({ load_id: 'load-1', driver_id: '16' }, () => leclerc);
    cache.getOrAssemble({ load_id: 'load-1', driver_id: '55' }, () => sainz);

    expect(cache.peek()).toBe(sainz);
    expect(cache.currentKey()).toEqual({ load_id: 'load-1', driver_id: '55' });
  });

  it('rebuilds for the same driver under a new load', () => {
    const cache = new SelectionCache();
    const assemble = vi.fn(() => dataset());

    cache.getOrAssemble({ load_id: 'load-1', driver_id: '16' }, assemble);
    cache.getOrAssemble({ load_id: 'load-2', driver_id: '16' }, assemble);

    expect(assemble).toHaveBeenCalledTimes(2);
  });

  it('caches a driver without laps', () => {
    const cache = new SelectionCache();
    const assemble = vi.fn(() => null);

    expect(cache.getOrAssemble({ load_id: 'load-1', driver_id: '99' }, assemble)).toBeNull();
    expect(cache.getOrAssemble({ load_id: 'load-1', driver_id: '99' }, assemble)).toBeNull();
    expect(assemble).toHaveBeenCalledTimes(1);
  });

  it('drops the entry on invalidate', () => {
    const cache = new SelectionCache();
    const assemble = vi.fn(() => dataset());

    cache.getOrAssemble({ load_id: 'load-1', driver_id: '16' }, assemble);
    cache.invalidate();

    expect(cache.peek()).toBeNull();
    expect(cache.currentKey()).toBeNull();
    cache.getOrAssemble({ load_id: 'load-1', driver_id: '16' }, assemble);
    expect(assemble).toHaveBeenCalledTimes(2);
  });
});
