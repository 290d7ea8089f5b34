import { DriverDataset } from './driver-dataset';
import { metrics } from '../observability/metrics';

/**
 * Cache key: one session load plus one driver
 */
export interface SelectionKey {
  load_id: string;
  driver_id: string;
}

interface SelectionEntry {
  key: SelectionKey;
  dataset: DriverDataset | null;
}

/**
 * SelectionCache - holds the dataset of the live driver selection
 *
 * At most one entry. A lookup under any other key drops it and builds anew;
 * `invalidate` drops it on session reload. A null dataset (driver without
 * laps) is cached too, so the lap table is filtered once per selection.
 */
export class SelectionCache {
  private entry: SelectionEntry | null = null;

  getOrAssemble(key: SelectionKey, assemble: () => DriverDataset | null): DriverDataset | null {
    if (this.entry && this.matches(this.entry.key, key)) {
      metrics.incrementSelectionCacheHit();
      return this.entry.dataset;
    }

    metrics.incrementSelectionCacheMiss();
    this.entry = null;
    const dataset = assemble();
    this.entry = { key: { ...key }, dataset };
    return dataset;
  }

  peek(): DriverDataset | null {
    return this.entry?.dataset ?? null;
  }

  currentKey(): SelectionKey | null {
    return this.entry ? { ...this.entry.key } : null;
  }

  invalidate(): void {
    this.entry = null;
  }

  private matches(a: SelectionKey, b: SelectionKey): boolean {
    return a.load_id === b.load_id && a.driver_id === b.driver_id;
  }
}
