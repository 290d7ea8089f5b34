/**
 * Chart-ready views of a single driver's session: stint timeline, speed
 * trace with corner markers, the quick-lap time distribution and the
 * running position per lap.
 */

import { DriverDataset } from '../session/driver-dataset';
import { Compound, hasChannel } from '../types/telemetry';
import { Computation, available, unavailable } from '../types/errors';
import {
  PositionPoint,
  QuickLapDistribution,
  QuickLapPoint,
  SpeedTrace,
  StintTimelineEntry
} from '../types/results';
import { COMPOUND_COLORS } from '../config/analysis';

export function median(sorted: readonly number[]): number {
  if (sorted.length === 0) {
    return 0;
  }
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? sorted[mid]
    : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Laps grouped by (stint, compound) into first/last lap ranges, ordered by
 * first lap. Laps without a stint number are skipped.
 */
export function computeStintTimeline(dataset: DriverDataset): Computation<StintTimelineEntry[]> {
  const stints = new Map<string, StintTimelineEntry>();

  for (const lap of dataset.laps) {
    if (lap.stint === null) {
      continue;
    }
    const key = `${lap.stint}:${lap.compound}`;
    const entry = stints.get(key);
    if (entry) {
      entry.first_lap = Math.min(entry.first_lap, lap.lap_number);
      entry.last_lap = Math.max(entry.last_lap, lap.lap_number);
      entry.lap_count++;
    } else {
      stints.set(key, {
        stint: lap.stint,
        compound: lap.compound,
        first_lap: lap.lap_number,
        last_lap: lap.lap_number,
        lap_count: 1,
        color: compoundColor(lap.compound)
      });
    }
  }

  if (stints.size === 0) {
    return unavailable('stint_timeline', 'stints', `No stint numbers for ${dataset.abbreviation}`);
  }

  return available(
    Array.from(stints.values()).sort((a, b) => a.first_lap - b.first_lap || a.stint - b.stint)
  );
}

export function compoundColor(compound: Compound): string {
  return COMPOUND_COLORS[compound];
}

/**
 * Speed against distance for the fastest lap, with corners labelled T<n>
 */
export function computeSpeedTrace(dataset: DriverDataset): Computation<SpeedTrace> {
  const trace = dataset.fastest_lap_telemetry;
  if (!trace) {
    return unavailable('speed_trace', 'telemetry', `No fastest-lap telemetry for ${dataset.abbreviation}`);
  }
  if (!hasChannel(trace, 'speed')) {
    return unavailable('speed_trace', 'speed_channel', 'Telemetry has no speed channel');
  }
  if (trace.samples.length === 0) {
    return unavailable('speed_trace', 'samples', 'Telemetry has no samples');
  }

  return available({
    lap_number: trace.lap_number,
    color: dataset.color,
    points: trace.samples.map(sample => ({
      distance_m: sample.distance_m,
      speed_kph: sample.speed_kph
    })),
    corners: dataset.context.corners.map(corner => ({
      number: corner.number,
      distance_m: corner.distance_m,
      label: `T${corner.number}`
    }))
  });
}

/**
 * Quick-lap times with compound, plus min/median/max
 */
export function computeQuickLapDistribution(dataset: DriverDataset): Computation<QuickLapDistribution> {
  const points: QuickLapPoint[] = [];
  for (const lap of dataset.quick_laps) {
    if (lap.lap_time_s === null) {
      continue;
    }
    points.push({ lap_number: lap.lap_number, lap_time_s: lap.lap_time_s, compound: lap.compound });
  }

  if (points.length === 0) {
    return unavailable('quick_lap_distribution', 'quick_laps', `No timed quick laps for ${dataset.abbreviation}`);
  }

  const sorted = points.map(p => p.lap_time_s).sort((a, b) => a - b);
  return available({
    points,
    min_lap_time_s: sorted[0],
    median_lap_time_s: median(sorted),
    max_lap_time_s: sorted[sorted.length - 1]
  });
}

/**
 * Running position after each lap, in lap-number order. Laps without a
 * classified position are skipped.
 */
export function computePositionTrace(dataset: DriverDataset): Computation<PositionPoint[]> {
  const points: PositionPoint[] = [];
  for (const lap of dataset.laps) {
    if (lap.position !== null) {
      points.push({ lap_number: lap.lap_number, position: lap.position });
    }
  }

  if (points.length === 0) {
    return unavailable('position_trace', 'positions', `No lap positions for ${dataset.abbreviation}`);
  }

  return available(points.sort((a, b) => a.lap_number - b.lap_number));
}
