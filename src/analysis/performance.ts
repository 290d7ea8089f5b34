/**
 * Performance aggregates over one driver's dataset
 *
 * Every operation returns a Computation: a value, or an explicit
 * missing_data outcome naming what was absent. Missing input for one
 * aggregate never stops another.
 */

import { DriverDataset } from '../session/driver-dataset';
import { Compound, KnownCompound, LapRecord, hasChannel, isKnownCompound } from '../types/telemetry';
import { Computation, available, unavailable } from '../types/errors';
import {
  EfficiencyScore,
  LapTimeEvolution,
  LapTimePoint,
  SectorTimeRow,
  StintComparisonRow,
  TyreAgeGroup
} from '../types/results';
import { BEHAVIOR_THRESHOLDS, toPercent } from '../config/analysis';

type TimedLap = LapRecord & { lap_time_s: number };

function hasLapTime(lap: LapRecord): lap is TimedLap {
  return lap.lap_time_s !== null;
}

export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return values.length > 0 ? sum / values.length : 0;
}

/**
 * Percentage of fastest-lap samples at full throttle, one decimal
 */
export function computeEfficiencyScore(dataset: DriverDataset): Computation<number> {
  const trace = dataset.fastest_lap_telemetry;
  if (!trace) {
    return unavailable('efficiency', 'telemetry', `No fastest-lap telemetry for ${dataset.abbreviation}`);
  }
  if (!hasChannel(trace, 'throttle')) {
    return unavailable('efficiency', 'throttle_channel', 'Telemetry has no throttle channel');
  }
  if (trace.samples.length === 0) {
    return unavailable('efficiency', 'samples', 'Telemetry has no samples');
  }

  let fullThrottle = 0;
  for (const sample of trace.samples) {
    if (sample.throttle >= BEHAVIOR_THRESHOLDS.full_throttle) {
      fullThrottle++;
    }
  }
  return available(toPercent(fullThrottle, trace.samples.length));
}

/**
 * Client-facing form: 0 with valid=false when no score exists
 */
export function reportEfficiency(efficiency: Computation<number>): EfficiencyScore {
  return efficiency.status === 'ok'
    ? { score: efficiency.value, valid: true }
    : { score: 0, valid: false };
}

/**
 * Sector splits of quick laps. A lap missing any sector is left out entirely.
 */
export function computeSectorTimes(dataset: DriverDataset): Computation<SectorTimeRow[]> {
  if (dataset.quick_laps.length === 0) {
    return unavailable('sector_times', 'quick_laps', `No quick laps for ${dataset.abbreviation}`);
  }

  const rows: SectorTimeRow[] = [];
  for (const lap of dataset.quick_laps) {
    if (lap.sector1_s === null || lap.sector2_s === null || lap.sector3_s === null) {
      continue;
    }
    rows.push({
      lap_number: lap.lap_number,
      sector1_s: lap.sector1_s,
      sector2_s: lap.sector2_s,
      sector3_s: lap.sector3_s
    });
  }

  if (rows.length === 0) {
    return unavailable('sector_times', 'sector_times', 'No quick lap has all three sector times');
  }
  return available(rows);
}

/**
 * Lap times in lap-number order with the fastest flagged and the mean.
 *
 * Exact ties: the first lap in lap-number order keeps the flag.
 */
export function computeLapTimeEvolution(dataset: DriverDataset): Computation<LapTimeEvolution> {
  const timed = dataset.laps
    .filter(hasLapTime)
    .sort((a, b) => a.lap_number - b.lap_number);

  if (timed.length === 0) {
    return unavailable('lap_time_evolution', 'lap_times', `No timed laps for ${dataset.abbreviation}`);
  }

  let fastestIndex = 0;
  for (let i = 1; i < timed.length; i++) {
    if (timed[i].lap_time_s < timed[fastestIndex].lap_time_s) {
      fastestIndex = i;
    }
  }

  const laps: LapTimePoint[] = timed.map((lap, index) => ({
    lap_number: lap.lap_number,
    lap_time_s: lap.lap_time_s,
    fastest: index === fastestIndex
  }));

  return available({
    laps,
    mean_lap_time_s: mean(timed.map(lap => lap.lap_time_s))
  });
}

/**
 * Mean lap time per known compound, fastest compound first.
 *
 * Equal means keep the order in which the compounds first appear.
 */
export function computeStintComparison(dataset: DriverDataset): Computation<StintComparisonRow[]> {
  const byCompound = new Map<KnownCompound, number[]>();

  for (const lap of dataset.laps) {
    if (!hasLapTime(lap) || !isKnownCompound(lap.compound)) {
      continue;
    }
    const times = byCompound.get(lap.compound);
    if (times) {
      times.push(lap.lap_time_s);
    } else {
      byCompound.set(lap.compound, [lap.lap_time_s]);
    }
  }

  if (byCompound.size === 0) {
    return unavailable('stint_comparison', 'compounds', 'No timed laps on a known compound');
  }

  const rows: StintComparisonRow[] = Array.from(byCompound.entries()).map(([compound, times]) => ({
    compound,
    mean_lap_time_s: mean(times),
    lap_count: times.length
  }));

  rows.sort((a, b) => a.mean_lap_time_s - b.mean_lap_time_s);
  return available(rows);
}

/**
 * (lap, tyre life, compound) grouped by compound, no aggregation.
 *
 * Groups appear in first-seen order; points keep lap-table order.
 */
export function computeTyreAgeSeries(dataset: DriverDataset): Computation<TyreAgeGroup[]> {
  const groups = new Map<Compound, TyreAgeGroup>();

  for (const lap of dataset.laps) {
    if (lap.tyre_life === null || !isKnownCompound(lap.compound)) {
      continue;
    }
    let group = groups.get(lap.compound);
    if (!group) {
      group = { compound: lap.compound, points: [] };
      groups.set(lap.compound, group);
    }
    group.points.push({
      lap_number: lap.lap_number,
      tyre_life: lap.tyre_life,
      compound: lap.compound
    });
  }

  if (groups.size === 0) {
    return unavailable('tyre_age_series', 'tyre_life', 'No lap has both tyre life and compound');
  }
  return available(Array.from(groups.values()));
}
