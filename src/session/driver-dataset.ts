import { LoadedSession } from '../provider/types';
import { LapRecord, TelemetryTrace } from '../types/telemetry';
import { SessionContext, resolveDriverColor } from './session-context';

/**
 * Everything the analysis needs about one driver in one session.
 *
 * Built once per driver selection and never mutated; a new selection or a
 * session reload replaces it.
 */
export interface DriverDataset {
  driver_id: string;
  abbreviation: string;
  color: string;
  /** Lap-table order */
  laps: readonly LapRecord[];
  fastest_lap: LapRecord | null;
  /** Null when the fastest lap has no telemetry */
  fastest_lap_telemetry: TelemetryTrace | null;
  quick_laps: readonly LapRecord[];
  context: SessionContext;
}

/**
 * Lap with the minimum lap time.
 *
 * Tie-break: the first occurrence in lap-table order wins. Laps without a
 * time are ignored; null if none has one.
 */
export function selectFastestLap(laps: readonly LapRecord[]): LapRecord | null {
  let fastest: LapRecord | null = null;
  for (const lap of laps) {
    if (lap.lap_time_s === null) {
      continue;
    }
    if (fastest === null || fastest.lap_time_s === null || lap.lap_time_s < fastest.lap_time_s) {
      fastest = lap;
    }
  }
  return fastest;
}

function isSortedByDistance(trace: TelemetryTrace): boolean {
  for (let i = 1; i < trace.samples.length; i++) {
    if (trace.samples[i].distance_m < trace.samples[i - 1].distance_m) {
      return false;
    }
  }
  return true;
}

/**
 * Stable sort by distance when the provider hands samples out of order
 */
function normalizeTrace(trace: TelemetryTrace): TelemetryTrace {
  if (isSortedByDistance(trace)) {
    return Object.freeze({ ...trace });
  }
  const samples = trace.samples
    .map((sample, index) => ({ sample, index }))
    .sort((a, b) => a.sample.distance_m - b.sample.distance_m || a.index - b.index)
    .map(entry => entry.sample);
  return Object.freeze({ ...trace, samples });
}

/**
 * Consolidate one driver's laps and fastest-lap telemetry.
 *
 * Returns null when the driver has no laps in the session.
 */
export function assembleDriverDataset(
  session: LoadedSession,
  driverId: string,
  context: SessionContext
): DriverDataset | null {
  const laps = session.laps.filter(lap => lap.driver_id === driverId);
  if (laps.length === 0) {
    return null;
  }

  const fastestLap = selectFastestLap(laps);
  const telemetry = fastestLap
    ? session.getTelemetry(driverId, fastestLap.lap_number)
    : null;

  const driverIndex = session.drivers.findIndex(d => d.driver_id === driverId);
  const info = driverIndex >= 0 ? session.drivers[driverIndex] : null;
  const abbreviation = info?.abbreviation?.trim() || driverId;

  return Object.freeze({
    driver_id: driverId,
    abbreviation,
    color: resolveDriverColor(context, driverId, abbreviation, Math.max(driverIndex, 0)),
    laps: Object.freeze(laps),
    fastest_lap: fastestLap,
    fastest_lap_telemetry: telemetry ? normalizeTrace(telemetry) : null,
    quick_laps: Object.freeze(laps.filter(lap => lap.is_quick_lap)),
    context
  });
}
