import { Compound, KnownCompound } from './telemetry';
import { Computation } from './errors';
import { CoastSummary, TractionSummary } from '../analysis/behavioral-events';

/**
 * Efficiency as handed to the client.
 *
 * `valid: false` means no measurement was possible; `score` is then 0 and
 * must not be read as a real value.
 */
export interface EfficiencyScore {
  score: number;
  valid: boolean;
}

export interface SectorTimeRow {
  lap_number: number;
  sector1_s: number;
  sector2_s: number;
  sector3_s: number;
}

export interface LapTimePoint {
  lap_number: number;
  lap_time_s: number;
  fastest: boolean;
}

export interface LapTimeEvolution {
  laps: LapTimePoint[];
  mean_lap_time_s: number;
}

export interface StintComparisonRow {
  compound: KnownCompound;
  mean_lap_time_s: number;
  lap_count: number;
}

export interface TyreAgePoint {
  lap_number: number;
  tyre_life: number;
  compound: Compound;
}

export interface TyreAgeGroup {
  compound: Compound;
  points: TyreAgePoint[];
}

export interface StintTimelineEntry {
  stint: number;
  compound: Compound;
  first_lap: number;
  last_lap: number;
  lap_count: number;
  color: string;
}

export interface SpeedTracePoint {
  distance_m: number;
  speed_kph: number;
}

export interface CornerMarker {
  number: number;
  distance_m: number;
  label: string;
}

export interface SpeedTrace {
  lap_number: number;
  color: string;
  points: SpeedTracePoint[];
  corners: CornerMarker[];
}

export interface PositionPoint {
  lap_number: number;
  position: number;
}

export interface QuickLapPoint {
  lap_number: number;
  lap_time_s: number;
  compound: Compound;
}

export interface QuickLapDistribution {
  points: QuickLapPoint[];
  min_lap_time_s: number;
  median_lap_time_s: number;
  max_lap_time_s: number;
}

/**
 * Every analysis for the selected driver, each with its own outcome
 */
export interface DriverReport {
  session_key: string;
  load_id: string;
  driver_id: string;
  abbreviation: string;
  color: string;
  fastest_lap_number: number | null;
  coast: Computation<CoastSummary>;
  traction: Computation<TractionSummary>;
  efficiency: Computation<number>;
  efficiency_reported: EfficiencyScore;
  sector_times: Computation<SectorTimeRow[]>;
  lap_time_evolution: Computation<LapTimeEvolution>;
  stint_comparison: Computation<StintComparisonRow[]>;
  tyre_age_series: Computation<TyreAgeGroup[]>;
  stint_timeline: Computation<StintTimelineEntry[]>;
  speed_trace: Computation<SpeedTrace>;
  quick_lap_distribution: Computation<QuickLapDistribution>;
  position_trace: Computation<PositionPoint[]>;
}
