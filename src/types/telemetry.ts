/**
 * Session and telemetry domain types
 *
 * Field names follow the session store columns (snake_case) so rows map
 * onto these records without renaming.
 */

export const COMPOUNDS = ['SOFT', 'MEDIUM', 'HARD', 'INTERMEDIATE', 'WET', 'UNKNOWN'] as const;

export type Compound = typeof COMPOUNDS[number];

/**
 * A compound the provider could actually name
 */
export type KnownCompound = Exclude<Compound, 'UNKNOWN'>;

export const SESSION_TYPES = [
  'Practice 1',
  'Practice 2',
  'Practice 3',
  'Sprint Qualifying',
  'Sprint',
  'Qualifying',
  'Race'
] as const;

export type SessionType = typeof SESSION_TYPES[number];

export interface SessionIdentity {
  year: number;
  circuit: string;
  session_type: SessionType;
}

/**
 * One row of the session lap table
 */
export interface LapRecord {
  driver_id: string;
  lap_number: number;
  lap_time_s: number | null;
  sector1_s: number | null;
  sector2_s: number | null;
  sector3_s: number | null;
  compound: Compound;
  tyre_life: number | null;
  /** Provider flag: representative lap (no in/out or neutralised laps) */
  is_quick_lap: boolean;
  stint: number | null;
  position: number | null;
}

export type TelemetryChannel = 'speed' | 'throttle' | 'brake' | 'rpm' | 'gear' | 'position';

export interface TelemetrySample {
  distance_m: number;
  speed_kph: number;
  /** 0-100 */
  throttle: number;
  brake: boolean;
  rpm: number;
  gear: number;
  x?: number;
  y?: number;
}

/**
 * Telemetry of one lap, sorted by non-decreasing distance.
 *
 * `channels` lists what the provider supplied; values of an absent channel
 * are placeholders and must not be read.
 */
export interface TelemetryTrace {
  lap_number: number;
  channels: readonly TelemetryChannel[];
  samples: readonly TelemetrySample[];
}

export interface CircuitCorner {
  number: number;
  distance_m: number;
}

export interface DriverInfo {
  driver_id: string;
  abbreviation: string | null;
  full_name: string | null;
  team_name: string | null;
}

export function hasChannel(trace: TelemetryTrace, channel: TelemetryChannel): boolean {
  return trace.channels.includes(channel);
}

export function isKnownCompound(compound: Compound): compound is KnownCompound {
  return compound !== 'UNKNOWN';
}

export function sessionKey(identity: SessionIdentity): string {
  return `${identity.year}:${identity.circuit.trim().toLowerCase()}:${identity.session_type}`;
}
