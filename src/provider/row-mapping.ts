import {
  COMPOUNDS,
  Compound,
  LapRecord,
  TelemetryChannel,
  TelemetrySample,
  TelemetryTrace
} from '../types/telemetry';

export type LapRow = {
  driver_number: string;
  lap_number: number;
  lap_time_s: number | null;
  sector1_s: number | null;
  sector2_s: number | null;
  sector3_s: number | null;
  compound: string | null;
  tyre_life: number | null;
  stint: number | null;
  position: number | null;
  is_quick_lap: boolean;
};

export type TelemetryRow = {
  driver_number: string;
  lap_number: number;
  distance_m: number;
  speed_kph: number | null;
  throttle: number | null;
  brake: boolean | null;
  rpm: number | null;
  gear: number | null;
  x: number | null;
  y: number | null;
};

const COMPOUND_SET: ReadonlySet<string> = new Set(COMPOUNDS);

function isCompound(value: string): value is Compound {
  return COMPOUND_SET.has(value);
}

/**
 * Anything the store cannot name as a compound (TEST_UNKNOWN, null, '')
 * maps to UNKNOWN
 */
export function parseCompound(raw: string | null): Compound {
  const normalized = (raw ?? '').trim().toUpperCase();
  return isCompound(normalized) ? normalized : 'UNKNOWN';
}

function finiteOrNull(value: number | null): number | null {
  return value !== null && Number.isFinite(value) ? value : null;
}

export function mapLapRow(row: LapRow): LapRecord {
  return {
    driver_id: row.driver_number,
    lap_number: row.lap_number,
    lap_time_s: finiteOrNull(row.lap_time_s),
    sector1_s: finiteOrNull(row.sector1_s),
    sector2_s: finiteOrNull(row.sector2_s),
    sector3_s: finiteOrNull(row.sector3_s),
    compound: parseCompound(row.compound),
    tyre_life: finiteOrNull(row.tyre_life),
    is_quick_lap: row.is_quick_lap === true,
    stint: finiteOrNull(row.stint),
    position: finiteOrNull(row.position)
  };
}

/**
 * A channel counts as present only when every row carries it
 */
function presentChannels(rows: readonly TelemetryRow[]): TelemetryChannel[] {
  if (rows.length === 0) {
    return ['speed', 'throttle', 'brake', 'rpm', 'gear'];
  }
  const channels: TelemetryChannel[] = [];
  if (rows.every(r => r.speed_kph !== null)) { channels.push('speed'); }
  if (rows.every(r => r.throttle !== null)) { channels.push('throttle'); }
  if (rows.every(r => r.brake !== null)) { channels.push('brake'); }
  if (rows.every(r => r.rpm !== null)) { channels.push('rpm'); }
  if (rows.every(r => r.gear !== null)) { channels.push('gear'); }
  if (rows.every(r => r.x !== null && r.y !== null)) { channels.push('position'); }
  return channels;
}

function mapTelemetrySample(row: TelemetryRow): TelemetrySample {
  const sample: TelemetrySample = {
    distance_m: row.distance_m,
    speed_kph: row.speed_kph ?? 0,
    throttle: row.throttle ?? 0,
    brake: row.brake ?? false,
    rpm: row.rpm ?? 0,
    gear: row.gear ?? 0
  };
  if (row.x !== null && row.y !== null) {
    sample.x = row.x;
    sample.y = row.y;
  }
  return sample;
}

/**
 * Rows of one lap, already in sample order
 */
export function mapTelemetryRows(lapNumber: number, rows: readonly TelemetryRow[]): TelemetryTrace {
  return {
    lap_number: lapNumber,
    channels: presentChannels(rows),
    samples: rows.map(mapTelemetrySample)
  };
}

/**
 * Store colors may come without the leading '#'
 */
export function normalizeColor(raw: string | null): string | null {
  const trimmed = (raw ?? '').trim();
  if (!/^#?[0-9a-fA-F]{6}$/.test(trimmed)) {
    return null;
  }
  return trimmed.startsWith('#') ? trimmed : `#${trimmed}`;
}

export function telemetryKey(driverId: string, lapNumber: number): string {
  return `${driverId}#${lapNumber}`;
}
