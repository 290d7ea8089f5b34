/**
 * ANALYSIS CONFIGURATION
 *
 * Thresholds for behavioral event detection and performance aggregates,
 * plus the display palettes handed to the rendering client.
 *
 * METHODOLOGY:
 * - Coast/lift: throttle falling, below full throttle, brake released
 * - Traction loss: RPM jump with stalled road speed under throttle
 * - Efficiency: share of fastest-lap samples at full throttle
 */

export const BEHAVIOR_THRESHOLDS = {
  /** Throttle at or above this counts as full throttle (percent) */
  full_throttle: 95,

  /** Minimum sample-to-sample RPM rise for a traction event */
  traction_rpm_delta: 200,

  /** Speed gain (km/h) below which road speed is considered stalled */
  traction_speed_delta: 1,

  /** Throttle must exceed this (percent) for a traction event */
  traction_min_throttle: 50
} as const;

/**
 * Decimal places for percentage outputs
 */
export const PERCENT_PRECISION = 1;

/**
 * Fallback driver colors, indexed by selection order
 */
export const FALLBACK_DRIVER_COLORS = [
  '#0600EF',
  '#FF8700',
  '#FF1801',
  '#DC143C',
  '#00D2BE',
  '#FF69B4',
  '#32CD32',
  '#FF4500',
  '#8A2BE2',
  '#00CED1'
] as const;

export const COMPOUND_COLORS = {
  SOFT: '#da020e',
  MEDIUM: '#ffd12e',
  HARD: '#f0f0ec',
  INTERMEDIATE: '#43b02a',
  WET: '#0067ad',
  UNKNOWN: '#808080'
} as const;

/**
 * Earliest season with full telemetry coverage
 */
export const FIRST_SUPPORTED_YEAR = 2018;

/**
 * Round half to even: an exact half goes to the even neighbour
 * (6.25 -> 6.2, 18.75 -> 18.8)
 */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  if (fraction > 0.5) {
    return (floor + 1) / factor;
  }
  if (fraction < 0.5) {
    return floor / factor;
  }
  return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

export function toPercent(count: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return roundTo((100 * count) / total, PERCENT_PRECISION);
}
