/**
 * Behavioral event detection
 *
 * Flags per-sample driving patterns from first differences of the telemetry
 * channels. Sample 0 has no predecessor, so every difference there is 0 and
 * it is never flagged.
 *
 * - Coast/lift: throttle falling, below full throttle, no brake
 * - Traction loss: RPM rising sharply while road speed stalls under throttle
 */

import { TelemetrySample, TelemetryChannel, hasChannel } from '../types/telemetry';
import { Computation, MissingInput, available, unavailable } from '../types/errors';
import { BEHAVIOR_THRESHOLDS, toPercent } from '../config/analysis';
import { DriverDataset } from '../session/driver-dataset';

export interface BehavioralEventMasks {
  coast_mask: boolean[];
  traction_mask: boolean[];
}

export interface CoastSummary {
  coast_mask: boolean[];
  coast_percentage: number;
}

export interface TractionSummary {
  traction_mask: boolean[];
  traction_event_count: number;
}

export interface BehaviorAnalysis {
  coast: Computation<CoastSummary>;
  traction: Computation<TractionSummary>;
}

export function isCoastSample(current: TelemetrySample, previous: TelemetrySample | null): boolean {
  const throttleDelta = previous ? current.throttle - previous.throttle : 0;
  return throttleDelta < 0
    && current.throttle < BEHAVIOR_THRESHOLDS.full_throttle
    && !current.brake;
}

export function isTractionLossSample(current: TelemetrySample, previous: TelemetrySample | null): boolean {
  const rpmDelta = previous ? current.rpm - previous.rpm : 0;
  const speedDelta = previous ? current.speed_kph - previous.speed_kph : 0;
  return rpmDelta > BEHAVIOR_THRESHOLDS.traction_rpm_delta
    && speedDelta < BEHAVIOR_THRESHOLDS.traction_speed_delta
    && current.throttle > BEHAVIOR_THRESHOLDS.traction_min_throttle;
}

/**
 * Both masks in one pass. Output arrays are index-aligned with `samples`.
 */
export function detectBehavioralEvents(samples: readonly TelemetrySample[]): BehavioralEventMasks {
  const coastMask: boolean[] = new Array<boolean>(samples.length);
  const tractionMask: boolean[] = new Array<boolean>(samples.length);

  let previous: TelemetrySample | null = null;
  for (let i = 0; i < samples.length; i++) {
    const current = samples[i];
    coastMask[i] = isCoastSample(current, previous);
    tractionMask[i] = isTractionLossSample(current, previous);
    previous = current;
  }

  return { coast_mask: coastMask, traction_mask: tractionMask };
}

function countTrue(mask: readonly boolean[]): number {
  let count = 0;
  for (const flagged of mask) {
    if (flagged) {
      count++;
    }
  }
  return count;
}

/**
 * Share of coasting samples, one decimal; 0 for an empty mask
 */
export function computeCoastPercentage(coastMask: readonly boolean[]): number {
  return toPercent(countTrue(coastMask), coastMask.length);
}

const CHANNEL_INPUTS: Record<'throttle' | 'brake' | 'rpm' | 'speed', MissingInput> = {
  throttle: 'throttle_channel',
  brake: 'brake_channel',
  rpm: 'rpm_channel',
  speed: 'speed_channel'
};

function firstMissingChannel(
  channels: ReadonlyArray<keyof typeof CHANNEL_INPUTS>,
  present: (channel: TelemetryChannel) => boolean
): keyof typeof CHANNEL_INPUTS | null {
  for (const channel of channels) {
    if (!present(channel)) {
      return channel;
    }
  }
  return null;
}

/**
 * Coast and traction analysis of the fastest lap.
 *
 * Each side needs its own channels; one being unavailable does not affect
 * the other. An empty trace is valid and yields empty masks.
 */
export function analyzeBehavior(dataset: DriverDataset): BehaviorAnalysis {
  const trace = dataset.fastest_lap_telemetry;
  if (!trace) {
    return {
      coast: unavailable('coast', 'telemetry', `No fastest-lap telemetry for ${dataset.abbreviation}`),
      traction: unavailable('traction', 'telemetry', `No fastest-lap telemetry for ${dataset.abbreviation}`)
    };
  }

  const present = (channel: TelemetryChannel) => hasChannel(trace, channel);
  const masks = detectBehavioralEvents(trace.samples);

  const coastMissing = firstMissingChannel(['throttle', 'brake'], present);
  const coast: Computation<CoastSummary> = coastMissing
    ? unavailable('coast', CHANNEL_INPUTS[coastMissing], `Telemetry has no ${coastMissing} channel`)
    : available({
      coast_mask: masks.coast_mask,
      coast_percentage: computeCoastPercentage(masks.coast_mask)
    });

  const tractionMissing = firstMissingChannel(['rpm', 'speed', 'throttle'], present);
  const traction: Computation<TractionSummary> = tractionMissing
    ? unavailable('traction', CHANNEL_INPUTS[tractionMissing], `Telemetry has no ${tractionMissing} channel`)
    : available({
      traction_mask: masks.traction_mask,
      traction_event_count: countTrue(masks.traction_mask)
    });

  return { coast, traction };
}
