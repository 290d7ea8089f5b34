import { DriverDataset } from '../session/driver-dataset';
import { DriverReport } from '../types/results';
import { sessionKey } from '../types/telemetry';
import { analyzeBehavior } from './behavioral-events';
import {
  computeEfficiencyScore,
  computeLapTimeEvolution,
  computeSectorTimes,
  computeStintComparison,
  computeTyreAgeSeries,
  reportEfficiency
} from './performance';
import {
  computePositionTrace,
  computeQuickLapDistribution,
  computeSpeedTrace,
  computeStintTimeline
} from './session-insights';

/**
 * Run every analysis over one dataset. Each entry carries its own outcome.
 */
export function buildDriverReport(dataset: DriverDataset): DriverReport {
  const behavior = analyzeBehavior(dataset);
  const efficiency = computeEfficiencyScore(dataset);

  return {
    session_key: sessionKey(dataset.context.identity),
    load_id: dataset.context.load_id,
    driver_id: dataset.driver_id,
    abbreviation: dataset.abbreviation,
    color: dataset.color,
    fastest_lap_number: dataset.fastest_lap?.lap_number ?? null,
    coast: behavior.coast,
    traction: behavior.traction,
    efficiency,
    efficiency_reported: reportEfficiency(efficiency),
    sector_times: computeSectorTimes(dataset),
    lap_time_evolution: computeLapTimeEvolution(dataset),
    stint_comparison: computeStintComparison(dataset),
    tyre_age_series: computeTyreAgeSeries(dataset),
    stint_timeline: computeStintTimeline(dataset),
    speed_trace: computeSpeedTrace(dataset),
    quick_lap_distribution: computeQuickLapDistribution(dataset),
    position_trace: computePositionTrace(dataset)
  };
}

/**
 * Metrics of a report that came back unavailable
 */
export function listUnavailable(report: DriverReport): string[] {
  const entries = [
    report.coast,
    report.traction,
    report.efficiency,
    report.sector_times,
    report.lap_time_evolution,
    report.stint_comparison,
    report.tyre_age_series,
    report.stint_timeline,
    report.speed_trace,
    report.quick_lap_distribution,
    report.position_trace
  ];
  const missing: string[] = [];
  for (const entry of entries) {
    if (entry.status === 'unavailable') {
      missing.push(entry.error.metric);
    }
  }
  return missing;
}
