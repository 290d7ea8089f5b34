/**
 * ANALYSIS CONTROLLER TESTS
 *
 * Session lifecycle against an in-memory provider:
 * - load, reload and cache invalidation
 * - stale datasets after a reload
 * - superseded, aborted and failed loads
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AnalysisController } from '../src/session/analysis-controller';
import { SessionLoadResult, SessionProvider } from '../src/provider/types';
import { providerError } from '../src/types/errors';
import { metrics } from '../src/observability/metrics';
import {
  FakeSession,
  InMemorySessionProvider,
  MONZA_QUALI,
  MONZA_RACE,
  lap,
  samples,
  trace
} from './fixtures/session-fixtures';

function qualifyingSession(): FakeSession {
  return new FakeSession({
    identity: MONZA_QUALI,
    laps: [
      lap({ lap_number: 1, lap_time_s: 81.2 }),
      lap({ lap_number: 2, lap_time_s: 80.4 }),
      lap({ driver_id: '55', lap_number: 1, lap_time_s: 80.9 })
    ],
    drivers: [
      { driver_id: '16', abbreviation: 'LEC', full_name: 'Charles Leclerc', team_name: 'Ferrari' },
      { driver_id: '55', abbreviation: 'SAI', full_name: 'Carlos Sainz', team_name: 'Ferrari' }
    ],
    colors: { '16': '#DC0000', '55': '#DC0000' },
    telemetry: {
      '16#2': trace(2, samples([{ throttle: 100 }, { throttle: 80 }, { throttle: 100 }, { throttle: 100 }]))
    }
  });
}

function raceSession(): FakeSession {
  return new FakeSession({
    identity: MONZA_RACE,
    laps: [lap({ lap_number: 1, lap_time_s: 85 }), lap({ lap_number: 2, lap_time_s: 84 })]
  });
}

describe('AnalysisController', () => {
  let provider: InMemorySessionProvider;
  let controller: AnalysisController;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    metrics.reset();
    provider = new InMemorySessionProvider()
      .register(MONZA_QUALI, qualifyingSession())
      .register(MONZA_RACE, raceSession());
    controller = new AnalysisController(provider);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('loadSession', () => {
    it('installs a fresh context', async () => {
      const outcome = await controller.loadSession(MONZA_QUALI);

      expect(outcome.success).toBe(true);
      if (outcome.success) {
        expect(outcome.context.identity).toEqual(MONZA_QUALI);
        expect(outcome.context.driver_colors).toEqual({ '16': '#DC0000', '55': '#DC0000' });
        expect(controller.getContext()).toBe(outcome.context);
      }
    });

    it('gives every load its own id', async () => {
      const first = await controller.loadSession(MONZA_QUALI);
      const second = await controller.loadSession(MONZA_QUALI);

      expect(first.success && second.success).toBe(true);
      if (first.success && second.success) {
        expect(first.context.load_id).not.toBe(second.context.load_id);
      }
    });

    it('clears the live session when a load fails', async () => {
      await controller.loadSession(MONZA_QUALI);
      provider.fail(MONZA_RACE, providerError('fetch_failed', 'store unreachable'));

      const outcome = await controller.loadSession(MONZA_RACE);

      expect(outcome.success === false && outcome.error.code).toBe('fetch_failed');
      expect(controller.getContext()).toBeNull();
      expect(controller.selectDriver('16').success).toBe(false);
    });

    it('reports an unknown session', async () => {
      const outcome = await controller.loadSession({ year: 2019, circuit: 'Nowhere', session_type: 'Race' });
      expect(outcome.success === false && outcome.error.code).toBe('session_not_found');
    });

    it('refuses a session without laps', async () => {
      provider.register(MONZA_RACE, new FakeSession({ identity: MONZA_RACE, laps: [] }));

      const outcome = await controller.loadSession(MONZA_RACE);

      expect(outcome.success === false && outcome.error.code).toBe('empty_session');
      expect(controller.getContext()).toBeNull();
    });

    it('turns a throwing provider into fetch_failed', async () => {
      const throwing: SessionProvider = {
        loadSession: (): Promise<SessionLoadResult> => Promise.reject(new Error('socket hang up'))
      };
      const outcome = await new AnalysisController(throwing).loadSession(MONZA_QUALI);

      expect(outcome.success === false && outcome.error.code).toBe('fetch_failed');
    });

    it('keeps the live session when a load is aborted', async () => {
      await controller.loadSession(MONZA_QUALI);
      const live = controller.getContext();
      const abort = new AbortController();
      abort.abort();

      const outcome = await controller.loadSession(MONZA_RACE, abort.signal);

      expect(outcome.success === false && outcome.error.code).toBe('aborted');
      expect(live).not.toBeNull();
      expect(controller.getContext()).toBe(live);
      expect(provider.loadCount).toBe(1);
    });

    it('drops a load cancelled while the provider works', async () => {
      const release = provider.gate(MONZA_RACE);
      const abort = new AbortController();

      const pending = controller.loadSession(MONZA_RACE, abort.signal);
      abort.abort();
      release();

      const outcome = await pending;
      expect(outcome.success === false && outcome.error.code).toBe('aborted');
      expect(controller.getContext()).toBeNull();
    });

    it('lets only the latest load install its session', async () => {
      const release = provider.gate(MONZA_QUALI);

      const older = controller.loadSession(MONZA_QUALI);
      const newer = await controller.loadSession(MONZA_RACE);
      release();
      const superseded = await older;

      expect(newer.success).toBe(true);
      expect(superseded.success === false && superseded.error.code).toBe('superseded');
      expect(controller.getContext()?.identity).toEqual(MONZA_RACE);
    });

    it('does not let a load cancelled before it starts supersede one in flight', async () => {
      const release = provider.gate(MONZA_QUALI);
      const abort = new AbortController();
      abort.abort();

      const inFlight = controller.loadSession(MONZA_QUALI);
      const cancelled = await controller.loadSession(MONZA_RACE, abort.signal);
      release();
      const installed = await inFlight;

      expect(cancelled.success === false && cancelled.error.code).toBe('aborted');
      expect(installed.success).toBe(true);
      expect(controller.getContext()?.identity).toEqual(MONZA_QUALI);
    });

    it('counts loads by outcome', async () => {
      await controller.loadSession(MONZA_QUALI);
      await controller.loadSession({ year: 2019, circuit: 'Nowhere', session_type: 'Race' });

      const output = metrics.toPrometheus();
      expect(output).toContain('telemetry_insights_session_loads_total{outcome="loaded"} 1');
      expect(output).toContain('telemetry_insights_session_loads_total{outcome="session_not_found"} 1');
    });
  });

  describe('driver selection', () => {
    it('needs a loaded session', () => {
      const outcome = controller.selectDriver('16');
      expect(outcome.success === false && outcome.error.code).toBe('no_session_loaded');
    });

    it('returns the cached dataset for a repeated selection', async () => {
      await controller.loadSession(MONZA_QUALI);

      const first = controller.selectDriver('16');
      const second = controller.selectDriver('16');

      expect(first.success && second.success).toBe(true);
      if (first.success && second.success) {
        expect(second.value).toBe(first.value);
        expect(first.value.fastest_lap?.lap_number).toBe(2);
      }
      expect(controller.getSelectedDriverId()).toBe('16');
    });

    it('rejects a driver without laps and clears the selection', async () => {
      await controller.loadSession(MONZA_QUALI);
      controller.selectDriver('16');

      const outcome = controller.selectDriver('1');

      expect(outcome.success === false && outcome.error.code).toBe('unknown_driver');
      expect(controller.getSelectedDriverId()).toBeNull();
    });

    it('lists the roster with session colors', async () => {
      await controller.loadSession(MONZA_QUALI);
      const roster = controller.getRoster();

      expect(roster.success && roster.value.map(d => [d.abbreviation, d.color])).toEqual([
        ['LEC', '#DC0000'],
        ['SAI', '#DC0000']
      ]);
    });
  });

  describe('reports', () => {
    it('needs a selected driver', async () => {
      await controller.loadSession(MONZA_QUALI);
      const report = controller.getReport();
      expect(report.success === false && report.error.code).toBe('no_driver_selected');
    });

    it('builds the report of the selected driver', async () => {
      await controller.loadSession(MONZA_QUALI);
      controller.selectDriver('16');

      const report = controller.getReport();

      expect(report.success).toBe(true);
      if (report.success) {
        expect(report.value.session_key).toBe('2024:monza:Qualifying');
        expect(report.value.fastest_lap_number).toBe(2);
        expect(report.value.efficiency).toEqual({ status: 'ok', value: 75 });
        expect(report.value.coast).toEqual({
          status: 'ok',
          value: { coast_mask: [false, true, false, false], coast_percentage: 25 }
        });
      }
    });

    it('keeps lap aggregates when telemetry is missing', async () => {
      await controller.loadSession(MONZA_QUALI);
      controller.selectDriver('55');

      const report = controller.getReport();

      expect(report.success).toBe(true);
      if (report.success) {
        expect(report.value.efficiency_reported).toEqual({ score: 0, valid: false });
        expect(report.value.lap_time_evolution.status).toBe('ok');
      }
      expect(metrics.toJSON().unavailable_by_metric).toEqual({
        coast: 1,
        traction: 1,
        efficiency: 1,
        speed_trace: 1,
        position_trace: 1
      });
    });

    it('drops the selection on reload', async () => {
      await controller.loadSession(MONZA_QUALI);
      controller.selectDriver('16');
      await controller.loadSession(MONZA_QUALI);

      const report = controller.getReport();
      expect(report.success === false && report.error.code).toBe('no_driver_selected');
    });

    it('refuses a dataset from an earlier load', async () => {
      await controller.loadSession(MONZA_QUALI);
      const before = controller.selectDriver('16');
      await controller.loadSession(MONZA_QUALI);
      const after = controller.selectDriver('16');

      expect(before.success && after.success).toBe(true);
      if (before.success && after.success) {
        expect(after.value).not.toBe(before.value);
        const stale = controller.analyze(before.value);
        expect(stale.success === false && stale.error.code).toBe('stale_dataset');
        expect(controller.analyze(after.value).success).toBe(true);
      }
    });
  });
});
