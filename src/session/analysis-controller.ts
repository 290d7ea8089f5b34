import { v4 as uuidv4 } from 'uuid';
import { LoadedSession, SessionLoadResult, SessionProvider } from '../provider/types';
import { SessionIdentity, sessionKey } from '../types/telemetry';
import {
  ProviderError,
  SelectionError,
  providerError,
  selectionError
} from '../types/errors';
import { DriverReport } from '../types/results';
import { SessionContext, RosterEntry, buildSessionContext, buildDriverRoster } from './session-context';
import { DriverDataset, assembleDriverDataset } from './driver-dataset';
import { SelectionCache } from './selection-cache';
import { buildDriverReport, listUnavailable } from '../analysis/driver-report';
import { metrics } from '../observability/metrics';
import { logError } from '../api/middleware/production-safety';

interface LiveSession {
  session: LoadedSession;
  context: SessionContext;
}

export type SessionLoadOutcome =
  | { success: true; context: SessionContext }
  | { success: false; error: ProviderError };

export type SelectionOutcome<T> =
  | { success: true; value: T }
  | { success: false; error: SelectionError };

/**
 * AnalysisController - owns the live session and driver selection
 *
 * - One SessionContext at a time, replaced outright on every load
 * - One DriverDataset at a time, through a single-entry SelectionCache
 * - Only the most recently started load may install its session
 */
export class AnalysisController {
  private live: LiveSession | null = null;
  private selectedDriverId: string | null = null;
  private readonly cache = new SelectionCache();
  private loadSequence = 0;

  constructor(private provider: SessionProvider) {}

  async loadSession(identity: SessionIdentity, signal?: AbortSignal): Promise<SessionLoadOutcome> {
    const key = sessionKey(identity);

    // Cancelled before it started: must not take a ticket from an in-flight load
    if (signal?.aborted) {
      return this.rejectLoad(providerError('aborted', `Load of ${key} was cancelled`), false);
    }

    const ticket = ++this.loadSequence;
    const start = Date.now();

    let result: SessionLoadResult;
    try {
      result = await this.provider.loadSession(identity, signal);
    } catch (err) {
      logError(err, { context: 'session_provider_threw', session: key });
      result = {
        success: false,
        error: providerError('fetch_failed', `Session provider failed for ${key}`)
      };
    }

    metrics.recordSessionLoadLatency(Date.now() - start);

    if (signal?.aborted) {
      return this.rejectLoad(providerError('aborted', `Load of ${key} was cancelled`), false);
    }
    if (ticket !== this.loadSequence) {
      return this.rejectLoad(providerError('superseded', `A newer load replaced ${key}`), false);
    }
    if (!result.success) {
      return this.rejectLoad(result.error, true);
    }
    if (result.session.laps.length === 0) {
      return this.rejectLoad(providerError('empty_session', `Session ${key} has no laps`), true);
    }

    const context = buildSessionContext(result.session, uuidv4());
    this.live = { session: result.session, context };
    this.selectedDriverId = null;
    this.cache.invalidate();
    metrics.incrementSessionLoad('loaded');

    console.log(JSON.stringify({
      type: 'session_loaded',
      timestamp: new Date().toISOString(),
      session: key,
      load_id: context.load_id,
      laps: result.session.laps.length,
      drivers: result.session.drivers.length,
      corners: context.corners.length
    }));

    return { success: true, context };
  }

  /**
   * Failed loads leave "no session loaded"; cancelled or superseded loads
   * leave whatever is live untouched.
   */
  private rejectLoad(error: ProviderError, clearLive: boolean): SessionLoadOutcome {
    metrics.incrementSessionLoad(error.code);
    if (clearLive) {
      this.live = null;
      this.selectedDriverId = null;
      this.cache.invalidate();
    }
    return { success: false, error };
  }

  getContext(): SessionContext | null {
    return this.live?.context ?? null;
  }

  getRoster(): SelectionOutcome<RosterEntry[]> {
    if (!this.live) {
      return { success: false, error: selectionError('no_session_loaded', 'No session loaded') };
    }
    return { success: true, value: buildDriverRoster(this.live.session.drivers, this.live.context) };
  }

  selectDriver(driverId: string): SelectionOutcome<DriverDataset> {
    if (!this.live) {
      return { success: false, error: selectionError('no_session_loaded', 'No session loaded') };
    }

    const live = this.live;
    const dataset = this.cache.getOrAssemble(
      { load_id: live.context.load_id, driver_id: driverId },
      () => assembleDriverDataset(live.session, driverId, live.context)
    );

    if (!dataset) {
      this.selectedDriverId = null;
      return {
        success: false,
        error: selectionError('unknown_driver', `Driver ${driverId} has no laps in this session`)
      };
    }

    this.selectedDriverId = driverId;
    return { success: true, value: dataset };
  }

  getSelectedDriverId(): string | null {
    return this.selectedDriverId;
  }

  /**
   * Report for the live selection
   */
  getReport(): SelectionOutcome<DriverReport> {
    if (!this.live) {
      return { success: false, error: selectionError('no_session_loaded', 'No session loaded') };
    }
    if (!this.selectedDriverId) {
      return { success: false, error: selectionError('no_driver_selected', 'No driver selected') };
    }

    const selection = this.selectDriver(this.selectedDriverId);
    if (!selection.success) {
      return selection;
    }
    return this.analyze(selection.value);
  }

  /**
   * Report for a given dataset, refused unless it belongs to the live load
   */
  analyze(dataset: DriverDataset): SelectionOutcome<DriverReport> {
    if (!this.live) {
      return { success: false, error: selectionError('no_session_loaded', 'No session loaded') };
    }
    if (dataset.context !== this.live.context) {
      return {
        success: false,
        error: selectionError(
          'stale_dataset',
          `Dataset for ${dataset.driver_id} belongs to load ${dataset.context.load_id}, live load is ${this.live.context.load_id}`
        )
      };
    }

    const report = buildDriverReport(dataset);
    for (const metric of listUnavailable(report)) {
      metrics.incrementUnavailable(metric);
    }
    return { success: true, value: report };
  }
}
