import { Pool } from 'pg';
import {
  CircuitCorner,
  DriverInfo,
  LapRecord,
  SessionIdentity,
  TelemetryTrace,
  sessionKey
} from '../types/telemetry';
import { providerError } from '../types/errors';
import { LoadedSession, SessionLoadResult, SessionProvider } from './types';
import {
  LapRow,
  TelemetryRow,
  mapLapRow,
  mapTelemetryRows,
  normalizeColor,
  telemetryKey
} from './row-mapping';
import { selectFastestLap } from '../session/driver-dataset';
import { logError } from '../api/middleware/production-safety';

type DriverRow = {
  driver_number: string;
  abbreviation: string | null;
  full_name: string | null;
  team_name: string | null;
  team_color: string | null;
};

type CornerRow = {
  corner_number: number;
  distance_m: number;
};

/**
 * Session held in memory after the store was read
 */
class ResidentSession implements LoadedSession {
  private readonly driverColors: Record<string, string>;

  constructor(
    public readonly identity: SessionIdentity,
    public readonly laps: readonly LapRecord[],
    public readonly drivers: readonly DriverInfo[],
    private readonly corners: readonly CircuitCorner[],
    colorRows: readonly DriverRow[],
    private readonly telemetry: ReadonlyMap<string, TelemetryTrace>
  ) {
    this.driverColors = {};
    for (const row of colorRows) {
      const color = normalizeColor(row.team_color);
      if (!color) {
        continue;
      }
      this.driverColors[row.driver_number] = color;
      if (row.abbreviation) {
        this.driverColors[row.abbreviation] = color;
      }
    }
  }

  getTelemetry(driverId: string, lapNumber: number): TelemetryTrace | null {
    return this.telemetry.get(telemetryKey(driverId, lapNumber)) ?? null;
  }

  getCorners(): readonly CircuitCorner[] {
    return this.corners;
  }

  getDriverColors(): Readonly<Record<string, string>> {
    if (Object.keys(this.driverColors).length === 0) {
      throw new Error(`No driver colors stored for ${sessionKey(this.identity)}`);
    }
    return this.driverColors;
  }
}

/**
 * PgSessionProvider - reads sessions from the PostgreSQL session store
 *
 * Loads the lap table, drivers, corners and the telemetry of every driver's
 * fastest lap, then serves them synchronously. Store failures come back as
 * provider errors, never as thrown exceptions.
 */
export class PgSessionProvider implements SessionProvider {
  constructor(private pool: Pool) {}

  async loadSession(identity: SessionIdentity, signal?: AbortSignal): Promise<SessionLoadResult> {
    const key = sessionKey(identity);

    try {
      const sessionResult = await this.pool.query<{ session_id: number }>(
        `SELECT session_id FROM telemetry_session
         WHERE season = $1 AND LOWER(circuit) = LOWER($2) AND session_type = $3`,
        [identity.year, identity.circuit.trim(), identity.session_type]
      );
      if (sessionResult.rows.length === 0) {
        return { success: false, error: providerError('session_not_found', `No stored session ${key}`) };
      }
      const sessionId = sessionResult.rows[0].session_id;

      if (signal?.aborted) {
        return { success: false, error: providerError('aborted', `Load of ${key} was cancelled`) };
      }

      const [lapResult, driverResult, cornerResult] = await Promise.all([
        this.pool.query<LapRow>(
          `SELECT driver_number, lap_number, lap_time_s, sector1_s, sector2_s, sector3_s,
                  compound, tyre_life, stint, position, is_quick_lap
           FROM session_lap
           WHERE session_id = $1
           ORDER BY row_index`,
          [sessionId]
        ),
        this.pool.query<DriverRow>(
          `SELECT driver_number, abbreviation, full_name, team_name, team_color
           FROM session_driver
           WHERE session_id = $1
           ORDER BY driver_number`,
          [sessionId]
        ),
        this.pool.query<CornerRow>(
          `SELECT corner_number, distance_m
           FROM circuit_corner
           WHERE session_id = $1
           ORDER BY distance_m, corner_number`,
          [sessionId]
        )
      ]);

      const laps = lapResult.rows.map(mapLapRow);
      if (laps.length === 0) {
        return { success: false, error: providerError('empty_session', `Session ${key} has no laps`) };
      }

      if (signal?.aborted) {
        return { success: false, error: providerError('aborted', `Load of ${key} was cancelled`) };
      }

      const telemetry = await this.loadFastestLapTelemetry(sessionId, laps);

      const drivers: DriverInfo[] = driverResult.rows.map(row => ({
        driver_id: row.driver_number,
        abbreviation: row.abbreviation,
        full_name: row.full_name,
        team_name: row.team_name
      }));

      const corners: CircuitCorner[] = cornerResult.rows.map(row => ({
        number: row.corner_number,
        distance_m: row.distance_m
      }));

      return {
        success: true,
        session: new ResidentSession(identity, laps, drivers, corners, driverResult.rows, telemetry)
      };
    } catch (err) {
      logError(err, { context: 'session_store_query_failed', session: key });
      return {
        success: false,
        error: providerError('fetch_failed', `Session store query failed for ${key}`)
      };
    }
  }

  private async loadFastestLapTelemetry(
    sessionId: number,
    laps: readonly LapRecord[]
  ): Promise<Map<string, TelemetryTrace>> {
    const lapsByDriver = new Map<string, LapRecord[]>();
    for (const lap of laps) {
      const driverLaps = lapsByDriver.get(lap.driver_id);
      if (driverLaps) {
        driverLaps.push(lap);
      } else {
        lapsByDriver.set(lap.driver_id, [lap]);
      }
    }

    const driverNumbers: string[] = [];
    const lapNumbers: number[] = [];
    for (const [driverId, driverLaps] of lapsByDriver) {
      const fastest = selectFastestLap(driverLaps);
      if (fastest) {
        driverNumbers.push(driverId);
        lapNumbers.push(fastest.lap_number);
      }
    }

    const traces = new Map<string, TelemetryTrace>();
    if (driverNumbers.length === 0) {
      return traces;
    }

    const result = await this.pool.query<TelemetryRow>(
      `SELECT t.driver_number, t.lap_number, t.distance_m, t.speed_kph, t.throttle,
              t.brake, t.rpm, t.gear, t.x, t.y
       FROM lap_telemetry t
       JOIN UNNEST($2::text[], $3::int[]) AS wanted(driver_number, lap_number)
         ON wanted.driver_number = t.driver_number
        AND wanted.lap_number = t.lap_number
       WHERE t.session_id = $1
       ORDER BY t.driver_number, t.lap_number, t.sample_index`,
      [sessionId, driverNumbers, lapNumbers]
    );

    const rowsByLap = new Map<string, TelemetryRow[]>();
    for (const row of result.rows) {
      const lapKey = telemetryKey(row.driver_number, row.lap_number);
      const rows = rowsByLap.get(lapKey);
      if (rows) {
        rows.push(row);
      } else {
        rowsByLap.set(lapKey, [row]);
      }
    }

    for (const [lapKey, rows] of rowsByLap) {
      traces.set(lapKey, mapTelemetryRows(rows[0].lap_number, rows));
    }
    return traces;
  }
}
