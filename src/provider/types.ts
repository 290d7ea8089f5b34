import {
  CircuitCorner,
  DriverInfo,
  LapRecord,
  SessionIdentity,
  TelemetryTrace
} from '../types/telemetry';
import { ProviderError } from '../types/errors';

/**
 * A session held in memory after a successful load.
 *
 * Every accessor is synchronous. `getCorners` and `getDriverColors` may throw
 * when the provider had nothing usable; callers degrade them to empty values.
 */
export interface LoadedSession {
  identity: SessionIdentity;
  laps: readonly LapRecord[];
  drivers: readonly DriverInfo[];
  getTelemetry(driverId: string, lapNumber: number): TelemetryTrace | null;
  getCorners(): readonly CircuitCorner[];
  getDriverColors(): Readonly<Record<string, string>>;
}

export type SessionLoadResult =
  | { success: true; session: LoadedSession }
  | { success: false; error: ProviderError };

/**
 * Boundary to whatever actually holds session data
 */
export interface SessionProvider {
  loadSession(identity: SessionIdentity, signal?: AbortSignal): Promise<SessionLoadResult>;
}
