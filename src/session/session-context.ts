import { LoadedSession } from '../provider/types';
import { CircuitCorner, DriverInfo, SessionIdentity } from '../types/telemetry';
import { FALLBACK_DRIVER_COLORS } from '../config/analysis';
import { logError } from '../api/middleware/production-safety';

/**
 * Session-scoped constants, computed once per load and never updated.
 */
export interface SessionContext {
  load_id: string;
  identity: SessionIdentity;
  driver_colors: Readonly<Record<string, string>>;
  /** Ordered by distance along the lap */
  corners: readonly CircuitCorner[];
}

export interface RosterEntry {
  driver_id: string;
  abbreviation: string;
  full_name: string;
  team_name: string | null;
  color: string;
}

/**
 * Build the context for a freshly loaded session.
 *
 * Colors and corners are best-effort: if either cannot be read it becomes
 * empty and the build still succeeds.
 */
export function buildSessionContext(session: LoadedSession, loadId: string): SessionContext {
  let driverColors: Readonly<Record<string, string>> = {};
  try {
    driverColors = Object.freeze({ ...session.getDriverColors() });
  } catch (err) {
    logError(err, { context: 'driver_colors_unavailable', load_id: loadId });
  }

  let corners: readonly CircuitCorner[] = [];
  try {
    corners = Object.freeze(
      [...session.getCorners()].sort((a, b) => a.distance_m - b.distance_m)
    );
  } catch (err) {
    logError(err, { context: 'circuit_corners_unavailable', load_id: loadId });
  }

  return Object.freeze({
    load_id: loadId,
    identity: { ...session.identity },
    driver_colors: driverColors,
    corners
  });
}

/**
 * Session color by driver id, then by abbreviation, then the fallback
 * palette indexed by selection order.
 */
export function resolveDriverColor(
  context: SessionContext,
  driverId: string,
  abbreviation: string | null,
  selectionIndex: number
): string {
  const byId = context.driver_colors[driverId];
  if (byId) {
    return byId;
  }
  if (abbreviation) {
    const byAbbreviation = context.driver_colors[abbreviation];
    if (byAbbreviation) {
      return byAbbreviation;
    }
  }
  const index = Math.abs(Math.trunc(selectionIndex)) % FALLBACK_DRIVER_COLORS.length;
  return FALLBACK_DRIVER_COLORS[index];
}

/**
 * Drivers of the session with display details.
 *
 * Missing abbreviation falls back to the driver number, missing name to
 * "Driver <number>".
 */
export function buildDriverRoster(
  drivers: readonly DriverInfo[],
  context: SessionContext
): RosterEntry[] {
  return drivers.map((driver, index) => {
    const abbreviation = driver.abbreviation?.trim() || driver.driver_id;
    return {
      driver_id: driver.driver_id,
      abbreviation,
      full_name: driver.full_name?.trim() || `Driver ${driver.driver_id}`,
      team_name: driver.team_name,
      color: resolveDriverColor(context, driver.driver_id, abbreviation, index)
    };
  });
}
