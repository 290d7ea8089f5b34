import { SESSION_TYPES, SessionIdentity, SessionType } from '../types/telemetry';
import { FIRST_SUPPORTED_YEAR } from '../config/analysis';

export interface RequestError {
  error: 'validation_failed';
  reason: string;
}

/**
 * Validation result
 */
export type SessionValidationResult =
  | { valid: true; identity: SessionIdentity }
  | { valid: false; error: RequestError };

export type DriverValidationResult =
  | { valid: true; driver_id: string }
  | { valid: false; error: RequestError };

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0;

const SESSION_TYPE_SET: ReadonlySet<string> = new Set(SESSION_TYPES);

const isSessionType = (value: string): value is SessionType => SESSION_TYPE_SET.has(value);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function reject(reason: string): { valid: false; error: RequestError } {
  return { valid: false, error: { error: 'validation_failed', reason } };
}

/**
 * Validate a session load request body
 *
 * - year: integer between the first supported season and the current year
 * - circuit: non-empty
 * - session_type: one of the known session names
 */
export function validateSessionIdentity(body: unknown, now: Date = new Date()): SessionValidationResult {
  if (!isRecord(body)) {
    return reject('Request body must be a JSON object');
  }

  const { year, circuit, session_type: sessionType } = body;
  const maxYear = now.getFullYear();

  if (typeof year !== 'number' || !Number.isInteger(year)) {
    return reject('year must be an integer');
  }
  if (year < FIRST_SUPPORTED_YEAR || year > maxYear) {
    return reject(`year must be between ${FIRST_SUPPORTED_YEAR} and ${maxYear}`);
  }

  if (!isNonEmptyString(circuit)) {
    return reject('circuit is required (e.g. Monaco, Spain, Brazil)');
  }

  if (typeof sessionType !== 'string' || !isSessionType(sessionType)) {
    return reject(`session_type must be one of: ${SESSION_TYPES.join(', ')}`);
  }

  return {
    valid: true,
    identity: { year, circuit: circuit.trim(), session_type: sessionType }
  };
}

export function validateDriverSelection(body: unknown): DriverValidationResult {
  if (!isRecord(body)) {
    return reject('Request body must be a JSON object');
  }
  const driverId = body.driver_id;
  if (!isNonEmptyString(driverId)) {
    return reject('driver_id is required');
  }
  return { valid: true, driver_id: driverId.trim() };
}
