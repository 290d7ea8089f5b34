/**
 * Structured error outcomes
 *
 * Two kinds only:
 * - provider_error: the session could not be loaded; nothing downstream runs
 * - missing_data: one computation lacks its input; siblings still run
 *
 * Both are returned as values. Neither is thrown across a module boundary.
 */

export type ProviderErrorCode =
  | 'session_not_found'
  | 'fetch_failed'
  | 'empty_session'
  | 'aborted'
  | 'superseded';

export interface ProviderError {
  kind: 'provider_error';
  code: ProviderErrorCode;
  reason: string;
}

export type MissingInput =
  | 'telemetry'
  | 'throttle_channel'
  | 'brake_channel'
  | 'rpm_channel'
  | 'speed_channel'
  | 'samples'
  | 'lap_times'
  | 'sector_times'
  | 'quick_laps'
  | 'compounds'
  | 'tyre_life'
  | 'stints'
  | 'positions';

export interface MissingDataError {
  kind: 'missing_data';
  metric: string;
  missing: MissingInput;
  reason: string;
}

/**
 * Outcome of a single computation over a driver dataset
 */
export type Computation<T> =
  | { status: 'ok'; value: T }
  | { status: 'unavailable'; error: MissingDataError };

export function providerError(code: ProviderErrorCode, reason: string): ProviderError {
  return { kind: 'provider_error', code, reason };
}

export function available<T>(value: T): Computation<T> {
  return { status: 'ok', value };
}

export function unavailable<T>(metric: string, missing: MissingInput, reason: string): Computation<T> {
  return {
    status: 'unavailable',
    error: { kind: 'missing_data', metric, missing, reason }
  };
}

export function isAvailable<T>(computation: Computation<T>): computation is { status: 'ok'; value: T } {
  return computation.status === 'ok';
}

export type SelectionErrorCode =
  | 'no_session_loaded'
  | 'no_driver_selected'
  | 'unknown_driver'
  | 'stale_dataset';

/**
 * Controller-level refusal: the request does not fit the live session state
 */
export interface SelectionError {
  kind: 'selection_error';
  code: SelectionErrorCode;
  reason: string;
}

export function selectionError(code: SelectionErrorCode, reason: string): SelectionError {
  return { kind: 'selection_error', code, reason };
}
