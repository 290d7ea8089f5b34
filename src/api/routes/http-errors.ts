import { Response } from 'express';
import { ProviderError, SelectionError } from '../../types/errors';

const PROVIDER_STATUS: Record<ProviderError['code'], number> = {
  session_not_found: 404,
  empty_session: 422,
  fetch_failed: 502,
  aborted: 409,
  superseded: 409
};

const SELECTION_STATUS: Record<SelectionError['code'], number> = {
  no_session_loaded: 409,
  no_driver_selected: 409,
  unknown_driver: 404,
  stale_dataset: 409
};

export function sendProviderError(res: Response, error: ProviderError): Response {
  return res.status(PROVIDER_STATUS[error.code]).json({
    error: error.code,
    reason: error.reason
  });
}

export function sendSelectionError(res: Response, error: SelectionError): Response {
  return res.status(SELECTION_STATUS[error.code]).json({
    error: error.code,
    reason: error.reason
  });
}
