import { Router, Request, Response } from 'express';
import { AnalysisController } from '../../session/analysis-controller';
import { sessionKey } from '../../types/telemetry';
import { validateDriverSelection, validateSessionIdentity } from '../../validation/session-validator';
import { getRequestSignal, logError } from '../middleware/production-safety';
import { sendProviderError, sendSelectionError } from './http-errors';

export function createSessionRoutes(controller: AnalysisController): Router {
  const router = Router();

  router.post('/session', async (req: Request, res: Response) => {
    const validation = validateSessionIdentity(req.body);
    if (!validation.valid) {
      return res.status(400).json(validation.error);
    }

    try {
      // Aborted on deadline or client disconnect
      const outcome = await controller.loadSession(validation.identity, getRequestSignal(res));
      if (res.headersSent) {
        return res;
      }
      if (!outcome.success) {
        return sendProviderError(res, outcome.error);
      }

      const roster = controller.getRoster();
      return res.status(200).json({
        session_key: sessionKey(outcome.context.identity),
        load_id: outcome.context.load_id,
        identity: outcome.context.identity,
        corner_count: outcome.context.corners.length,
        drivers: roster.success ? roster.value : []
      });
    } catch (err) {
      logError(err, { context: 'session_load_route', session: sessionKey(validation.identity) });
      return res.status(500).json({ error: 'internal_error', reason: 'Unexpected error while loading session' });
    }
  });

  router.get('/session', (_req: Request, res: Response) => {
    const context = controller.getContext();
    if (!context) {
      return res.status(200).json({ loaded: false });
    }
    return res.status(200).json({
      loaded: true,
      session_key: sessionKey(context.identity),
      load_id: context.load_id,
      identity: context.identity,
      corners: context.corners,
      selected_driver_id: controller.getSelectedDriverId()
    });
  });

  router.get('/session/drivers', (_req: Request, res: Response) => {
    const roster = controller.getRoster();
    if (!roster.success) {
      return sendSelectionError(res, roster.error);
    }
    return res.status(200).json({ drivers: roster.value });
  });

  router.post('/session/driver', (req: Request, res: Response) => {
    const validation = validateDriverSelection(req.body);
    if (!validation.valid) {
      return res.status(400).json(validation.error);
    }

    const selection = controller.selectDriver(validation.driver_id);
    if (!selection.success) {
      return sendSelectionError(res, selection.error);
    }

    const dataset = selection.value;
    return res.status(200).json({
      driver_id: dataset.driver_id,
      abbreviation: dataset.abbreviation,
      color: dataset.color,
      lap_count: dataset.laps.length,
      quick_lap_count: dataset.quick_laps.length,
      fastest_lap_number: dataset.fastest_lap?.lap_number ?? null,
      has_telemetry: dataset.fastest_lap_telemetry !== null
    });
  });

  return router;
}
