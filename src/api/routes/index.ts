import { Router, Request, Response } from 'express';
import { Pool } from 'pg';
import { AnalysisController } from '../../session/analysis-controller';
import { createHealthRoutes } from './health';
import { createSessionRoutes } from './session';
import { createAnalysisRoutes } from './analysis';

export function createRoutes(controller: AnalysisController, pool?: Pool): Router {
  const router = Router();

  router.use('/', createHealthRoutes(controller, pool));
  router.use('/', createSessionRoutes(controller));
  router.use('/', createAnalysisRoutes(controller));

  router.get('/', (_req: Request, res: Response) => {
    return res.status(200).json({
      name: 'Telemetry Insights API',
      description: 'Driver telemetry and lap analysis for one timed session',
      version: '1.0.0',
      endpoints: buildEndpointList()
    });
  });

  return router;
}

function buildEndpointList(): Record<string, string> {
  return {
    'POST /session': 'Load a session (year, circuit, session_type)',
    'GET /session': 'Currently loaded session',
    'GET /session/drivers': 'Drivers of the loaded session with display colors',
    'POST /session/driver': 'Select the driver to analyse',
    'GET /analysis': 'Behavioral and performance analysis of the selected driver',
    'GET /health': 'Health check',
    'GET /health/db': 'Session store connection health',
    'GET /metrics': 'Prometheus metrics',
    'GET /metrics/json': 'Metrics summary',
    'GET /': 'API information'
  };
}
