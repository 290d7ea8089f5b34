import { Router, Request, Response } from 'express';
import { Pool } from 'pg';
import { getConnectionInfo } from '../../db/pool';
import { AnalysisController } from '../../session/analysis-controller';

export function createHealthRoutes(controller: AnalysisController, pool?: Pool): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    return res.status(200).json({
      status: 'healthy',
      session_loaded: controller.getContext() !== null,
      timestamp: new Date().toISOString()
    });
  });

  router.get('/health/db', async (_req: Request, res: Response) => {
    const connInfo = getConnectionInfo();
    if (!pool) {
      return res.status(503).json({
        connected: false,
        host: connInfo.host,
        ssl: connInfo.ssl,
        latency_ms: 0,
        error: 'No session store configured'
      });
    }

    try {
      const start = Date.now();
      await pool.query('SELECT 1');
      const latencyMs = Date.now() - start;

      return res.status(200).json({
        connected: true,
        host: connInfo.host,
        ssl: connInfo.ssl,
        latency_ms: latencyMs
      });
    } catch (err) {
      return res.status(503).json({
        connected: false,
        host: connInfo.host,
        ssl: connInfo.ssl,
        latency_ms: 0,
        error: String(err)
      });
    }
  });

  return router;
}
