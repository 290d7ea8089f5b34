import express, { Express, NextFunction, Request, Response } from 'express';
import { Pool } from 'pg';
import { AnalysisController } from './session/analysis-controller';
import { createRoutes } from './api/routes';
import { createMetricsRouter, metricsMiddleware } from './observability/metrics';
import {
  configureCORS,
  createRateLimiter,
  logError,
  requestDeadline,
  requestLogger
} from './api/middleware/production-safety';
import { ServerConfig } from './config/server';

export interface AppOptions {
  config: ServerConfig;
  pool?: Pool;
  /** Request logging; off in tests */
  logRequests?: boolean;
}

/**
 * Assemble the express app around one controller
 */
export function createApp(controller: AnalysisController, options: AppOptions): Express {
  const { config } = options;
  const app = express();

  // Metrics middleware (must be first to capture all requests)
  app.use(metricsMiddleware());

  if (options.logRequests !== false) {
    app.use(requestLogger);
  }

  app.use(requestDeadline(config.requestTimeoutMs));
  app.use(express.json({ limit: config.jsonBodyLimit }));
  app.use(configureCORS(config.corsAllowedOrigins));

  // Session loads hit the store, so they get a tighter budget
  app.post('/session', createRateLimiter('session loads', config.rateLimitWindowMs, config.sessionLoadRateLimitMax));
  app.use(['/session', '/analysis'], createRateLimiter('requests', config.rateLimitWindowMs, config.rateLimitMax));

  // Metrics endpoint (no rate limiting)
  app.use('/', createMetricsRouter());
  app.use('/', createRoutes(controller, options.pool));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not_found', reason: 'No such endpoint' });
  });

  // Malformed JSON bodies and anything a handler let through
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'validation_failed', reason: 'Request body is not valid JSON' });
      return;
    }
    logError(err, { context: 'unhandled_route_error' });
    res.status(500).json({ error: 'internal_error', reason: 'Unexpected server error' });
  });

  return app;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object'
    && err !== null
    && 'type' in err
    && err.type === 'entity.parse.failed';
}
