/**
 * Production Safety Middleware
 * Rate limiting, request deadlines, CORS, logging
 */

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

/**
 * Rate limiter for one group of endpoints
 */
export function createRateLimiter(scope: string, windowMs: number, max: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: 'rate_limit_exceeded',
      reason: `Too many ${scope} from this IP. Please try again later.`,
      details: {
        limit: max,
        window_minutes: Math.round(windowMs / 60000)
      }
    }
  });
}

/**
 * Request deadline.
 *
 * Answers 504 once the deadline passes and aborts the request's signal, so a
 * session load still waiting on the store is dropped. The signal also aborts
 * when the client disconnects before the response is written.
 */
export function requestDeadline(timeoutMs: number = 30000) {
  return (_req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    res.locals.abortSignal = controller.signal;

    const timeout = setTimeout(() => {
      controller.abort();
      if (!res.headersSent) {
        res.status(504).json({
          error: 'request_timeout',
          reason: `Request exceeded ${timeoutMs}ms timeout`,
          details: { timeout_ms: timeoutMs }
        });
      }
    }, timeoutMs);

    res.on('finish', () => {
      clearTimeout(timeout);
    });
    res.on('close', () => {
      clearTimeout(timeout);
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    next();
  };
}

/**
 * Signal installed by requestDeadline, if that middleware ran
 */
export function getRequestSignal(res: Response): AbortSignal | undefined {
  const signal: unknown = res.locals.abortSignal;
  return signal instanceof AbortSignal ? signal : undefined;
}

/**
 * CORS for the chart client
 * - Vite dev server plus CORS_ALLOWED_ORIGINS
 */
export function configureCORS(allowedOrigins: string[] = []) {
  const origins = new Set(['http://localhost:5173', ...allowedOrigins]);

  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;

    if (!origin) {
      res.header('Access-Control-Allow-Origin', '*');
    } else if (origins.has(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }

    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    res.header('Access-Control-Max-Age', '86400');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }

    next();
  };
}

/**
 * One structured line per finished request
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const requestId = uuidv4();

  res.setHeader('X-Request-ID', requestId);

  res.on('finish', () => {
    console.log(JSON.stringify({
      type: 'request',
      request_id: requestId,
      timestamp: new Date().toISOString(),
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Date.now() - start,
      ip: req.ip || req.socket.remoteAddress
    }));
  });

  next();
}

const SECRET_KEY = /password|token|secret|auth|connection_?string|database_?url/i;

/**
 * Mask credentials in anything headed for the logs
 */
export function maskSensitiveData(data: unknown): unknown {
  if (typeof data === 'string') {
    return data.replace(/postgres(ql)?:\/\/[^@\s]+@/gi, 'postgresql://***:***@');
  }
  if (Array.isArray(data)) {
    return data.map(item => maskSensitiveData(item));
  }
  if (typeof data === 'object' && data !== null) {
    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      masked[key] = SECRET_KEY.test(key) ? '***' : maskSensitiveData(value);
    }
    return masked;
  }
  return data;
}

/**
 * Safe error logger that masks secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>) {
  const errorData = {
    type: 'error',
    timestamp: new Date().toISOString(),
    error: error instanceof Error ? {
      name: error.name,
      message: maskSensitiveData(error.message),
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined
    } : maskSensitiveData(error),
    context: context ? maskSensitiveData(context) : undefined
  };

  console.error(JSON.stringify(errorData));
}
