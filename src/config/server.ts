/**
 * Server configuration
 * centralized env-driven settings for the HTTP shell
 */

export interface ServerConfig {
  port: number;

  // request handling
  requestTimeoutMs: number;
  jsonBodyLimit: string;

  // rate limiting
  rateLimitWindowMs: number;
  rateLimitMax: number;
  sessionLoadRateLimitMax: number;

  // cors
  corsAllowedOrigins: string[];
}

function parseIntEnv(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (!val) {
    return defaultValue;
  }
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseListEnv(key: string): string[] {
  const val = process.env[key];
  if (!val) {
    return [];
  }
  return val.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

export function getServerConfig(): ServerConfig {
  return {
    port: parseIntEnv('PORT', 3000),

    requestTimeoutMs: parseIntEnv('REQUEST_TIMEOUT_MS', 30000),
    jsonBodyLimit: '16kb',

    // 100 requests per 15 minutes per IP
    rateLimitWindowMs: parseIntEnv('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000),
    rateLimitMax: parseIntEnv('RATE_LIMIT_MAX', 100),
    sessionLoadRateLimitMax: parseIntEnv('SESSION_LOAD_RATE_LIMIT_MAX', 20),

    corsAllowedOrigins: parseListEnv('CORS_ALLOWED_ORIGINS'),
  };
}
