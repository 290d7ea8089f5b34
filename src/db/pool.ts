import { Pool, PoolConfig } from 'pg';

/**
 * Parse database URL to extract host for logging (no secrets)
 */
function parseDbHost(connectionString: string): string {
  try {
    const url = new URL(connectionString);
    return url.hostname;
  } catch {
    return 'unknown';
  }
}

function requiresSSL(connectionString: string): boolean {
  return connectionString.includes('sslmode=require');
}

/**
 * Read DATABASE_URL; null when unset so callers decide how to fail
 */
export function getDatabaseUrl(): string | null {
  const url = process.env.DATABASE_URL;
  if (!url || url.trim().length === 0) {
    return null;
  }
  return url;
}

/**
 * Get connection info for logging (no secrets exposed)
 */
export function getConnectionInfo(): { host: string; ssl: boolean } {
  const url = getDatabaseUrl() ?? '';
  return {
    host: parseDbHost(url),
    ssl: requiresSSL(url)
  };
}

/**
 * Create PostgreSQL connection pool for the session store
 *
 * - Sessions are only read, so every connection is READ ONLY
 * - SSL when the URL asks for it
 */
export function createPool(connectionString: string, config?: PoolConfig): Pool {
  const useSSL = requiresSSL(connectionString);

  const poolConfig: PoolConfig = config || {
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: useSSL ? 10000 : 5000,
    ssl: useSSL ? { rejectUnauthorized: false } : undefined,
  };

  const pool = new Pool(poolConfig);

  pool.on('connect', (client) => {
    client.query('SET SESSION CHARACTERISTICS AS TRANSACTION READ ONLY').catch((err: unknown) => {
      console.error('Failed to set READ ONLY mode:', err);
    });
  });

  pool.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return pool;
}
