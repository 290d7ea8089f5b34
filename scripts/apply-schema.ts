/**
 * Apply the session store schema
 *
 * Creates the tables PgSessionProvider reads. Idempotent (IF NOT EXISTS).
 *
 * Usage: npm run db:schema
 */

import { Pool } from 'pg';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';

dotenv.config();

const SCHEMA_PATH = path.resolve(__dirname, '..', 'sql', 'session-store.sql');

async function run(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL is not set');
  }

  const schema = fs.readFileSync(SCHEMA_PATH, 'utf8');
  const pool = new Pool({ connectionString: databaseUrl });
  const client = await pool.connect();

  try {
    console.log('=== SESSION STORE SCHEMA ===');
    await client.query('BEGIN');
    await client.query(schema);
    await client.query('COMMIT');
    console.log(`OK Applied ${path.basename(SCHEMA_PATH)}`);
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`FAIL_CLOSED: ${message}`);
  process.exitCode = 1;
});
