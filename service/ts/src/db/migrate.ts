import { readFileSync, readdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool, PoolClient } from 'pg';

import { loadConfig } from '../config.js';
import { getPool } from './client.js';

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'drizzle');
const MIGRATIONS_TABLE = '__league_migrations';

const ensureTableSQL = `
CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
  id SERIAL PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const config = loadConfig();
const RETRY_ATTEMPTS = config.migrate.retries;
const RETRY_DELAY_MS = config.migrate.retryDelayMs;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const connectWithRetry = async (pool: Pool): Promise<PoolClient> => {
  let lastError: unknown;
  for (let attempt = 1; attempt <= RETRY_ATTEMPTS; attempt += 1) {
    try {
      return await pool.connect();
    } catch (err) {
      lastError = err;
      if (attempt === RETRY_ATTEMPTS) break;
      const delay = RETRY_DELAY_MS * attempt;
      console.warn('db_connect_retry', {
        attempt,
        attempts: RETRY_ATTEMPTS,
        delayMs: delay,
        message: err instanceof Error ? err.message : String(err),
      });
      await sleep(delay);
    }
  }
  throw lastError instanceof Error ? lastError : new Error('Failed to acquire database connection');
};

async function main() {
  const pool = getPool(config.databaseUrl);
  const client = await connectWithRetry(pool);
  try {
    await client.query(ensureTableSQL);

    const applied = new Set<string>();
    const result = await client.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE} ORDER BY name`);
    for (const row of result.rows) applied.add(row.name);

    const migrations = readdirSync(MIGRATIONS_DIR)
      .filter((file) => file.endsWith('.sql'))
      .sort();

    for (const file of migrations) {
      if (applied.has(file)) continue;

      const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf8');
      console.log(`Applying migration ${file}`);
      await client.query(sql);
      await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [file]);
    }

    console.log('Migrations up to date');
  } finally {
    client.release();
    await pool.end().catch((err: unknown) => console.warn('db_pool_end_failed', err));
  }
}

main().catch((err) => {
  console.error('migrate_failed', err);
  process.exit(1);
});
