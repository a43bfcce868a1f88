// scripts/run-migrations.ts
// What: Simple migration runner to apply SQL files in src/db/migrations.
// How: Validates the database settings (DATABASE_URL, Supabase pair), discovers *.sql files, sorts by
//      filename, and executes each file's SQL using a single pooled connection. Each migration file contains
//      its own BEGIN/COMMIT and IF NOT EXISTS for idempotency. Logs applied files and exits non-zero on error.

import 'dotenv/config';
import { promises as fs } from 'fs';
import path from 'path';
import { DatabaseError } from 'pg';
import { parseDatabaseConfig } from '../src/config/schema.js';
import { createPool } from '../src/db/pool.js';
import logger from '../src/logging.js';

async function main(): Promise<void> {
  const migrationsDir = path.resolve(process.cwd(), 'src/db/migrations');
  const entries = await fs.readdir(migrationsDir, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile() && e.name.endsWith('.sql'))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));

  if (files.length === 0) {
    logger.info({ dir: migrationsDir }, 'No migrations found');
    return;
  }

  // Connection settings only; the embedding provider and server settings play no part here.
  const config = parseDatabaseConfig(process.env);

  // Print effective DB target without exposing the password
  try {
    const u = new URL(config.DATABASE_URL);
    logger.info(
      {
        user: u.username,
        host: u.hostname,
        port: u.port || '5432',
        database: u.pathname.replace(/^\//, ''),
        ssl: config.DATABASE_SSL,
      },
      'Effective DATABASE_URL target',
    );
  } catch (err) {
    logger.warn({ err }, 'Could not parse DATABASE_URL');
  }

  const pool = createPool(config);
  try {
    const client = await pool.connect();
    logger.info('Connected to database');
    try {
      for (const file of files) {
        const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
        logger.info({ file }, 'Applying migration');
        await client.query(sql);
        logger.info({ file }, 'Applied migration');
      }
    } finally {
      client.release();
    }
  } finally {
    await pool.end();
  }

  logger.info({ count: files.length }, 'Migrations complete');
}

main().catch((err: unknown) => {
  const pgFields =
    err instanceof DatabaseError
      ? { code: err.code, severity: err.severity, detail: err.detail, hint: err.hint, routine: err.routine }
      : {};
  logger.error({ err, ...pgFields }, 'Migration failed');
  process.exitCode = 1;
});
