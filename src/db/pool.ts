// src/db/pool.ts
// What: Postgres connection pool and the narrow client interfaces the stores depend on.
// How: createPool() builds a pg Pool from DATABASE_URL with a small pool size, switching to TLS for managed
//      (Supabase) instances. SqlPool is the subset of pg.Pool the code uses, so tests can pass a fake.

import { Pool, QueryResult } from 'pg';
import { AppConfig } from '../config/schema.js';

// Rows come back untyped; callers assign them to their row interfaces.
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<QueryResult>;
}

export interface PooledClient extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<PooledClient>;
  end(): Promise<void>;
}

export function createPool(config: Pick<AppConfig, 'DATABASE_URL' | 'DATABASE_SSL'>): Pool {
  return new Pool({
    connectionString: config.DATABASE_URL,
    max: 5,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    // Managed instances require TLS; their certificate chain is not verified.
    ssl: config.DATABASE_SSL ? { rejectUnauthorized: false } : undefined,
  });
}
