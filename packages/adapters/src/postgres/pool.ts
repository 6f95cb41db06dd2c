import pg from 'pg';
import type { Pool as PgPool, PoolClient } from 'pg';

const { Pool } = pg;

export type DbPool = PgPool;
export type DbClient = PoolClient;

export interface DbPoolOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectionTimeoutMillis: number;
}

export function createPool(options: DbPoolOptions): DbPool {
  const pool = new Pool({
    ...options,
    max: 10,
    idleTimeoutMillis: 30_000,
    application_name: 'poolwatch-api',
  });
  pool.on('error', (err) => {
    console.error('[pg-pool] unexpected error on idle client', err);
  });
  return pool;
}

export async function closePool(pool: DbPool): Promise<void> {
  await pool.end();
  console.log('[pg-pool] closed');
}

/** Check out a client for one operation; always released, including on error. */
export async function withClient<T>(
  pool: DbPool,
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}
