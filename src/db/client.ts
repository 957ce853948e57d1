import pg from 'pg';

import { config } from '../config.js';

export type SqlRow = Record<string, unknown>;

/** The slice of a pg pool the repositories use. */
export interface SqlClient {
  query<R extends SqlRow>(text: string, values: readonly unknown[]): Promise<R[]>;
}

let pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
  if (!pool) {
    pool = new pg.Pool({
      connectionString: config.database.url,
      max: config.database.poolSize,
    });
    pool.on('error', (err) => {
      console.error('Idle pg client error:', err);
    });
  }
  return pool;
}

export function poolClient(p: pg.Pool = getPool()): SqlClient {
  return {
    async query<R extends SqlRow>(text: string, values: readonly unknown[]): Promise<R[]> {
      const res = await p.query<R>(text, [...values]);
      return res.rows;
    },
  };
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}
