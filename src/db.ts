import { Pool } from 'pg';

let pool: Pool | null = null;

export function db() {
  if (!pool) throw new Error('DB not initialized');
  return pool;
}

export async function initDb(url: string) {
  if (!url) throw new Error('DATABASE_URL is required');

  pool = new Pool({ connectionString: url });
  await pool.query('select 1');
  return pool;
}

export async function closeDb() {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}
