import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import type pg from 'pg';
import type * as schema from './schema/index.js';
import { createPgDb } from './pg.js';

export type Db = NodePgDatabase<typeof schema>;

let _db: Db | null = null;
let _pool: pg.Pool | null = null;

export function getDb(): Db {
  if (_db) return _db;
  const { db, pool } = createPgDb();
  _db = db;
  _pool = pool;
  return _db;
}

export function pool(): pg.Pool {
  if (!_pool) throw new Error('Database not initialized. Call getDb() first.');
  return _pool;
}

export function db(): Db {
  if (!_db) throw new Error('Database not initialized. Call getDb() first.');
  return _db;
}

export async function closeDb(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
    _db = null;
  }
}
