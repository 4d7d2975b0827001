import fs from 'node:fs';
import type pg from 'pg';

const MIGRATIONS_DIR = new URL('../../drizzle/', import.meta.url);

/**
 * Apply every `.sql` file under drizzle/ in name order. The files only use
 * `IF NOT EXISTS` DDL, so re-running them on boot is a no-op.
 */
export async function runMigrations(pool: pg.Pool): Promise<string[]> {
  const files = (await fs.promises.readdir(MIGRATIONS_DIR))
    .filter((f) => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const ddl = await fs.promises.readFile(new URL(file, MIGRATIONS_DIR), 'utf8');
    await pool.query(ddl);
  }
  return files;
}
