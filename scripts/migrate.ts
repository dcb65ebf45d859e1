import { readdir, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import pg from 'pg';
import { createJsonLogger, errorMessage } from '@fmops/common';
import { loadMigrationEnv } from '@fmops/config';

const migrationsDir = fileURLToPath(new URL('../packages/db/migrations/', import.meta.url));
const env = loadMigrationEnv();
const logger = createJsonLogger({ level: env.LOG_LEVEL });

const run = async () => {
  const client = new pg.Client({ connectionString: env.DATABASE_URL_ROOT });
  await client.connect();
  try {
    await client.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (name text PRIMARY KEY, applied_at timestamptz NOT NULL DEFAULT now())`
    );
    const applied = await client.query('SELECT name FROM schema_migrations');
    const done = new Set(applied.rows.map((row) => String(row.name)));
    const files = (await readdir(migrationsDir)).filter((file) => file.endsWith('.sql')).sort();

    for (const file of files) {
      if (done.has(file)) {
        continue;
      }
      const sql = await readFile(`${migrationsDir}${file}`, 'utf8');
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
      logger.info('migration_applied', { name: file });
    }
  } finally {
    await client.end();
  }
};

run().catch((error) => {
  logger.error('migration_failed', { error: errorMessage(error) });
  process.exitCode = 1;
});
