import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import dotenv from 'dotenv';
import { createPool, rollbackSafely, type DbPool } from './pool.js';
import { logger } from '../logger.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

async function getMigrations(): Promise<Migration[]> {
  const files = await readdir(MIGRATIONS_DIR);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: DbPool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: DbPool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: DbPool, migration: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
    logger.info({ version: migration.version, file: migration.filename }, 'Applied migration');
  } catch (error) {
    await rollbackSafely(client);
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply every pending migration in version order. Returns the applied versions.
 */
export async function runMigrations(pool: DbPool): Promise<number[]> {
  await ensureMigrationsTable(pool);
  const migrations = await getMigrations();
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    logger.info('No pending migrations');
    return [];
  }

  logger.info({ count: pending.length }, 'Found pending migrations');
  for (const migration of pending) {
    await applyMigration(pool, migration);
  }
  return pending.map((m) => m.version);
}

async function main(): Promise<void> {
  dotenv.config();
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new Error('DATABASE_URL environment variable is required to run migrations');
  }

  const pool = createPool(url);
  try {
    await runMigrations(pool);
    logger.info('All migrations applied successfully');
  } finally {
    await pool.end();
  }
}

if (process.argv[1]?.endsWith('migrate.ts') || process.argv[1]?.endsWith('migrate.js')) {
  main().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Migration failed');
    process.exit(1);
  });
}
