import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { pathToFileURL } from 'url';
import type { Logger } from 'pino';
import { loadConfig } from '../../config.js';
import { createLogger } from '../logging/logger.js';
import { createPool, type ConnectionPool } from './pool.js';

export const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

export interface Migration {
  filename: string;
  version: number;
}

export async function getMigrations(dir: string = MIGRATIONS_DIR): Promise<Migration[]> {
  const files = await readdir(dir);
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

async function ensureMigrationsTable(pool: ConnectionPool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: ConnectionPool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(
  pool: ConnectionPool,
  dir: string,
  migration: Migration
): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply every pending migration in version order, each in its own
 * transaction. Returns the versions applied.
 */
export async function runMigrations(
  pool: ConnectionPool,
  logger: Logger,
  dir: string = MIGRATIONS_DIR
): Promise<number[]> {
  await ensureMigrationsTable(pool);
  const migrations = await getMigrations(dir);
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    logger.info('No pending migrations');
    return [];
  }

  logger.info({ count: pending.length }, 'Applying pending migrations');
  for (const migration of pending) {
    await applyMigration(pool, dir, migration);
    logger.info({ version: migration.version, file: migration.filename }, 'Applied migration');
  }

  return pending.map((m) => m.version);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ serviceName: config.serviceName, level: config.logLevel });
  const pool = createPool({ connectionString: config.databaseUrl, max: 1 }, logger);

  try {
    await runMigrations(pool, logger);
  } catch (error) {
    logger.error({ err: error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
