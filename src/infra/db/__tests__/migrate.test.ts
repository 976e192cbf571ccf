import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { getMigrations, runMigrations, MIGRATIONS_DIR } from '../migrate.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger({ serviceName: 'migrate-test', level: 'silent' });

describe('migrations', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'user-service-migrations-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists .sql files in version order', async () => {
    await writeFile(join(dir, '010_add_index.sql'), 'SELECT 10;');
    await writeFile(join(dir, '002_add_column.sql'), 'SELECT 2;');
    await writeFile(join(dir, 'README.md'), 'notes');

    expect(await getMigrations(dir)).toEqual([
      { filename: '002_add_column.sql', version: 2 },
      { filename: '010_add_index.sql', version: 10 },
    ]);
  });

  it('rejects a file without a numeric prefix', async () => {
    await writeFile(join(dir, 'create_users.sql'), 'SELECT 1;');

    await expect(getMigrations(dir)).rejects.toThrow(
      'Invalid migration filename: create_users.sql'
    );
  });

  it('ships the users table migration', async () => {
    const migrations = await getMigrations(MIGRATIONS_DIR);

    expect(migrations[0]).toEqual({ filename: '001_create_users.sql', version: 1 });
  });

  it('applies only pending migrations, each in a transaction', async () => {
    await writeFile(join(dir, '001_first.sql'), 'SELECT 1;');
    await writeFile(join(dir, '002_second.sql'), 'SELECT 2;');

    const client = {
      query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
      release: vi.fn(),
    };
    const pool = {
      connect: vi.fn().mockResolvedValue(client),
      query: vi
        .fn()
        .mockResolvedValueOnce({ rows: [], rowCount: 0 })
        .mockResolvedValueOnce({ rows: [{ version: 1 }], rowCount: 1 }),
    };

    const applied = await runMigrations(pool, logger, dir);

    expect(applied).toEqual([2]);
    expect(client.query.mock.calls).toEqual([
      ['BEGIN'],
      ['SELECT 2;'],
      ['INSERT INTO schema_migrations (version) VALUES ($1)', [2]],
      ['COMMIT'],
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back a failing migration', async () => {
    await writeFile(join(dir, '001_broken.sql'), 'SELEC 1;');

    const client = {
      query: vi
        .fn()
        .mockResolvedValueOnce({ rows: [], rowCount: 0 })
        .mockRejectedValueOnce(new Error('syntax error at or near "SELEC"'))
        .mockResolvedValue({ rows: [], rowCount: 0 }),
      release: vi.fn(),
    };
    const pool = {
      connect: vi.fn().mockResolvedValue(client),
      query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
    };

    await expect(runMigrations(pool, logger, dir)).rejects.toThrow('syntax error');
    expect(client.query.mock.calls.map((call) => call[0])).toEqual([
      'BEGIN',
      'SELEC 1;',
      'ROLLBACK',
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});
