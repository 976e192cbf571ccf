import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import request from 'supertest';
import type pg from 'pg';
import { createPool } from '../pool.js';
import { runMigrations } from '../migrate.js';
import { PgUserStore } from '../userRepo.js';
import { UserService } from '../../../application/users/userService.js';
import { ConcurrencyError, DuplicateResourceError } from '../../../application/errors.js';
import { createApp } from '../../http/app.js';
import { createLogger } from '../../logging/logger.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('Postgres user store', () => {
  const logger = createLogger({ serviceName: 'user-service-int', level: 'silent' });
  let pool: pg.Pool;
  let store: PgUserStore;
  let service: UserService;

  beforeAll(async () => {
    pool = createPool({ connectionString: process.env.DATABASE_URL, max: 5 }, logger);
    await runMigrations(pool, logger);
    store = new PgUserStore(pool);
    service = new UserService(store, logger);
  });

  afterAll(async () => {
    await pool.query('DELETE FROM users');
    await pool.end();
  });

  beforeEach(async () => {
    await pool.query('DELETE FROM users');
  });

  it('creates, reads, updates and deletes a user', async () => {
    const created = await service.createUser({
      username: 'johndoe',
      email: 'john@example.com',
      firstName: 'John',
      lastName: 'Doe',
    });
    expect(created.id).toBeGreaterThan(0);

    const updated = await service.updateUser(created.id, {
      username: 'johndoe',
      email: 'john@example.com',
      firstName: 'John',
      lastName: 'Smith',
    });
    expect(updated.lastName).toBe('Smith');
    expect(updated.updatedAt.getTime()).toBeGreaterThanOrEqual(updated.createdAt.getTime());

    const version = await pool.query<{ version: string }>(
      'SELECT version FROM users WHERE id = $1',
      [created.id]
    );
    expect(version.rows[0].version).toBe('1');

    await service.deleteUser(created.id);
    await expect(service.getUser(created.id)).rejects.toThrow('User not found with id:');
  });

  it('lets exactly one of two racing creates win', async () => {
    const results = await Promise.allSettled([
      service.createUser({ username: 'racer', email: 'racer-a@example.com' }),
      service.createUser({ username: 'racer', email: 'racer-b@example.com' }),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter(
      (r): r is PromiseRejectedResult => r.status === 'rejected'
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(DuplicateResourceError);
  });

  it('rejects a save carrying a stale version', async () => {
    const created = await service.createUser({ username: 'stale', email: 'stale@example.com' });
    const read = await store.transaction((users) => users.findById(created.id));
    if (!read) throw new Error('user vanished');

    await store.transaction((users) => users.save({ ...read, firstName: 'First' }));

    await expect(
      store.transaction((users) => users.save({ ...read, firstName: 'Second' }))
    ).rejects.toBeInstanceOf(ConcurrencyError);
  });

  it('serves the HTTP scenarios against Postgres', async () => {
    const app = createApp({ store, logger, rateLimit: { windowMs: 60_000, max: 1000 } });

    const created = await request(app)
      .post('/api/v1/users')
      .send({ username: 'johndoe', email: 'john@example.com', firstName: 'John', lastName: 'Doe' });
    expect(created.status).toBe(201);

    const duplicate = await request(app)
      .post('/api/v1/users')
      .send({ username: 'johndoe', email: 'other@example.com' });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body.message).toContain('Username already exists');

    const ready = await request(app).get('/readyz');
    expect(ready.status).toBe(200);
  });
});
