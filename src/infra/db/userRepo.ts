import { isPersisted, type NewUser, type User } from '../../domain/users/user.js';
import {
  ConcurrencyError,
  DuplicateResourceError,
  NotFoundError,
} from '../../application/errors.js';
import type {
  TransactionOptions,
  UserRepository,
  UserStore,
} from '../../application/users/userRepository.js';
import type { ConnectionPool, Queryable } from './pool.js';

interface UserRow {
  id: string;
  username: string;
  email: string;
  first_name: string | null;
  last_name: string | null;
  created_at: Date;
  updated_at: Date;
  version: string;
}

const USER_COLUMNS =
  'id, username, email, first_name, last_name, created_at, updated_at, version';

// Postgres unique_violation
const UNIQUE_VIOLATION = '23505';

function toUser(row: UserRow): User {
  return {
    id: Number(row.id),
    username: row.username,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    version: Number(row.version),
  };
}

function isUniqueViolation(error: unknown): error is { code: string; constraint?: unknown } {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

/**
 * Map a unique constraint violation to the error the service's own
 * pre-checks raise, so callers see one contract for both paths.
 */
function toDuplicateError(
  error: { constraint?: unknown },
  user: NewUser
): DuplicateResourceError {
  if (error.constraint === 'users_username_key') {
    return new DuplicateResourceError(`Username already exists: ${user.username}`);
  }
  if (error.constraint === 'users_email_key') {
    return new DuplicateResourceError(`Email already exists: ${user.email}`);
  }
  return new DuplicateResourceError('User already exists');
}

export class PgUserRepo implements UserRepository {
  constructor(private db: Queryable) {}

  async findAll(): Promise<User[]> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users ORDER BY id`
    );
    return result.rows.map(toUser);
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async existsById(id: number): Promise<boolean> {
    return this.exists('SELECT EXISTS (SELECT 1 FROM users WHERE id = $1) AS exists', [id]);
  }

  async existsByUsername(username: string): Promise<boolean> {
    return this.exists('SELECT EXISTS (SELECT 1 FROM users WHERE username = $1) AS exists', [
      username,
    ]);
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.exists('SELECT EXISTS (SELECT 1 FROM users WHERE email = $1) AS exists', [
      email,
    ]);
  }

  async save(user: NewUser | User): Promise<User> {
    try {
      return isPersisted(user) ? await this.update(user) : await this.insert(user);
    } catch (error: unknown) {
      // Another writer took the value between our pre-check and this write
      if (isUniqueViolation(error)) {
        throw toDuplicateError(error, user);
      }
      throw error;
    }
  }

  async deleteById(id: number): Promise<void> {
    await this.db.query('DELETE FROM users WHERE id = $1', [id]);
  }

  private async insert(user: NewUser): Promise<User> {
    const result = await this.db.query<UserRow>(
      `INSERT INTO users (username, email, first_name, last_name)
       VALUES ($1, $2, $3, $4)
       RETURNING ${USER_COLUMNS}`,
      [user.username, user.email, user.firstName, user.lastName]
    );
    return toUser(result.rows[0]);
  }

  /**
   * Optimistic update: only succeeds while the stored version still
   * equals the version the caller read.
   */
  private async update(user: User): Promise<User> {
    const result = await this.db.query<UserRow>(
      `UPDATE users
       SET username = $2, email = $3, first_name = $4, last_name = $5,
           updated_at = NOW(), version = version + 1
       WHERE id = $1 AND version = $6
       RETURNING ${USER_COLUMNS}`,
      [user.id, user.username, user.email, user.firstName, user.lastName, user.version]
    );

    const row = result.rows[0];
    if (row) {
      return toUser(row);
    }

    const current = await this.db.query<{ version: string }>(
      'SELECT version FROM users WHERE id = $1',
      [user.id]
    );
    const stored = current.rows[0];
    if (!stored) {
      throw new NotFoundError(`User not found with id: ${user.id}`);
    }
    throw new ConcurrencyError(user.version, Number(stored.version));
  }

  private async exists(sql: string, values: unknown[]): Promise<boolean> {
    const result = await this.db.query<{ exists: boolean }>(sql, values);
    return result.rows[0]?.exists === true;
  }
}

export class PgUserStore implements UserStore {
  constructor(private pool: ConnectionPool) {}

  async transaction<T>(
    work: (users: UserRepository) => Promise<T>,
    options: TransactionOptions = {}
  ): Promise<T> {
    const client = await this.pool.connect();
    let releaseError: Error | undefined;

    try {
      await client.query(options.readOnly ? 'BEGIN READ ONLY' : 'BEGIN');
      const result = await work(new PgUserRepo(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError: unknown) {
        // A client that cannot roll back is discarded by the pool
        releaseError =
          rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      throw error;
    } finally {
      client.release(releaseError);
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
