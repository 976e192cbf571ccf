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

interface InMemoryState {
  rows: Map<number, User>;
  // Like a database sequence, never rewound by a rollback
  lastId: number;
}

/**
 * Map-backed repository with the same uniqueness and version rules as
 * the users table. Used by tests and by USER_STORE=memory.
 */
export class InMemoryUserRepo implements UserRepository {
  constructor(
    private state: InMemoryState,
    private readOnly = false,
    private now: () => Date = () => new Date()
  ) {}

  async findAll(): Promise<User[]> {
    return [...this.state.rows.values()].map((user) => ({ ...user }));
  }

  async findById(id: number): Promise<User | null> {
    const user = this.state.rows.get(id);
    return user ? { ...user } : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const user = this.find((candidate) => candidate.username === username);
    return user ? { ...user } : null;
  }

  async existsById(id: number): Promise<boolean> {
    return this.state.rows.has(id);
  }

  async existsByUsername(username: string): Promise<boolean> {
    return this.find((candidate) => candidate.username === username) !== undefined;
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.find((candidate) => candidate.email === email) !== undefined;
  }

  async save(user: NewUser | User): Promise<User> {
    this.assertWritable();

    const ownId = isPersisted(user) ? user.id : undefined;
    if (this.find((other) => other.id !== ownId && other.username === user.username)) {
      throw new DuplicateResourceError(`Username already exists: ${user.username}`);
    }
    if (this.find((other) => other.id !== ownId && other.email === user.email)) {
      throw new DuplicateResourceError(`Email already exists: ${user.email}`);
    }

    const timestamp = this.now();

    if (!isPersisted(user)) {
      this.state.lastId += 1;
      const created: User = {
        id: this.state.lastId,
        username: user.username,
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
        createdAt: timestamp,
        updatedAt: timestamp,
        version: 0,
      };
      this.state.rows.set(created.id, created);
      return { ...created };
    }

    const stored = this.state.rows.get(user.id);
    if (!stored) {
      throw new NotFoundError(`User not found with id: ${user.id}`);
    }
    if (stored.version !== user.version) {
      throw new ConcurrencyError(user.version, stored.version);
    }

    const updated: User = {
      ...stored,
      username: user.username,
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      updatedAt: timestamp < stored.createdAt ? stored.createdAt : timestamp,
      version: stored.version + 1,
    };
    this.state.rows.set(updated.id, updated);
    return { ...updated };
  }

  async deleteById(id: number): Promise<void> {
    this.assertWritable();
    this.state.rows.delete(id);
  }

  private find(predicate: (user: User) => boolean): User | undefined {
    for (const user of this.state.rows.values()) {
      if (predicate(user)) {
        return user;
      }
    }
    return undefined;
  }

  private assertWritable(): void {
    if (this.readOnly) {
      throw new Error('cannot write in a read-only transaction');
    }
  }
}

/**
 * Runs transactions one at a time; a rejected transaction restores the
 * rows it started with.
 */
export class InMemoryUserStore implements UserStore {
  private state: InMemoryState = { rows: new Map(), lastId: 0 };
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private now: () => Date = () => new Date()) {}

  transaction<T>(
    work: (users: UserRepository) => Promise<T>,
    options: TransactionOptions = {}
  ): Promise<T> {
    const run = this.tail.then(() => this.runIsolated(work, options));
    // Callers observe failures through `run`; the queue only needs ordering
    this.tail = run.catch(() => undefined);
    return run;
  }

  async ping(): Promise<void> {
    // Nothing to reach
  }

  private async runIsolated<T>(
    work: (users: UserRepository) => Promise<T>,
    options: TransactionOptions
  ): Promise<T> {
    const snapshot = new Map(this.state.rows);
    try {
      return await work(new InMemoryUserRepo(this.state, options.readOnly ?? false, this.now));
    } catch (error) {
      this.state.rows = snapshot;
      throw error;
    }
  }
}
