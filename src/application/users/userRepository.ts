import type { NewUser, User } from '../../domain/users/user.js';

/**
 * Data access for users. Implementations must enforce username/email
 * uniqueness (throwing DuplicateResourceError) and reject a save whose
 * version is stale (throwing ConcurrencyError).
 */
export interface UserRepository {
  findAll(): Promise<User[]>;
  findById(id: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  existsById(id: number): Promise<boolean>;
  existsByUsername(username: string): Promise<boolean>;
  existsByEmail(email: string): Promise<boolean>;
  /**
   * Insert a NewUser, or update a persisted User whose `version` must
   * still match the stored row. Returns the row as stored.
   */
  save(user: NewUser | User): Promise<User>;
  deleteById(id: number): Promise<void>;
}

export interface TransactionOptions {
  readOnly?: boolean;
}

/**
 * Opens a transaction and hands the work a repository bound to it.
 * Commits when the work resolves, rolls back when it rejects.
 */
export interface UserStore {
  transaction<T>(
    work: (users: UserRepository) => Promise<T>,
    options?: TransactionOptions
  ): Promise<T>;
  ping(): Promise<void>;
}
