import type { Logger } from 'pino';
import {
  applyRequest,
  newUserFromRequest,
  toUserResponse,
  type UserRequest,
  type UserResponse,
} from '../../domain/users/user.js';
import { DuplicateResourceError, NotFoundError } from '../errors.js';
import type { UserRepository, UserStore } from './userRepository.js';

const READ_ONLY = { readOnly: true };

export class UserService {
  private logger: Logger;

  constructor(
    private store: UserStore,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'UserService' });
  }

  async listUsers(): Promise<UserResponse[]> {
    this.logger.debug('Fetching all users');
    return this.store.transaction(async (users) => {
      const all = await users.findAll();
      return all.map(toUserResponse);
    }, READ_ONLY);
  }

  async getUser(id: number): Promise<UserResponse> {
    this.logger.debug({ userId: id }, 'Fetching user by id');
    return this.store.transaction(async (users) => {
      const user = await users.findById(id);
      if (!user) {
        throw new NotFoundError(`User not found with id: ${id}`);
      }
      return toUserResponse(user);
    }, READ_ONLY);
  }

  async getUserByUsername(username: string): Promise<UserResponse> {
    this.logger.debug({ username }, 'Fetching user by username');
    return this.store.transaction(async (users) => {
      const user = await users.findByUsername(username);
      if (!user) {
        throw new NotFoundError(`User not found with username: ${username}`);
      }
      return toUserResponse(user);
    }, READ_ONLY);
  }

  /**
   * Request fields are validated at the HTTP boundary. The existence
   * checks are not atomic with the insert; the repository turns a unique
   * constraint violation into the same DuplicateResourceError.
   */
  async createUser(request: UserRequest): Promise<UserResponse> {
    this.logger.debug({ username: request.username }, 'Creating user');

    const saved = await this.store.transaction(async (users) => {
      await this.assertUsernameFree(users, request.username);
      await this.assertEmailFree(users, request.email);

      return users.save(newUserFromRequest(request));
    });

    this.logger.info({ userId: saved.id }, 'User created');
    return toUserResponse(saved);
  }

  async updateUser(id: number, request: UserRequest): Promise<UserResponse> {
    this.logger.debug({ userId: id }, 'Updating user');

    const updated = await this.store.transaction(async (users) => {
      const existing = await users.findById(id);
      if (!existing) {
        throw new NotFoundError(`User not found with id: ${id}`);
      }

      // Only re-check values that change, so a record never conflicts with itself
      if (existing.username !== request.username) {
        await this.assertUsernameFree(users, request.username);
      }
      if (existing.email !== request.email) {
        await this.assertEmailFree(users, request.email);
      }

      return users.save(applyRequest(existing, request));
    });

    this.logger.info({ userId: updated.id, version: updated.version }, 'User updated');
    return toUserResponse(updated);
  }

  async deleteUser(id: number): Promise<void> {
    this.logger.debug({ userId: id }, 'Deleting user');

    await this.store.transaction(async (users) => {
      if (!(await users.existsById(id))) {
        throw new NotFoundError(`User not found with id: ${id}`);
      }
      await users.deleteById(id);
    });

    this.logger.info({ userId: id }, 'User deleted');
  }

  private async assertUsernameFree(users: UserRepository, username: string): Promise<void> {
    if (await users.existsByUsername(username)) {
      throw new DuplicateResourceError(`Username already exists: ${username}`);
    }
  }

  private async assertEmailFree(users: UserRepository, email: string): Promise<void> {
    if (await users.existsByEmail(email)) {
      throw new DuplicateResourceError(`Email already exists: ${email}`);
    }
  }
}
