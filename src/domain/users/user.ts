/**
 * User entity as persisted. `id`, timestamps and `version` are owned by
 * the store; the service only ever writes the profile fields.
 */
export interface User {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly firstName: string | null;
  readonly lastName: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly version: number;
}

/**
 * A user not yet inserted.
 */
export interface NewUser {
  readonly username: string;
  readonly email: string;
  readonly firstName: string | null;
  readonly lastName: string | null;
}

export interface UserRequest {
  username: string;
  email: string;
  firstName?: string | null;
  lastName?: string | null;
}

export interface UserResponse {
  id: number;
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export function isPersisted(user: NewUser | User): user is User {
  return 'id' in user;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}

export function newUserFromRequest(request: UserRequest): NewUser {
  return {
    username: request.username,
    email: request.email,
    firstName: request.firstName ?? null,
    lastName: request.lastName ?? null,
  };
}

/**
 * Copy the writable profile fields of a request onto a stored user.
 * Identity, timestamps and version are left as they are.
 */
export function applyRequest(user: User, request: UserRequest): User {
  return { ...user, ...newUserFromRequest(request) };
}
