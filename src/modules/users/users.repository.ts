import type { User, UserCredentials } from './user.model';

export type NewUser = {
  username: string;
  email: string;
  passwordHash: string;
};

/**
 * Credential store. Implementations report a uniqueness conflict as
 * AlreadyExistsError naming the field ('username' | 'email').
 */
export interface UsersRepository {
  create(input: NewUser): Promise<User>;
  findByUsername(username: string): Promise<UserCredentials | null>;
}

export const USERS_REPOSITORY = Symbol('USERS_REPOSITORY');
