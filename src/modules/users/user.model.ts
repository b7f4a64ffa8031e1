import { z } from 'zod';
import { ValidationError } from '../../common/errors/domain-error';

export type User = {
  id: number;
  username: string;
  email: string;
  createdAt: Date;
};

/** A user together with the stored password hash. Only the auth flow sees this. */
export type UserCredentials = {
  user: User;
  passwordHash: string;
};

export const USERNAME_MIN_LENGTH = 3;
export const USERNAME_MAX_LENGTH = 64;
export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;

const emailSchema = z.string().email();

/** Length in characters (code points), not UTF-16 units or bytes. */
export function charLength(value: string): number {
  return [...value].length;
}

export function normalizeRegisterUsername(raw: string): string {
  const username = raw.trim();
  const len = charLength(username);
  if (len < USERNAME_MIN_LENGTH || len > USERNAME_MAX_LENGTH) {
    throw new ValidationError('username', `must be ${USERNAME_MIN_LENGTH}..${USERNAME_MAX_LENGTH} chars`);
  }
  return username;
}

export function normalizeLoginUsername(raw: string): string {
  const username = raw.trim();
  const len = charLength(username);
  if (len < 1 || len > USERNAME_MAX_LENGTH) {
    throw new ValidationError('username', `must be 1..${USERNAME_MAX_LENGTH} chars`);
  }
  return username;
}

export function normalizeEmail(raw: string): string {
  const email = raw.trim().toLowerCase();
  if (!emailSchema.safeParse(email).success) {
    throw new ValidationError('email', 'must be a valid email');
  }
  return email;
}

export function validateRegisterPassword(password: string): string {
  const len = charLength(password);
  if (len < PASSWORD_MIN_LENGTH || len > PASSWORD_MAX_LENGTH) {
    throw new ValidationError('password', `must be ${PASSWORD_MIN_LENGTH}..${PASSWORD_MAX_LENGTH} chars`);
  }
  return password;
}

export function validateLoginPassword(password: string): string {
  if (!password) throw new ValidationError('password', 'must not be empty');
  return password;
}

export function validatePositiveId(field: string, value: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(field, 'must be > 0');
  }
  return value;
}

/** Builds a User from raw values, applying the same normalization as registration. */
export function createUser(input: { id: number; username: string; email: string; createdAt: Date }): User {
  return {
    id: validatePositiveId('id', input.id),
    username: normalizeRegisterUsername(input.username),
    email: normalizeEmail(input.email),
    createdAt: input.createdAt,
  };
}
