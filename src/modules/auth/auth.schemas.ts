import { z } from 'zod';
import {
  charLength,
  PASSWORD_MAX_LENGTH,
  PASSWORD_MIN_LENGTH,
  USERNAME_MAX_LENGTH,
  USERNAME_MIN_LENGTH,
} from '../users/user.model';

// Shared by the REST controller and the RPC controller.

export const registerSchema = z.object({
  username: z
    .string()
    .refine(
      (v) => charLength(v.trim()) >= USERNAME_MIN_LENGTH && charLength(v.trim()) <= USERNAME_MAX_LENGTH,
      `must be ${USERNAME_MIN_LENGTH}..${USERNAME_MAX_LENGTH} chars`,
    ),
  email: z.string().min(1, 'must be a valid email'),
  password: z
    .string()
    .refine(
      (v) => charLength(v) >= PASSWORD_MIN_LENGTH && charLength(v) <= PASSWORD_MAX_LENGTH,
      `must be ${PASSWORD_MIN_LENGTH}..${PASSWORD_MAX_LENGTH} chars`,
    ),
});

export const loginSchema = z.object({
  username: z.string().refine((v) => {
    const len = charLength(v.trim());
    return len >= 1 && len <= USERNAME_MAX_LENGTH;
  }, `must be 1..${USERNAME_MAX_LENGTH} chars`),
  password: z.string().min(1, 'must not be empty'),
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
