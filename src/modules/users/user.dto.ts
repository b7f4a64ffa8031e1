import type { User } from './user.model';
import type { AuthResult } from '../auth/auth.service';

export type UserDto = {
  id: number;
  username: string;
  email: string;
  created_at: string;
};

export type AuthResponseDto = {
  user: UserDto;
  access_token: string;
};

export function toUserDto(user: User): UserDto {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    created_at: user.createdAt.toISOString(),
  };
}

export function toAuthResponseDto(result: AuthResult): AuthResponseDto {
  return { user: toUserDto(result.user), access_token: result.accessToken };
}
