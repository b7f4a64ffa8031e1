import { Inject, Injectable, Logger } from '@nestjs/common';
import { InvalidCredentialsError, UnexpectedError } from '../../common/errors/domain-error';
import {
  normalizeEmail,
  normalizeLoginUsername,
  normalizeRegisterUsername,
  validateLoginPassword,
  validateRegisterPassword,
  type User,
} from '../users/user.model';
import { USERS_REPOSITORY, type UsersRepository } from '../users/users.repository';
import type { LoginInput, RegisterInput } from './auth.schemas';
import { DUMMY_PASSWORD_HASH, PASSWORD_HASHER, type PasswordHasher } from './password-hasher';
import { TokenService } from './token.service';

export type AuthResult = {
  user: User;
  accessToken: string;
};

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(USERS_REPOSITORY) private readonly users: UsersRepository,
    @Inject(PASSWORD_HASHER) private readonly hasher: PasswordHasher,
    private readonly tokens: TokenService,
  ) {}

  async register(input: RegisterInput): Promise<AuthResult> {
    const username = normalizeRegisterUsername(input.username);
    const email = normalizeEmail(input.email);
    const password = validateRegisterPassword(input.password);

    const passwordHash = await this.hasher.hash(password);
    const user = await this.users.create({ username, email, passwordHash });
    this.logger.log(`Registered user id=${user.id}`);

    return { user, accessToken: this.tokens.issue(user.id, user.username) };
  }

  async login(input: LoginInput): Promise<AuthResult> {
    const username = normalizeLoginUsername(input.username);
    const password = validateLoginPassword(input.password);

    const credentials = await this.users.findByUsername(username);
    if (!credentials) {
      // Same argon2 cost as a real check, so unknown usernames are not distinguishable by latency.
      await this.hasher.verify(password, DUMMY_PASSWORD_HASH).catch(() => 'mismatch' as const);
      throw new InvalidCredentialsError();
    }

    const outcome = await this.hasher.verify(password, credentials.passwordHash);
    if (outcome === 'malformed') {
      this.logger.error(`Stored password hash for user id=${credentials.user.id} is malformed`);
      throw new UnexpectedError('stored password hash is malformed');
    }
    if (outcome === 'mismatch') throw new InvalidCredentialsError();

    const { user } = credentials;
    return { user, accessToken: this.tokens.issue(user.id, user.username) };
  }
}
