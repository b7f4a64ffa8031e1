import { AlreadyExistsError } from '../../src/common/errors/domain-error';
import type { User, UserCredentials } from '../../src/modules/users/user.model';
import type { NewUser, UsersRepository } from '../../src/modules/users/users.repository';

/** Same uniqueness rules as the users table. */
export class InMemoryUsersRepository implements UsersRepository {
  private nextId = 1;
  readonly rows: UserCredentials[] = [];

  async create(input: NewUser): Promise<User> {
    if (this.rows.some((r) => r.user.username === input.username)) throw new AlreadyExistsError('username');
    if (this.rows.some((r) => r.user.email === input.email)) throw new AlreadyExistsError('email');
    const user: User = {
      id: this.nextId++,
      username: input.username,
      email: input.email,
      createdAt: new Date(),
    };
    this.rows.push({ user, passwordHash: input.passwordHash });
    return user;
  }

  async findByUsername(username: string): Promise<UserCredentials | null> {
    return this.rows.find((r) => r.user.username === username) ?? null;
  }
}
