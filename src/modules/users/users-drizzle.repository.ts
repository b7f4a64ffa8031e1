import { Injectable } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { UnexpectedError } from '../../common/errors/domain-error';
import { DatabaseService } from '../database/database.service';
import { fromRow, mapUserDbError, runQuery } from '../database/pg-errors';
import { users, type UserRow } from '../database/schema';
import { createUser, type User, type UserCredentials } from './user.model';
import type { NewUser, UsersRepository } from './users.repository';

function toUser(row: Pick<UserRow, 'id' | 'username' | 'email' | 'createdAt'>): User {
  return fromRow(() => createUser(row));
}

function toCredentials(row: UserRow | undefined): UserCredentials | null {
  if (!row) return null;
  return { user: toUser(row), passwordHash: row.passwordHash };
}

@Injectable()
export class UsersDrizzleRepository implements UsersRepository {
  constructor(private readonly database: DatabaseService) {}

  async create(input: NewUser): Promise<User> {
    const [row] = await runQuery(
      () =>
        this.database.db
          .insert(users)
          .values({ username: input.username, email: input.email, passwordHash: input.passwordHash })
          .returning({ id: users.id, username: users.username, email: users.email, createdAt: users.createdAt }),
      mapUserDbError,
    );
    if (!row) throw new UnexpectedError('user insert returned no row');
    return toUser(row);
  }

  async findByUsername(username: string): Promise<UserCredentials | null> {
    const [row] = await runQuery(
      () => this.database.db.select().from(users).where(eq(users.username, username)).limit(1),
      mapUserDbError,
    );
    return toCredentials(row);
  }
}
