import { Module } from '@nestjs/common';
import { USERS_REPOSITORY } from './users.repository';
import { UsersDrizzleRepository } from './users-drizzle.repository';

@Module({
  providers: [{ provide: USERS_REPOSITORY, useClass: UsersDrizzleRepository }],
  exports: [USERS_REPOSITORY],
})
export class UsersModule {}
