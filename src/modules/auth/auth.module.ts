import { Module } from '@nestjs/common';
import { AppConfigService } from '../app/app-config.service';
import { UsersModule } from '../users/users.module';
import { AuthController } from './auth.controller';
import { AuthGuard } from './auth.guard';
import { AuthService } from './auth.service';
import { Argon2PasswordHasher, PASSWORD_HASHER } from './password-hasher';
import { TokenService } from './token.service';

@Module({
  imports: [UsersModule],
  controllers: [AuthController],
  providers: [
    AuthService,
    AuthGuard,
    { provide: PASSWORD_HASHER, useClass: Argon2PasswordHasher },
    {
      provide: TokenService,
      useFactory: (config: AppConfigService) => new TokenService(config.jwtSecret(), config.jwtTtlSeconds()),
      inject: [AppConfigService],
    },
  ],
  exports: [AuthService, AuthGuard, TokenService],
})
export class AuthModule {}
