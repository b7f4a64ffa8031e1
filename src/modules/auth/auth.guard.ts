import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { parseBearerToken } from '../../common/auth/bearer-token';
import { TokenService } from './token.service';

export type AuthedRequest = Request & { user?: { id: number; username: string } };

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(private readonly tokens: TokenService) {}

  canActivate(context: ExecutionContext) {
    const req = context.switchToHttp().getRequest<AuthedRequest>();
    const token = parseBearerToken(req.headers.authorization);
    const claims = token ? this.tokens.verify(token) : null;
    if (!claims) throw new UnauthorizedException();
    req.user = { id: claims.userId, username: claims.username };
    return true;
  }
}
