import type { Metadata } from '@grpc/grpc-js';
import { status as GrpcStatus } from '@grpc/grpc-js';
import { RpcException } from '@nestjs/microservices';
import { parseBearerToken } from '../../common/auth/bearer-token';
import type { TokenClaims, TokenService } from '../auth/token.service';

/** Reads `authorization: Bearer <token>` from call metadata; UNAUTHENTICATED otherwise. */
export function authenticateMetadata(tokens: TokenService, metadata: Metadata | undefined): TokenClaims {
  const [raw] = metadata?.get('authorization') ?? [];
  if (raw === undefined) {
    throw new RpcException({ code: GrpcStatus.UNAUTHENTICATED, message: 'missing authorization metadata' });
  }
  const token = typeof raw === 'string' ? parseBearerToken(raw) : null;
  if (!token) {
    throw new RpcException({ code: GrpcStatus.UNAUTHENTICATED, message: 'invalid authorization metadata' });
  }
  const claims = tokens.verify(token);
  if (!claims) throw new RpcException({ code: GrpcStatus.UNAUTHENTICATED, message: 'invalid token' });
  return claims;
}
