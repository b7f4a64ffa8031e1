import { HttpStatus } from '@nestjs/common';
import { status as GrpcStatus } from '@grpc/grpc-js';
import type { AnyDomainError, DomainErrorKind } from './domain-error';

export const HTTP_STATUS_BY_KIND: Record<DomainErrorKind, HttpStatus> = {
  validation: HttpStatus.BAD_REQUEST,
  already_exists: HttpStatus.CONFLICT,
  invalid_credentials: HttpStatus.UNAUTHORIZED,
  not_found: HttpStatus.NOT_FOUND,
  forbidden: HttpStatus.FORBIDDEN,
  unexpected: HttpStatus.INTERNAL_SERVER_ERROR,
};

export const GRPC_STATUS_BY_KIND: Record<DomainErrorKind, GrpcStatus> = {
  validation: GrpcStatus.INVALID_ARGUMENT,
  already_exists: GrpcStatus.ALREADY_EXISTS,
  invalid_credentials: GrpcStatus.UNAUTHENTICATED,
  not_found: GrpcStatus.NOT_FOUND,
  forbidden: GrpcStatus.PERMISSION_DENIED,
  unexpected: GrpcStatus.INTERNAL,
};

export type PublicError = {
  message: string;
  /** Offending field for validation/conflict errors, otherwise a fixed machine token. */
  reason: string;
};

/** Client-facing view of a domain error. Never carries internal detail. */
export function publicError(err: AnyDomainError): PublicError {
  switch (err.kind) {
    case 'validation':
      return { message: err.message, reason: err.field };
    case 'already_exists':
      return { message: err.message, reason: err.field };
    case 'invalid_credentials':
      return { message: 'invalid credentials', reason: 'invalid_credentials' };
    case 'not_found':
      return { message: err.message, reason: 'not_found' };
    case 'forbidden':
      return { message: 'forbidden', reason: 'forbidden' };
    case 'unexpected':
      return { message: 'internal error', reason: 'internal_error' };
  }
}
