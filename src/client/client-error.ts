import { status as GrpcStatus } from '@grpc/grpc-js';

export type BlogClientErrorKind = 'unauthorized' | 'not_found' | 'invalid_request' | 'transport';

export class BlogClientError extends Error {
  constructor(
    readonly kind: BlogClientErrorKind,
    message: string,
    /** HTTP status or gRPC code, when the server answered. */
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BlogClientError';
  }

  static unauthorized(message = 'unauthorized', status?: number) {
    return new BlogClientError('unauthorized', message, status);
  }

  /** 401/403 -> unauthorized, 404 -> not_found, other non-2xx -> invalid_request. */
  static fromHttpStatus(status: number, message?: string): BlogClientError {
    if (status === 401 || status === 403) return BlogClientError.unauthorized(message, status);
    if (status === 404) return new BlogClientError('not_found', message ?? 'not found', status);
    return new BlogClientError('invalid_request', message ?? `http status ${status}`, status);
  }

  static fromGrpcStatus(code: number, message: string, cause?: unknown): BlogClientError {
    switch (code) {
      case GrpcStatus.UNAUTHENTICATED:
      case GrpcStatus.PERMISSION_DENIED:
        return BlogClientError.unauthorized(message, code);
      case GrpcStatus.NOT_FOUND:
        return new BlogClientError('not_found', message, code);
      case GrpcStatus.INVALID_ARGUMENT:
      case GrpcStatus.ALREADY_EXISTS:
      case GrpcStatus.FAILED_PRECONDITION:
        return new BlogClientError('invalid_request', message, code);
      default:
        return new BlogClientError('transport', `grpc status ${code}: ${message}`, code, { cause });
    }
  }
}
