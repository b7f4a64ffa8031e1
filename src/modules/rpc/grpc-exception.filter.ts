import { ArgumentsHost, Catch, Logger, RpcExceptionFilter } from '@nestjs/common';
import { RpcException } from '@nestjs/microservices';
import { status as GrpcStatus } from '@grpc/grpc-js';
import { Observable, throwError } from 'rxjs';
import { isDomainError } from '../../common/errors/domain-error';
import { GRPC_STATUS_BY_KIND, publicError } from '../../common/errors/error-status';

export type GrpcErrorPayload = {
  code: GrpcStatus;
  message: string;
};

function isGrpcErrorPayload(value: unknown): value is GrpcErrorPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'number' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

/** Domain errors -> gRPC status; anything unrecognised becomes INTERNAL with no detail. */
export function toGrpcError(exception: unknown, logger?: Logger): GrpcErrorPayload {
  if (isDomainError(exception)) {
    if (exception.kind === 'unexpected') {
      logger?.error(`Unexpected error: ${exception.detail}`, exception.stack);
    }
    return { code: GRPC_STATUS_BY_KIND[exception.kind], message: publicError(exception).message };
  }
  if (exception instanceof RpcException) {
    const error = exception.getError();
    if (isGrpcErrorPayload(error)) return error;
    return { code: GrpcStatus.UNKNOWN, message: typeof error === 'string' ? error : 'unknown error' };
  }
  logger?.error(
    `Unhandled exception: ${exception instanceof Error ? exception.message : String(exception)}`,
    exception instanceof Error ? exception.stack : undefined,
  );
  return { code: GrpcStatus.INTERNAL, message: 'internal error' };
}

@Catch()
export class GrpcExceptionFilter implements RpcExceptionFilter<unknown> {
  private readonly logger = new Logger('RPC');

  catch(exception: unknown, _host: ArgumentsHost): Observable<never> {
    const error = toGrpcError(exception, this.logger);
    return throwError(() => error);
  }
}
