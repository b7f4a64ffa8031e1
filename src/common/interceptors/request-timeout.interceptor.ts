import { CallHandler, ExecutionContext, Injectable, NestInterceptor, RequestTimeoutException } from '@nestjs/common';
import { RpcException } from '@nestjs/microservices';
import { status as GrpcStatus } from '@grpc/grpc-js';
import { Observable, throwError, TimeoutError } from 'rxjs';
import { catchError, timeout } from 'rxjs/operators';
import { AppConfigService } from '../../modules/app/app-config.service';

/** Per-request deadline: 408 over HTTP, DEADLINE_EXCEEDED over gRPC. */
@Injectable()
export class RequestTimeoutInterceptor implements NestInterceptor {
  constructor(private readonly config: AppConfigService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const isRpc = context.getType() === 'rpc';
    const ms = isRpc ? this.config.grpc().requestTimeoutMs : this.config.http().requestTimeoutMs;
    return next.handle().pipe(
      timeout(ms),
      catchError((err: unknown) => {
        if (!(err instanceof TimeoutError)) return throwError(() => err);
        return throwError(() =>
          isRpc
            ? new RpcException({ code: GrpcStatus.DEADLINE_EXCEEDED, message: 'request timed out' })
            : new RequestTimeoutException('Request timed out'),
        );
      }),
    );
  }
}
