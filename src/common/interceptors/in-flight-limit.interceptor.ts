import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { AppConfigService } from '../../modules/app/app-config.service';
import { InFlightLimiter } from '../concurrency/in-flight-limiter';

/**
 * Caps concurrent handler executions per listener. Requests past the cap wait
 * for a slot; the request timeout still applies while they wait. A handler that
 * outlives its request holds the slot until it finishes.
 */
@Injectable()
export class InFlightLimitInterceptor implements NestInterceptor {
  readonly http: InFlightLimiter;
  readonly rpc: InFlightLimiter;

  constructor(config: AppConfigService) {
    this.http = new InFlightLimiter(config.http().concurrencyLimit);
    this.rpc = new InFlightLimiter(config.grpc().concurrencyLimit);
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const limiter = context.getType() === 'rpc' ? this.rpc : this.http;
    return new Observable<unknown>((subscriber) => {
      let cancelled = false;

      void limiter.acquire().then((release) => {
        // Unsubscribed (e.g. timed out) while queued: hand the slot straight back.
        if (cancelled) return release();
        // Once started, the handler keeps its slot until its work settles, even if the
        // caller has gone away; unsubscribing would not stop the underlying promise.
        let source: Observable<unknown>;
        try {
          source = next.handle();
        } catch (err) {
          release();
          return subscriber.error(err);
        }
        source.subscribe({
          next: (v) => {
            if (!cancelled) subscriber.next(v);
          },
          error: (err: unknown) => {
            release();
            if (!cancelled) subscriber.error(err);
          },
          complete: () => {
            release();
            if (!cancelled) subscriber.complete();
          },
        });
      });

      return () => {
        cancelled = true;
      };
    });
  }
}
