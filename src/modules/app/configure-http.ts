import { Logger, RequestMethod } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import helmet from 'helmet';
import compression = require('compression');
import { randomUUID } from 'crypto';
import type { NextFunction, Response } from 'express';
import { ApiExceptionFilter, type RequestWithId } from '../../common/filters/api-exception.filter';
import { jsonBodyMiddleware } from '../../common/http/json-body.middleware';
import { ApiResponseInterceptor } from '../../common/interceptors/api-response.interceptor';
import { InFlightLimitInterceptor } from '../../common/interceptors/in-flight-limit.interceptor';
import { RequestTimeoutInterceptor } from '../../common/interceptors/request-timeout.interceptor';
import { AppConfigService } from './app-config.service';

/**
 * HTTP middleware, filters and interceptors. Shared by bootstrap and the e2e
 * tests so both run the same pipeline.
 */
export function configureHttpApp(app: NestExpressApplication, appConfig: AppConfigService) {
  const logger = new Logger('HTTP');
  const http = appConfig.http();

  // Clients should not get 304s for API responses.
  app.getHttpAdapter().getInstance().disable('etag');

  // Security headers (API-safe defaults).
  app.use(
    helmet({
      crossOriginResourcePolicy: false,
      contentSecurityPolicy: false,
    }),
  );
  app.use(compression());

  // Request id (for tracing + debugging). Returned as `x-request-id`.
  app.use((req: RequestWithId, res: Response, next: NextFunction) => {
    const incoming = String(req.headers['x-request-id'] ?? '').trim();
    const id = incoming || randomUUID();
    res.setHeader('x-request-id', id);
    req.requestId = id;
    next();
  });

  // Body limit (protect memory).
  app.use(jsonBodyMiddleware(http.bodyLimitBytes));

  // Opt-in request logging (LOG_REQUESTS=true).
  if (appConfig.logRequests()) {
    app.use((req: RequestWithId, res: Response, next: NextFunction) => {
      const start = Date.now();
      const method = String(req.method || '');
      const path = String(req.originalUrl || req.url || '');
      res.on('finish', () => {
        const ms = Date.now() - start;
        logger.log(`${method} ${path} -> ${res.statusCode} (${ms}ms) rid=${req.requestId ?? '-'}`);
      });
      next();
    });
  }

  app.enableCors({
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Allow non-browser clients (no Origin header)
      if (!origin) return callback(null, true);
      if (appConfig.isOriginAllowed(origin)) return callback(null, true);
      // Do not fail the request; the browser blocks it without CORS headers.
      appConfig.logCorsBlocked(origin);
      return callback(null, false);
    },
  });

  app.setGlobalPrefix('api', { exclude: [{ path: 'healthz', method: RequestMethod.GET }] });

  // Timeout is outermost so time spent queued for a slot counts against it.
  app.useGlobalInterceptors(
    new RequestTimeoutInterceptor(appConfig),
    new InFlightLimitInterceptor(appConfig),
    new ApiResponseInterceptor(),
  );
  app.useGlobalFilters(new ApiExceptionFilter());
}
