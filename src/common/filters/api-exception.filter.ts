import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { ZodError } from 'zod';
import { isDomainError } from '../errors/domain-error';
import { HTTP_STATUS_BY_KIND, publicError } from '../errors/error-status';

type ApiError = {
  code: number;
  message: string;
  reason?: string;
};

export type ErrorEnvelope = {
  meta: {
    status: number;
    errors: ApiError[];
    requestId?: string;
  };
};

export type RequestWithId = Request & { requestId?: string };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractHttpMessage(exception: HttpException): { message: string; reason?: string } {
  const res = exception.getResponse();
  if (typeof res === 'string') return { message: res };
  if (isObject(res)) {
    const message = res.message;
    const error = res.error;
    if (Array.isArray(message)) {
      return { message: message.join('\n'), reason: typeof error === 'string' ? error : undefined };
    }
    if (typeof message === 'string') {
      return { message, reason: typeof error === 'string' ? error : undefined };
    }
  }
  return { message: exception.message };
}

function reasonForStatus(status: number): string | undefined {
  if (status === HttpStatus.UNAUTHORIZED) return 'unauthorized';
  if (status === HttpStatus.REQUEST_TIMEOUT) return 'timeout';
  if (status === HttpStatus.PAYLOAD_TOO_LARGE) return 'payload_too_large';
  return undefined;
}

function envelope(status: number, error: ApiError, requestId: string | null): ErrorEnvelope {
  return {
    meta: {
      status,
      errors: [error],
      ...(requestId ? { requestId } : {}),
    },
  };
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('API');

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<RequestWithId>();
    const header = req.headers['x-request-id'];
    const requestId = req.requestId ?? (typeof header === 'string' ? header : null);

    if (isDomainError(exception)) {
      const status = HTTP_STATUS_BY_KIND[exception.kind];
      if (exception.kind === 'unexpected') {
        this.logger.error(`Unexpected error rid=${requestId ?? '-'}: ${exception.detail}`, exception.stack);
        return res
          .status(status)
          .json(envelope(status, { code: status, message: 'Internal server error', reason: 'internal_error' }, requestId));
      }
      const { message, reason } = publicError(exception);
      return res.status(status).json(envelope(status, { code: status, message, reason }, requestId));
    }

    // Zod validation errors that escaped parseRequest
    if (exception instanceof ZodError) {
      const issue = exception.issues[0];
      const status = HttpStatus.BAD_REQUEST;
      return res.status(status).json(
        envelope(
          status,
          {
            code: status,
            message: issue?.message ?? 'Invalid request',
            reason: issue && issue.path.length ? issue.path.join('.') : 'validation',
          },
          requestId,
        ),
      );
    }

    // Nest HTTP exceptions (guards, body parser, timeouts)
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const { message, reason } = extractHttpMessage(exception);
      return res
        .status(status)
        .json(envelope(status, { code: status, message, reason: reasonForStatus(status) ?? reason }, requestId));
    }

    // Unknown: safe envelope to the client, full error to the log.
    this.logger.error(
      `Unhandled exception rid=${requestId ?? '-'}: ${exception instanceof Error ? exception.message : String(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    const status = HttpStatus.INTERNAL_SERVER_ERROR;
    return res
      .status(status)
      .json(envelope(status, { code: status, message: 'Internal server error', reason: 'internal_error' }, requestId));
  }
}
